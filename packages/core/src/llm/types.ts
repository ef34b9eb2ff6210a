export interface GenerateSqlInput {
  question: string;
  schemaContext: string;
}

/**
 * Anything that turns a question into candidate SQL text. The text is
 * untrusted and always goes through the sanitizer.
 */
export interface SqlGenerator {
  readonly model: string;
  generateSql(input: GenerateSqlInput): Promise<string>;
}
