/**
 * Prompt construction for SQL generation.
 */

export type ChatMessage = { role: 'system' | 'user'; content: string };

export interface PromptInput {
  question: string;
  schemaContext: string;
}

const SYSTEM_PROMPT = `You are a SQL query generator for PostgreSQL databases.

CONSTRAINTS:
- Generate a SINGLE SQL statement only. Never multiple statements.
- You MUST generate only SELECT statements or CTE (WITH ... SELECT) statements. No INSERT, UPDATE, DELETE, DROP, or DDL.
- Prefer explicit column lists over SELECT *.
- Use schema-qualified table names.
- Do NOT reference tables not present in the provided schema.
- Do NOT apply an aggregate function directly to a subquery; use a CTE instead.

Respond with the SQL statement in a single \`\`\`sql fenced block.`;

export function buildMessages(input: PromptInput): ChatMessage[] {
  const schemaPart = input.schemaContext.trim() ? input.schemaContext : 'No schema context is available.';
  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: `${schemaPart}\n\nQuestion: ${input.question}` },
  ];
}
