/**
 * OpenAI-backed SqlGenerator.
 * Reads OPENAI_API_KEY from the environment unless a key is passed in.
 */

import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { buildMessages } from './prompt.js';
import type { GenerateSqlInput, SqlGenerator } from './types.js';

export const DEFAULT_MODEL = 'gpt-4o-mini';

/** The part of the OpenAI client the generator calls. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
      ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export interface OpenAIGeneratorOptions {
  apiKey?: string;
  model?: string;
  /** Injected client, mainly for tests */
  client?: ChatCompletionsClient;
}

function getApiKey(explicit?: string): string {
  const key = explicit ?? process.env.OPENAI_API_KEY;
  if (!key) {
    throw new Error('OpenAI API key is not configured. Set OPENAI_API_KEY in your shell.');
  }
  return key;
}

export class OpenAISqlGenerator implements SqlGenerator {
  readonly model: string;
  private readonly client: ChatCompletionsClient;

  constructor(opts: OpenAIGeneratorOptions = {}) {
    this.model = opts.model || DEFAULT_MODEL;
    this.client = opts.client ?? new OpenAI({ apiKey: getApiKey(opts.apiKey) });
  }

  /** Raw model output; fences and prose are left for the sanitizer. */
  async generateSql(input: GenerateSqlInput): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: buildMessages(input),
      temperature: 0.1,
      max_tokens: 2048,
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error('OpenAI returned empty response.');
    }
    return content;
  }
}
