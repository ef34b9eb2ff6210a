import { randomUUID } from 'node:crypto';
import type { Row } from '../db/types.js';
import type { ForbiddenKeyword, SanitizedSql } from '../policy/sanitize.js';

export interface PipelineFlags {
  /** Stop before execution */
  noExec: boolean;
  /** Show the sanitized SQL only; also skips generation when SQL is supplied */
  explainOnly: boolean;
  /** Rebuild the schema cache before reading it */
  refreshSchema: boolean;
}

export type ExecutionStatus = 'pending' | 'skipped' | 'ok' | 'failed';

export type SanitizeRejection =
  | { reason: 'empty' }
  | { reason: 'unsafe'; keyword: ForbiddenKeyword; extracted: string };

/**
 * One per request. Every stage returns a new state; `errors` only grows.
 */
export interface PipelineState {
  runId: string;
  sessionId: string | null;
  startedAt: string;
  question: string;
  flags: PipelineFlags;
  schemaContext: string;
  /** Candidate SQL as supplied or generated, before sanitizing */
  sqlRaw: string;
  sanitized: SanitizedSql | null;
  rejection: SanitizeRejection | null;
  execution: ExecutionStatus;
  rows: Row[];
  execMs: number | null;
  errors: string[];
  preview: string;
}

export interface PipelineInput {
  question?: string;
  sqlRaw?: string;
  sessionId?: string;
  flags?: Partial<PipelineFlags>;
}

export function createPipelineState(input: PipelineInput): PipelineState {
  return {
    runId: randomUUID(),
    sessionId: input.sessionId ?? null,
    startedAt: new Date().toISOString(),
    question: input.question ?? '',
    flags: {
      noExec: input.flags?.noExec ?? false,
      explainOnly: input.flags?.explainOnly ?? false,
      refreshSchema: input.flags?.refreshSchema ?? false,
    },
    schemaContext: '',
    sqlRaw: input.sqlRaw ?? '',
    sanitized: null,
    rejection: null,
    execution: 'pending',
    rows: [],
    execMs: null,
    errors: [],
    preview: '',
  };
}
