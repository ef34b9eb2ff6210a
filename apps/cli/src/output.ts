import type { Command } from 'commander';
import { formatTable, type Row } from '@askdb/core';
import { toCliError } from './errors.js';

export interface OutputOptions {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  debug: boolean;
}

export function outputOptionsFromCommand(command: Command): OutputOptions {
  const opts = command.optsWithGlobals();
  return {
    json: Boolean(opts.json),
    quiet: Boolean(opts.quiet),
    verbose: Boolean(opts.verbose),
    debug: Boolean(opts.debug),
  };
}

export function printHuman(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.log(message);
  }
}

export function printWarning(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.warn(`Warning: ${message}`);
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function printHumanTable(columns: string[], rows: Row[], output: OutputOptions): void {
  if (output.quiet) return;
  console.log(formatTable(columns, rows));
}

export function printError(error: unknown, output: OutputOptions): void {
  const cliError = toCliError(error);

  if (output.json) {
    const payload: Record<string, unknown> = {
      ok: false,
      code: cliError.code,
      message: cliError.message,
    };
    if (output.debug) {
      payload.details = cliError.details ?? (error instanceof Error ? { stack: error.stack } : { raw: String(error) });
    }
    printJson(payload);
    return;
  }

  console.error(`Error: ${cliError.message}`);
  if (output.debug) {
    if (cliError.details !== undefined) {
      console.error('Details:', JSON.stringify(cliError.details, null, 2));
    } else if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
  }
}

export function printCommandSuccess(value: unknown, output: OutputOptions, humanMessage?: string): void {
  if (output.json) {
    printJson({ ok: true, data: value });
    return;
  }
  if (humanMessage && !output.quiet) {
    console.log(humanMessage);
  }
}

export function withOutputFlags(command: Command): Command {
  return command
    .option('--json', 'Machine-readable JSON output', false)
    .option('--quiet', 'Suppress non-essential logs', false)
    .option('--verbose', 'Show additional context', false)
    .option('--debug', 'Show internal error details and stacks', false);
}
