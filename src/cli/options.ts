import { setLogLevel } from '../logger.js';
import type { OutputFormat } from '../types.js';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface VerbosityOptions {
  verbose?: boolean;
  quiet?: boolean;
}

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json'];

/** Split a comma-separated flag value, dropping blanks. */
export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map(part => part.trim()).filter(Boolean);
}

export function isOutputFormat(value: string | undefined): value is OutputFormat {
  return value === 'text' || value === 'json';
}

export function applyVerbosity(options: VerbosityOptions): void {
  if (options.verbose) setLogLevel('debug');
  else if (options.quiet) setLogLevel('error');
}
