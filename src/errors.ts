/**
 * Errors raised while scanning a tree.
 */

export class InputError extends Error {
  constructor(message: string, public readonly target: string) {
    super(message);
    this.name = 'InputError';
  }
}

export class FileReadError extends Error {
  public readonly reason: string;

  constructor(public readonly filePath: string, cause: unknown) {
    const reason = describeError(cause);
    super(`Could not read ${filePath}: ${reason}`);
    this.name = 'FileReadError';
    this.reason = reason;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
