/**
 * Setup error carrying the process exit code
 */

export class SetupError extends Error {
  exitCode: number;
  hint?: string;

  constructor(message: string, options: { exitCode?: number; hint?: string } = {}) {
    super(message);
    this.name = 'SetupError';
    this.exitCode = options.exitCode ?? 1;
    this.hint = options.hint;
  }
}

export function isSetupError(error: unknown): error is SetupError {
  return error instanceof SetupError;
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
