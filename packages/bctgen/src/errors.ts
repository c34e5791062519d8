/**
 * Raised by a GenerationPort when the text-generation call errors, times out,
 * or returns output that cannot be turned into the requested messages.
 * Recovered per code by the orchestrator.
 */
export class GenerationFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationFailure';
  }
}

/**
 * Raised when a dataset table cannot be created or written. Fatal for the run.
 */
export class PersistenceFailure extends Error {
  readonly filePath: string | null;

  constructor(message: string, filePath: string | null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceFailure';
    this.filePath = filePath;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
