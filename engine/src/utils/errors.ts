/** Error classes for instanceof detection at the engine boundary. */

export class DiagramError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DiagramError';
  }
}

/** Raised when a saved-diagram file cannot be read or does not match its schema. */
export class DiagramFileError extends DiagramError {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`${filePath}: ${message}`);
    this.name = 'DiagramFileError';
    this.filePath = filePath;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
