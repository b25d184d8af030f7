export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : `${error}`;
}

/**
 * Raised by the dialogue model adapter when the completion request fails or
 * times out. The router answers with a fixed apology instead.
 */
export class DialogueModelError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'DialogueModelError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
