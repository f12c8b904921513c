export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Bundled JSON content is missing or has the wrong shape. */
export class ContentError extends Error {
  constructor(message: string, readonly file: string) {
    super(`${message} (${file})`);
    this.name = 'ContentError';
  }
}

export class PersistenceError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'PersistenceError';
  }
}

export class FocusError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FocusError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
