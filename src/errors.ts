export class ValidationError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export class PersistenceError extends Error {
  readonly backend: string;

  constructor(backend: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
    this.backend = backend;
  }
}

export class BackendUnavailableError extends Error {
  readonly backend: string;

  constructor(backend: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BackendUnavailableError';
    this.backend = backend;
  }
}

export class SweepError extends Error {
  readonly retentionDays: number;

  constructor(retentionDays: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SweepError';
    this.retentionDays = retentionDays;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
