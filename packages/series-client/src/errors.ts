export class SeriesClientError extends Error {
  readonly statusCode: number;
  readonly code: string | null;
  readonly details: unknown;

  constructor(message: string, options: { statusCode: number; code?: string | null; details?: unknown }) {
    super(message);
    this.name = 'SeriesClientError';
    this.statusCode = options.statusCode;
    this.code = options.code ?? null;
    this.details = options.details;
  }

  get isNotFound(): boolean {
    return this.statusCode === 404;
  }
}

export class SeriesResponseError extends SeriesClientError {
  constructor(message: string, details?: unknown) {
    super(message, { statusCode: 0, code: 'INVALID_RESPONSE', details });
    this.name = 'SeriesResponseError';
  }
}
