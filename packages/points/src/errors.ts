import { SeriesClientError } from '@pointforge/series-client';

/** Invalid or conflicting options, detected before any I/O. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class RowParseError extends Error {
  readonly source: string;
  readonly rowNumber: number;

  constructor(source: string, rowNumber: number, reason: string) {
    super(`${source}:${rowNumber}: ${reason}`);
    this.name = 'RowParseError';
    this.source = source;
    this.rowNumber = rowNumber;
  }
}

export class SourceCopyError extends Error {
  readonly identifier: string;

  constructor(identifier: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SourceCopyError';
    this.identifier = identifier;
  }
}

export class AppendBatchError extends Error {
  readonly batchIndex: number;
  readonly batchCount: number;
  readonly acceptedCount: number;

  constructor(
    options: { batchIndex: number; batchCount: number; acceptedCount: number; cause: unknown }
  ) {
    const reason = options.cause instanceof Error ? options.cause.message : String(options.cause);
    super(
      `Append batch ${options.batchIndex + 1} of ${options.batchCount} failed after ${options.acceptedCount} points were accepted: ${reason}`,
      { cause: options.cause }
    );
    this.name = 'AppendBatchError';
    this.batchIndex = options.batchIndex;
    this.batchCount = options.batchCount;
    this.acceptedCount = options.acceptedCount;
  }
}

export class AppendFailedError extends Error {
  readonly appendRequestId: string;

  constructor(appendRequestId: string, failureReason?: string | null) {
    super(`Append request ${appendRequestId} failed${failureReason ? `: ${failureReason}` : ''}`);
    this.name = 'AppendFailedError';
    this.appendRequestId = appendRequestId;
  }
}

export class AppendTimeoutError extends Error {
  readonly acceptedCount: number;

  constructor(acceptedCount: number, timeoutMs: number) {
    super(
      `Timed out after ${timeoutMs} ms waiting for the append to complete; ${acceptedCount} points were accepted and remain queued`
    );
    this.name = 'AppendTimeoutError';
    this.acceptedCount = acceptedCount;
  }
}

/** Single-line diagnostic for the CLI. */
export function describeFailure(err: unknown): string {
  if (err instanceof AppendBatchError && err.cause instanceof SeriesClientError) {
    return `${err.message} ${describeRemote(err.cause)}`;
  }
  if (err instanceof SourceCopyError && err.cause instanceof SeriesClientError) {
    return `${err.message} ${describeRemote(err.cause)}`;
  }
  if (err instanceof SeriesClientError) {
    return `API: ${describeRemote(err)} ${err.message}`;
  }
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

function describeRemote(err: SeriesClientError): string {
  return err.code ? `(${err.statusCode} ${err.code})` : `(${err.statusCode})`;
}
