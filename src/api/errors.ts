export class PaperSourceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PaperSourceError';
  }
}

/** Search returned no matching paper. */
export class NotFoundError extends PaperSourceError {
  constructor(message = 'Paper not found') {
    super(message);
    this.name = 'NotFoundError';
  }
}

/** Network failure, timeout, non-2xx status or a response of the wrong shape. */
export class FetchFailureError extends PaperSourceError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'FetchFailureError';
    this.status = options?.status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
