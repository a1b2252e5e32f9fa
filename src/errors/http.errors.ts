/**
 * Error carrying the status code and the message that may be shown to the
 * client. The underlying failure goes in `cause` and is only ever logged.
 */
export class HttpError extends Error {
  readonly status: number;
  readonly publicMessage: string;

  constructor(
    status: number,
    publicMessage: string,
    options?: { detail?: string; cause?: unknown }
  ) {
    super(options?.detail ?? publicMessage, { cause: options?.cause });
    this.name = new.target.name;
    this.status = status;
    this.publicMessage = publicMessage;
  }
}

export class ClientInputError extends HttpError {
  constructor(publicMessage: string, options?: { detail?: string; cause?: unknown }) {
    super(400, publicMessage, options);
  }
}

export class UpstreamUnavailableError extends HttpError {
  constructor(detail: string, cause?: unknown) {
    super(502, 'Vision service unavailable.', { detail, cause });
  }
}

export const errorMessage = (error: unknown, fallback = 'Unknown error.'): string =>
  error instanceof Error ? error.message : fallback;
