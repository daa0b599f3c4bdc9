export type ResearchErrorCode =
  | 'NO_CONTENT_FOUND'
  | 'PARTIAL_GATEWAY_FAILURE'
  | 'GATEWAY_FAILURE'
  | 'CANCELLED_BY_CLIENT'
  | 'INTERNAL_ERROR'
  | 'INVALID_REQUEST'
  | 'NOT_FOUND'
  | 'SEARCH_ERROR'
  | 'COMPLETION_ERROR';

export class ResearchError extends Error {
  readonly code: ResearchErrorCode;
  readonly status: number;

  constructor(code: ResearchErrorCode, message: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

/** Raised by a SearchGateway on transport or parse failure. */
export class SearchError extends ResearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SEARCH_ERROR', message, 502, options);
  }
}

/** Raised by a CompletionGateway on model or transport failure. */
export class CompletionError extends ResearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('COMPLETION_ERROR', message, 502, options);
  }
}

export class NoContentFoundError extends ResearchError {
  constructor(message = 'Unable to find relevant content.') {
    super('NO_CONTENT_FOUND', message, 400);
  }
}

export class PartialGatewayFailure extends ResearchError {
  readonly repository: string;
  readonly query: string;

  constructor(repository: string, query: string, cause: unknown) {
    super('PARTIAL_GATEWAY_FAILURE', `Search for "${query}" in ${repository} failed: ${describeError(cause)}`, 502, { cause });
    this.repository = repository;
    this.query = query;
  }
}

export class GatewayFailureError extends ResearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('GATEWAY_FAILURE', message, 502, options);
  }
}

export class CancelledByClientError extends ResearchError {
  readonly reason: string;

  constructor(reason = 'client disconnected') {
    super('CANCELLED_BY_CLIENT', `Research cancelled: ${reason}`, 499);
    this.reason = reason;
  }
}

export class InternalError extends ResearchError {
  constructor(message = 'An unexpected error occurred', options?: { cause?: unknown }) {
    super('INTERNAL_ERROR', message, 500, options);
  }
}

export class RequestValidationError extends ResearchError {
  constructor(message: string) {
    super('INVALID_REQUEST', message, 400);
  }
}

export class NotFoundError extends ResearchError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : `${error}`;
}

/** Wraps anything that is not already a ResearchError as an InternalError. */
export function toResearchError(error: unknown): ResearchError {
  if (error instanceof ResearchError) {
    return error;
  }

  return new InternalError(describeError(error), { cause: error });
}
