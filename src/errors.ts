export type ChatClientErrorKind =
  | 'invalid_endpoint'
  | 'api_error'
  | 'decoding_error'
  | 'timeout'
  | 'unknown';

export const UNKNOWN_API_ERROR_MESSAGE = 'Unknown error';

export abstract class ChatClientError extends Error {
  abstract readonly kind: ChatClientErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The base URL and endpoint path did not compose into a usable URL. */
export class InvalidEndpointError extends ChatClientError {
  readonly kind = 'invalid_endpoint';

  constructor(readonly url: string, cause?: unknown) {
    super('Invalid URL or endpoint', { cause });
  }
}

/** The server answered with a status outside 200-299. */
export class ApiError extends ChatClientError {
  readonly kind = 'api_error';

  constructor(readonly code: number, readonly apiMessage: string) {
    super(`API Error (${code}): ${apiMessage}`);
  }
}

/** The status was successful but the body did not match the expected shape. */
export class DecodingError extends ChatClientError {
  readonly kind = 'decoding_error';

  constructor(cause?: unknown) {
    super('Failed to decode API response', { cause });
  }
}

export class TimeoutError extends ChatClientError {
  readonly kind = 'timeout';

  constructor(cause?: unknown) {
    super('Request timed out', { cause });
  }
}

export class UnknownError extends ChatClientError {
  readonly kind = 'unknown';

  constructor(cause: unknown) {
    super(`Unknown error: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export type ChatClientFailure =
  | InvalidEndpointError
  | ApiError
  | DecodingError
  | TimeoutError
  | UnknownError;

export function isChatClientError(value: unknown): value is ChatClientFailure {
  return (
    value instanceof InvalidEndpointError ||
    value instanceof ApiError ||
    value instanceof DecodingError ||
    value instanceof TimeoutError ||
    value instanceof UnknownError
  );
}
