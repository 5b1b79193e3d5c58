/**
 * Structured errors for the mock server.
 * Lifecycle and configuration failures are thrown to test code; serve-time
 * failures are written to the remote caller as HTTP responses.
 */

export type MockServerErrorCode =
  | "INVALID_OPTIONS"
  | "LISTEN_FAILED"
  | "ALREADY_OPEN"
  | "NOT_OPEN"
  | "MULTIPART_PARSE_FAILED"
  | "MISSING_FILE";

export interface MockServerErrorDetails {
  code: MockServerErrorCode;
  message: string;
  /** Status written to the remote caller when the error happens while serving */
  httpStatus?: number;
  /** Underlying cause (e.g. the listener's EADDRINUSE error or a ZodError) */
  cause?: unknown;
}

export class MockServerError extends Error {
  readonly details: MockServerErrorDetails;

  constructor(details: MockServerErrorDetails) {
    super(details.message);
    this.name = "MockServerError";
    this.details = details;
    Object.setPrototypeOf(this, MockServerError.prototype);
  }

  get code(): MockServerErrorCode {
    return this.details.code;
  }

  get httpStatus(): number | undefined {
    return this.details.httpStatus;
  }

  toJSON(): MockServerErrorDetails {
    return { ...this.details, cause: undefined };
  }
}

export function isMockServerError(err: unknown): err is MockServerError {
  return err instanceof MockServerError;
}

export function invalidOptionsError(message: string, cause?: unknown): MockServerError {
  return new MockServerError({
    code: "INVALID_OPTIONS",
    message: `Invalid mock server options: ${message}`,
    cause,
  });
}

/** Bind/listen failure at open(); the listener's own error is kept as cause */
export function listenError(address: string, cause: unknown): MockServerError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new MockServerError({
    code: "LISTEN_FAILED",
    message: `Mock server failed to listen on ${address}: ${reason}`,
    cause,
  });
}

export function alreadyOpenError(url: string): MockServerError {
  return new MockServerError({
    code: "ALREADY_OPEN",
    message: `Mock server is already open at ${url}`,
  });
}

export function notOpenError(operation: string): MockServerError {
  return new MockServerError({
    code: "NOT_OPEN",
    message: `Mock server is not open (${operation})`,
  });
}

export function multipartParseError(message: string, cause?: unknown): MockServerError {
  return new MockServerError({
    code: "MULTIPART_PARSE_FAILED",
    message,
    httpStatus: 500,
    cause,
  });
}

export function missingFileError(fieldName: string): MockServerError {
  return new MockServerError({
    code: "MISSING_FILE",
    message: `no such file: "${fieldName}"`,
    httpStatus: 500,
  });
}
