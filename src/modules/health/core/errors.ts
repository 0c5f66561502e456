/**
 * Health Module - Domain Errors
 *
 * Error types for the health reporter and the health client.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Reporter Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A caller-supplied provider (readiness checks or metrics) failed.
 */
export interface ProviderError {
  readonly type: 'ProviderError';
  readonly provider: 'checks' | 'metrics';
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * A reporter could not produce its answer (used by custom reporters).
 */
export interface ReportFailedError {
  readonly type: 'ReportFailedError';
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Union of all health reporter errors.
 */
export type HealthReporterError = ProviderError | ReportFailedError;

// ─────────────────────────────────────────────────────────────────────────────
// Client Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Base URL given to the client could not be used.
 */
export interface InvalidBaseUrlError {
  readonly type: 'InvalidBaseUrlError';
  readonly message: string;
  readonly baseUrl: string;
  readonly cause?: unknown;
}

/**
 * Timeout given to the client cannot be used as a timer delay.
 */
export interface InvalidTimeoutError {
  readonly type: 'InvalidTimeoutError';
  readonly message: string;
  readonly timeoutMs: number;
}

/**
 * The request could not be sent or the response could not be read.
 */
export interface NetworkError {
  readonly type: 'NetworkError';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

/**
 * The client timeout expired before the response arrived.
 */
export interface TimeoutError {
  readonly type: 'TimeoutError';
  readonly message: string;
  readonly timeoutMs: number;
  readonly retryable: boolean;
}

/**
 * The caller aborted the request through its signal.
 */
export interface RequestAbortedError {
  readonly type: 'RequestAbortedError';
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * The server answered with a status code the endpoint does not accept.
 */
export interface UnexpectedStatusError {
  readonly type: 'UnexpectedStatusError';
  readonly message: string;
  readonly statusCode: number;
  readonly body: string;
}

/**
 * The response body is not valid JSON or does not match the expected shape.
 */
export interface DecodeError {
  readonly type: 'DecodeError';
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Errors returned when building a client.
 */
export type HealthClientConfigError = InvalidBaseUrlError | InvalidTimeoutError;

/**
 * Union of all health client errors.
 */
export type HealthClientError =
  | InvalidBaseUrlError
  | InvalidTimeoutError
  | NetworkError
  | TimeoutError
  | RequestAbortedError
  | UnexpectedStatusError
  | DecodeError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

const messageOf = (cause: unknown, fallback: string): string =>
  cause instanceof Error ? cause.message : typeof cause === 'string' ? cause : fallback;

/**
 * Create a provider error. The provider's own message is kept as is.
 */
export const createProviderError = (
  provider: ProviderError['provider'],
  cause: unknown
): ProviderError => ({
  type: 'ProviderError',
  provider,
  message: messageOf(cause, `${provider} provider failed`),
  cause,
});

export const createReportFailedError = (cause: unknown): ReportFailedError => ({
  type: 'ReportFailedError',
  message: messageOf(cause, 'report failed'),
  cause,
});

export const createInvalidBaseUrlError = (
  baseUrl: string,
  cause?: unknown
): InvalidBaseUrlError => ({
  type: 'InvalidBaseUrlError',
  message: `invalid base URL: ${baseUrl}`,
  baseUrl,
  cause,
});

export const createInvalidTimeoutError = (timeoutMs: number): InvalidTimeoutError => ({
  type: 'InvalidTimeoutError',
  message: `invalid timeout: ${String(timeoutMs)}ms`,
  timeoutMs,
});

export const createNetworkError = (cause: unknown): NetworkError => ({
  type: 'NetworkError',
  message: `executing request: ${messageOf(cause, 'unknown network error')}`,
  retryable: true,
  cause,
});

export const createTimeoutError = (timeoutMs: number): TimeoutError => ({
  type: 'TimeoutError',
  message: `request timed out after ${String(timeoutMs)}ms`,
  timeoutMs,
  retryable: true,
});

export const createRequestAbortedError = (cause?: unknown): RequestAbortedError => ({
  type: 'RequestAbortedError',
  message: 'request aborted by caller',
  cause,
});

export const createUnexpectedStatusError = (
  statusCode: number,
  body: string
): UnexpectedStatusError => ({
  type: 'UnexpectedStatusError',
  message: `unexpected status code ${String(statusCode)}: ${body}`,
  statusCode,
  body,
});

export const createDecodeError = (detail: string, cause?: unknown): DecodeError => ({
  type: 'DecodeError',
  message: `decoding response: ${detail}`,
  cause,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Maps reporter error types to HTTP status codes.
 */
export const HEALTH_REPORTER_ERROR_HTTP_STATUS: Record<HealthReporterError['type'], number> = {
  ProviderError: 500,
  ReportFailedError: 500,
};

/**
 * Get HTTP status code for a health reporter error.
 */
export const getHttpStatusForError = (error: HealthReporterError): number => {
  return HEALTH_REPORTER_ERROR_HTTP_STATUS[error.type];
};
