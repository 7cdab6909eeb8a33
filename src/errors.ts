export class LoadTestError extends Error {
  code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'LoadTestError';
    this.code = code;
  }
}

export class ValidationError extends LoadTestError {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class SetupError extends LoadTestError {
  constructor(message: string) {
    super(message, 'SETUP_ERROR');
    this.name = 'SetupError';
  }
}

/** Non-2xx response from the completion endpoint. */
export class HttpStatusError extends LoadTestError {
  statusCode: number;
  body: string;

  constructor(statusCode: number, body: string, code: string) {
    super(`HTTP ${statusCode}: ${body.slice(0, 200)}`, code);
    this.name = 'HttpStatusError';
    this.statusCode = statusCode;
    this.body = body;
  }
}

export class ClientError extends HttpStatusError {
  constructor(statusCode: number, body: string) {
    super(statusCode, body, 'HTTP_4XX');
    this.name = 'ClientError';
  }
}

export class ServerError extends HttpStatusError {
  constructor(statusCode: number, body: string) {
    super(statusCode, body, 'HTTP_5XX');
    this.name = 'ServerError';
  }
}

export class RequestTimeoutError extends LoadTestError {
  timeoutMs: number;

  constructor(timeoutMs: number) {
    super('Request timeout', 'TIMEOUT');
    this.name = 'RequestTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class TransportError extends LoadTestError {
  constructor(message: string) {
    super(message.slice(0, 200), 'TRANSPORT');
    this.name = 'TransportError';
  }
}

export type AttemptFailure = HttpStatusError | RequestTimeoutError | TransportError;

export class RetriesExhaustedError extends LoadTestError {
  attempts: number;
  override cause: AttemptFailure;

  constructor(cause: AttemptFailure, attempts: number) {
    super(cause.message, 'RETRIES_EXHAUSTED');
    this.name = 'RetriesExhaustedError';
    this.cause = cause;
    this.attempts = attempts;
  }
}

function errorName(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
    return error.name;
  }
  return undefined;
}

/**
 * Maps whatever a fetch call rejected with onto the attempt failure taxonomy.
 * Errors already classified by the client pass through untouched.
 */
export function classifyFailure(error: unknown, timeoutMs: number): AttemptFailure {
  if (error instanceof HttpStatusError || error instanceof RequestTimeoutError || error instanceof TransportError) {
    return error;
  }

  const name = errorName(error);
  if (name === 'TimeoutError' || name === 'AbortError') {
    return new RequestTimeoutError(timeoutMs);
  }

  if (error instanceof Error) {
    // undici reports network failures as "fetch failed" with the socket error as cause
    const cause = error.cause instanceof Error ? error.cause.message : undefined;
    return new TransportError(cause ? `${error.message} (${cause})` : error.message);
  }

  return new TransportError(String(error));
}
