export class CircuitJobsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CircuitJobsError';
  }
}

export class ConfigError extends CircuitJobsError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * A remote call answered with anything other than its expected status code.
 * The message is the formatted server error body, e.g. `500 (E1): boom`.
 */
export class RequestFailedError extends CircuitJobsError {
  readonly operation: string;
  readonly statusCode: number;

  constructor(message: string, operation: string, statusCode: number) {
    super(message);
    this.name = 'RequestFailedError';
    this.operation = operation;
    this.statusCode = statusCode;
  }
}

export class ResponseParseError extends CircuitJobsError {
  constructor(message: string) {
    super(message);
    this.name = 'ResponseParseError';
  }
}

export class InvalidJobOperationError extends CircuitJobsError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidJobOperationError';
  }
}

export class JobNotCompletedError extends CircuitJobsError {
  constructor(message: string) {
    super(message);
    this.name = 'JobNotCompletedError';
  }
}

export class JobFailedError extends CircuitJobsError {
  readonly jobId: string;
  readonly status: string;

  constructor(jobId: string, status: string) {
    super(`Job ${jobId} finished with status ${status}`);
    this.name = 'JobFailedError';
    this.jobId = jobId;
    this.status = status;
  }
}

export class NotImplementedError extends CircuitJobsError {
  constructor(message = 'This feature is not yet implemented') {
    super(message);
    this.name = 'NotImplementedError';
  }
}

export class TransportError extends CircuitJobsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class RequestTimeoutError extends TransportError {
  constructor(url: string, timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

export class NpyDecodeError extends CircuitJobsError {
  constructor(message: string) {
    super(message);
    this.name = 'NpyDecodeError';
  }
}

export class CircuitError extends CircuitJobsError {
  constructor(message: string) {
    super(message);
    this.name = 'CircuitError';
  }
}

export class CliUsageError extends CircuitJobsError {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}
