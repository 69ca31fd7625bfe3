import type { UploadOutcome } from '../models/upload';

export class PipelineError extends Error {
  statusCode?: number;
  responseBody?: string;

  constructor(message: string, statusCode?: number, responseBody?: string) {
    super(message);
    this.name = 'PipelineError';
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

/** A local input file is missing or unreadable. Never retried. */
export class LocalIOError extends PipelineError {
  filePath: string;

  constructor(message: string, filePath: string) {
    super(message);
    this.name = 'LocalIOError';
    this.filePath = filePath;
  }
}

export class AuthError extends PipelineError {
  constructor(message: string, statusCode: number, responseBody?: string) {
    super(message, statusCode, responseBody);
    this.name = 'AuthError';
  }
}

export class NotFoundError extends PipelineError {
  constructor(message: string, responseBody?: string) {
    super(message, 404, responseBody);
    this.name = 'NotFoundError';
  }
}

export class PayloadTooLargeError extends PipelineError {
  constructor(message: string, responseBody?: string) {
    super(message, 413, responseBody);
    this.name = 'PayloadTooLargeError';
  }
}

/** 408/429/5xx or a transport failure that outlived its retry budget. */
export class TransientServiceError extends PipelineError {
  constructor(message: string, statusCode?: number, responseBody?: string) {
    super(message, statusCode, responseBody);
    this.name = 'TransientServiceError';
  }
}

export class UnexpectedStatusError extends PipelineError {
  constructor(message: string, statusCode: number, responseBody?: string) {
    super(message, statusCode, responseBody);
    this.name = 'UnexpectedStatusError';
  }
}

export class ProtocolError extends PipelineError {
  constructor(message: string, responseBody?: string) {
    super(message, undefined, responseBody);
    this.name = 'ProtocolError';
  }
}

/** Client-side deadline expired; the remote job may still be running. */
export class PollTimeoutError extends PipelineError {
  jobId: string;
  elapsedMs: number;

  constructor(jobId: string, elapsedMs: number) {
    super(`Import job ${jobId} did not finish within ${elapsedMs}ms`);
    this.name = 'PollTimeoutError';
    this.jobId = jobId;
    this.elapsedMs = elapsedMs;
  }
}

export class ImportJobFailedError extends PipelineError {
  jobId: string;
  status: string;

  constructor(jobId: string, status: string, responseBody?: string) {
    super(`Import job ${jobId} ended with status ${status}`, undefined, responseBody);
    this.name = 'ImportJobFailedError';
    this.jobId = jobId;
    this.status = status;
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function errorForStatus(statusCode: number, body: string, context: string): PipelineError {
  switch (statusCode) {
    case 401:
      return new AuthError(`${context}: invalid credentials (401)`, statusCode, body);
    case 403:
      return new AuthError(`${context}: permission denied (403)`, statusCode, body);
    case 404:
      return new NotFoundError(`${context}: resource not found (404)`, body);
    case 413:
      return new PayloadTooLargeError(`${context}: payload too large (413)`, body);
    case 408:
    case 429:
    case 500:
    case 502:
    case 503:
    case 504:
      return new TransientServiceError(`${context}: service unavailable (${statusCode})`, statusCode, body);
    default:
      return new UnexpectedStatusError(`${context}: unexpected status ${statusCode}`, statusCode, body);
  }
}

export function errorForOutcome(outcome: UploadOutcome, fileName: string): PipelineError | null {
  switch (outcome.kind) {
    case 'success':
      return null;
    case 'retryable':
      return new TransientServiceError(
        `Upload of ${fileName} failed after ${outcome.attempts} attempts: ${outcome.message}`,
        outcome.statusCode ?? undefined,
        outcome.body
      );
    case 'fatal':
      return errorForStatus(outcome.statusCode, outcome.body, `Upload of ${fileName}`);
  }
}
