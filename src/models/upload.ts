export interface UploadTarget {
  readonly url: string;
  readonly filePath: string;
  readonly contentType: string;
  readonly successStatuses: readonly number[];
}

export interface UploadSuccess {
  kind: 'success';
  statusCode: number;
  remoteId: string | null;
  attempts: number;
}

export interface UploadRetryableFailure {
  kind: 'retryable';
  /** null when the request never produced a response. */
  statusCode: number | null;
  message: string;
  body: string;
  attempts: number;
}

export interface UploadFatalFailure {
  kind: 'fatal';
  statusCode: number;
  message: string;
  body: string;
  attempts: number;
}

export type UploadOutcome = UploadSuccess | UploadRetryableFailure | UploadFatalFailure;

export interface UploadedArtifact {
  fileName: string;
  filePath: string;
  remoteId: string | null;
}

const CONTENT_TYPES: Record<string, string> = {
  '.html': 'text/html; charset=utf-8',
  '.htm': 'text/html; charset=utf-8',
  '.pdf': 'application/pdf',
  '.zip': 'application/zip',
  '.xml': 'application/xml',
  '.json': 'application/json',
  '.txt': 'text/plain; charset=utf-8',
};

export function contentTypeFor(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  const extension = dot >= 0 ? fileName.slice(dot).toLowerCase() : '';
  return CONTENT_TYPES[extension] || 'application/octet-stream';
}
