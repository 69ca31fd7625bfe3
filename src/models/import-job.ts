export type ServerJobStatus = 'SUBMITTED' | 'IMPORTING' | 'SUCCEEDED' | 'FAILED' | 'ERROR';

/**
 * `UNKNOWN` covers any status string the server reports outside the known set.
 * `TIMEOUT` is never reported by the server; the poller sets it when its
 * deadline expires.
 */
export type ImportJobStatus = ServerJobStatus | 'UNKNOWN' | 'TIMEOUT';

export interface ImportJob {
  jobId: string;
  status: ImportJobStatus;
  rawStatus: string;
  progress: number;
  resultExecutionKey?: string;
}

export interface ImportJobMetadata {
  projectKey: string;
  reportType: string;
  jobUrl: string;
  testExecutionKey?: string;
}

export type ParsedTaskId =
  | { kind: 'plain'; value: string }
  | { kind: 'json-field'; field: string; value: string };

const SERVER_STATUSES: readonly ServerJobStatus[] = ['SUBMITTED', 'IMPORTING', 'SUCCEEDED', 'FAILED', 'ERROR'];

export function normalizeJobStatus(raw: string): ImportJobStatus {
  const upper = raw.trim().toUpperCase();
  const known = SERVER_STATUSES.find(status => status === upper);
  return known ?? 'UNKNOWN';
}

export function isInProgress(status: ImportJobStatus): boolean {
  return status === 'SUBMITTED' || status === 'IMPORTING';
}

export function isFailure(status: ImportJobStatus): boolean {
  return status === 'FAILED' || status === 'ERROR';
}
