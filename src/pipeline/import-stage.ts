import { ImportJob, ImportJobMetadata } from '../models/import-job';
import { RtmImportPoller } from '../integrations/rtm-import-poller';
import { RtmImportSubmitter } from '../integrations/rtm-import-submitter';
import { saveExecutionKey } from '../storage/reference-store';
import { PollTimeoutError, ProtocolError } from '../utils/errors';
import { ContextLogger } from '../utils/logger';

export interface ImportClients {
  submitter: RtmImportSubmitter;
  poller: RtmImportPoller;
}

export interface ImportJobRequest {
  archivePath: string;
  metadata: ImportJobMetadata;
  pollIntervalMs: number;
  deadlineMs: number;
  executionKeyFile: string;
  issueKeyPattern: string;
}

export interface ImportStageResult {
  job: ImportJob;
  executionKey: string;
}

/**
 * Submit, poll to completion, then persist the resulting execution key for
 * later stages. A timed-out poll is a failure here.
 */
export async function runImportStage(
  clients: ImportClients,
  request: ImportJobRequest,
  contextLogger: ContextLogger
): Promise<ImportStageResult> {
  const startedAt = Date.now();
  const submitted = await clients.submitter.submit(request.archivePath, request.metadata);
  const job = await clients.poller.pollUntilTerminal(submitted.jobId, request.pollIntervalMs, request.deadlineMs);

  if (job.status === 'TIMEOUT') {
    throw new PollTimeoutError(job.jobId, Date.now() - startedAt);
  }

  const executionKey = job.resultExecutionKey ?? request.metadata.testExecutionKey;
  if (!executionKey) {
    throw new ProtocolError(`Import job ${job.jobId} finished as ${job.rawStatus} without a testExecutionKey`, JSON.stringify(job));
  }
  if (!job.resultExecutionKey) {
    contextLogger.warn('Import result carries no execution key, keeping the submitted one', { execution_key: executionKey });
  }

  await saveExecutionKey(request.executionKeyFile, executionKey, request.issueKeyPattern);

  contextLogger.info('Import stage completed', {
    job_id: job.jobId,
    execution_key: executionKey,
    duration_ms: Date.now() - startedAt,
  });

  return { job, executionKey };
}
