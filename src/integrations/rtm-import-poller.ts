import axios, { AxiosInstance } from 'axios';
import Joi from 'joi';
import { ImportJob, isFailure, isInProgress, normalizeJobStatus } from '../models/import-job';
import { ImportJobFailedError, ProtocolError, errorForStatus } from '../utils/errors';
import { bodyAsText, truncateBody } from '../utils/http-body';
import { classifyStatus, MAX_TIMER_DELAY_MS, sleep, Sleeper } from '../utils/retry-handler';
import { ContextLogger, createContextLogger } from '../utils/logger';
import { describeRequestError, joinUrl } from './http-client';
import { RTM_AUTOMATION_PATH } from './rtm-import-submitter';

interface ImportStatusPayload {
  status: string;
  progress?: number | null;
  testExecutionKey?: string | null;
}

const importStatusSchema = Joi.object<ImportStatusPayload>({
  status: Joi.string().trim().min(1).required(),
  progress: Joi.number().allow(null).optional(),
  testExecutionKey: Joi.string().allow(null, '').optional(),
}).unknown(true);

export interface ImportPollerOptions {
  sleep?: Sleeper;
  now?: () => number;
}

const SUCCESS_STATUSES = [200];

export class RtmImportPoller {
  private readonly sleep: Sleeper;
  private readonly now: () => number;

  constructor(
    private readonly http: AxiosInstance,
    private readonly baseUrl: string,
    options: ImportPollerOptions = {}
  ) {
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * Polls one job, strictly sequentially, until the server reports a terminal
   * status or `deadlineMs` elapses. FAILED and ERROR throw
   * `ImportJobFailedError`; an expired deadline returns the last seen job with
   * status TIMEOUT and leaves the decision to the caller.
   */
  async pollUntilTerminal(jobId: string, pollIntervalMs: number, deadlineMs: number): Promise<ImportJob> {
    const contextLogger = createContextLogger({ step: 'import-poll', job_id: jobId });
    const url = joinUrl(this.baseUrl, `${RTM_AUTOMATION_PATH}/import-status/${encodeURIComponent(jobId)}`);

    const controller = new AbortController();
    // Past the timer limit only the elapsed-clock checks enforce the deadline.
    const deadlineTimer =
      deadlineMs <= MAX_TIMER_DELAY_MS ? setTimeout(() => controller.abort(), deadlineMs) : undefined;
    deadlineTimer?.unref();

    const startedAt = this.now();
    const elapsed = () => this.now() - startedAt;
    let last: ImportJob = { jobId, status: 'SUBMITTED', rawStatus: 'SUBMITTED', progress: 0 };

    try {
      for (let tick = 1; ; tick++) {
        if (controller.signal.aborted || elapsed() >= deadlineMs) {
          return this.timedOut(last, elapsed(), contextLogger);
        }

        const job = await this.fetchStatus(jobId, url, controller.signal, contextLogger);

        if (job) {
          last = job;
          contextLogger.info('Import status', { tick, status: job.rawStatus, progress: job.progress });

          if (isFailure(job.status)) {
            throw new ImportJobFailedError(jobId, job.rawStatus, JSON.stringify(job));
          }
          if (!isInProgress(job.status)) {
            if (job.status === 'UNKNOWN') {
              contextLogger.warn('Unrecognised import status treated as terminal', { status: job.rawStatus });
            }
            contextLogger.info('Import job finished', {
              status: job.rawStatus,
              execution_key: job.resultExecutionKey,
              duration_ms: elapsed(),
            });
            return job;
          }
        }

        const remaining = deadlineMs - elapsed();
        if (remaining <= 0) {
          return this.timedOut(last, elapsed(), contextLogger);
        }

        try {
          await this.sleep(Math.min(pollIntervalMs, remaining, MAX_TIMER_DELAY_MS), controller.signal);
        } catch (error) {
          if (controller.signal.aborted) {
            return this.timedOut(last, elapsed(), contextLogger);
          }
          throw error;
        }
      }
    } finally {
      clearTimeout(deadlineTimer);
    }
  }

  /** Returns null for a transient failure, which the caller waits out. */
  private async fetchStatus(
    jobId: string,
    url: string,
    signal: AbortSignal,
    contextLogger: ContextLogger
  ): Promise<ImportJob | null> {
    let statusCode: number;
    let data: unknown;
    try {
      const response = await this.http.get<unknown>(url, { signal });
      statusCode = response.status;
      data = response.data;
    } catch (error) {
      if (signal.aborted) {
        return null;
      }
      if (!axios.isAxiosError(error)) {
        throw error;
      }
      contextLogger.warn('Import status request failed, will retry', { error: describeRequestError(error) });
      return null;
    }

    const statusClass = classifyStatus(statusCode, SUCCESS_STATUSES);
    if (statusClass === 'retryable') {
      contextLogger.warn('Import status temporarily unavailable, will retry', { status_code: statusCode });
      return null;
    }
    if (statusClass === 'fatal') {
      throw errorForStatus(statusCode, bodyAsText(data), 'Import status check');
    }

    const { error, value } = importStatusSchema.validate(data);
    if (error || !value) {
      throw new ProtocolError(
        `Unrecognised import status response: ${error ? error.message : 'empty body'}`,
        truncateBody(bodyAsText(data))
      );
    }

    const progress = typeof value.progress === 'number' ? Math.min(100, Math.max(0, value.progress)) : 0;

    return {
      jobId,
      status: normalizeJobStatus(value.status),
      rawStatus: value.status,
      progress,
      resultExecutionKey: value.testExecutionKey || undefined,
    };
  }

  private timedOut(last: ImportJob, elapsedMs: number, contextLogger: ContextLogger): ImportJob {
    contextLogger.error('Import polling deadline exceeded, job may still be running remotely', {
      last_status: last.rawStatus,
      progress: last.progress,
      duration_ms: elapsedMs,
    });
    return { ...last, status: 'TIMEOUT' };
  }
}
