import path from 'path';
import { openAsBlob } from 'fs';
import axios, { AxiosInstance } from 'axios';
import { UploadOutcome, UploadTarget } from '../models/upload';
import { fileExists } from '../storage/file-storage';
import { LocalIOError } from '../utils/errors';
import { bodyAsText, isRecord, truncateBody, tryParseJson } from '../utils/http-body';
import { classifyStatus, retryWithBackoff, Sleeper } from '../utils/retry-handler';
import { createContextLogger } from '../utils/logger';
import { describeRequestError } from './http-client';

export interface UploadEngineOptions {
  backoffScheduleMs: readonly number[];
  sleep?: Sleeper;
}

const FATAL_REASONS: Record<number, string> = {
  401: 'invalid credentials',
  403: 'no permission to upload attachments',
  404: 'target resource not found or not accessible',
  413: 'file exceeds the attachment size limit',
};

/** Jira answers with an attachment array, Confluence with `results`, others with `id`. */
export function extractRemoteId(body: string): string | null {
  const parsed = tryParseJson(body);
  if (!parsed.ok) {
    return null;
  }

  let first: unknown = parsed.value;
  if (Array.isArray(first)) {
    first = first[0];
  } else if (isRecord(first) && Array.isArray(first.results)) {
    first = first.results[0];
  }

  if (isRecord(first) && (typeof first.id === 'string' || typeof first.id === 'number')) {
    return String(first.id);
  }
  return null;
}

/**
 * Uploads one local file as multipart field `file`, retrying transient
 * failures on the configured backoff schedule. Retried uploads are not
 * deduplicated; the receiving service must tolerate duplicates.
 */
export class UploadRetryEngine {
  constructor(
    private readonly http: AxiosInstance,
    private readonly options: UploadEngineOptions
  ) {}

  async upload(target: UploadTarget, maxAttempts: number): Promise<UploadOutcome> {
    if (!(await fileExists(target.filePath))) {
      throw new LocalIOError(`File not found: ${target.filePath}`, target.filePath);
    }

    const fileName = path.basename(target.filePath);
    const contextLogger = createContextLogger({ step: 'upload', file_name: fileName, url: target.url });

    contextLogger.info('Uploading attachment', { content_type: target.contentType, max_attempts: maxAttempts });

    const { result } = await retryWithBackoff((attempt) => this.attempt(target, fileName, attempt), {
      maxAttempts,
      schedule: this.options.backoffScheduleMs,
      shouldRetry: (outcome) => outcome.kind === 'retryable',
      sleep: this.options.sleep,
      onRetry: (attempt, delayMs, outcome) => {
        contextLogger.warn(`Attempt ${attempt}/${maxAttempts} failed, retrying in ${delayMs}ms`, {
          status_code: outcome.statusCode,
          ...(outcome.kind !== 'success' && { message: outcome.message }),
        });
      },
    });

    switch (result.kind) {
      case 'success':
        contextLogger.info('Attachment uploaded', {
          status_code: result.statusCode,
          remote_id: result.remoteId,
          attempts: result.attempts,
        });
        break;
      case 'retryable':
        contextLogger.error('Attachment upload failed permanently, retries exhausted', {
          status_code: result.statusCode,
          attempts: result.attempts,
          message: result.message,
          response: truncateBody(result.body),
        });
        break;
      case 'fatal':
        contextLogger.error('Attachment upload rejected', {
          status_code: result.statusCode,
          message: result.message,
          response: truncateBody(result.body),
        });
        break;
    }

    return result;
  }

  private async attempt(target: UploadTarget, fileName: string, attempt: number): Promise<UploadOutcome> {
    // A fresh body per attempt: the previous stream has been consumed.
    const form = new FormData();
    form.append('file', await openAsBlob(target.filePath, { type: target.contentType }), fileName);

    let statusCode: number;
    let body: string;
    try {
      const response = await this.http.post<string>(target.url, form, {
        headers: { 'X-Atlassian-Token': 'no-check' },
        responseType: 'text',
      });
      statusCode = response.status;
      body = bodyAsText(response.data);
    } catch (error) {
      if (!axios.isAxiosError(error)) {
        throw error;
      }
      return {
        kind: 'retryable',
        statusCode: null,
        message: `Transport error: ${describeRequestError(error)}`,
        body: '',
        attempts: attempt,
      };
    }

    switch (classifyStatus(statusCode, target.successStatuses)) {
      case 'success':
        return { kind: 'success', statusCode, remoteId: extractRemoteId(body), attempts: attempt };
      case 'retryable':
        return { kind: 'retryable', statusCode, message: `HTTP ${statusCode}`, body, attempts: attempt };
      case 'fatal':
        return {
          kind: 'fatal',
          statusCode,
          message: `HTTP ${statusCode}: ${FATAL_REASONS[statusCode] ?? 'unexpected response'}`,
          body,
          attempts: attempt,
        };
    }
  }
}
