import path from 'path';
import { openAsBlob } from 'fs';
import axios, { AxiosInstance } from 'axios';
import { ImportJob, ImportJobMetadata, ParsedTaskId } from '../models/import-job';
import { fileExists } from '../storage/file-storage';
import { LocalIOError, ProtocolError, TransientServiceError, errorForStatus } from '../utils/errors';
import { bodyAsText, isRecord, truncateBody, tryParseJson } from '../utils/http-body';
import logger, { createContextLogger } from '../utils/logger';
import { describeRequestError, joinUrl } from './http-client';

export const RTM_AUTOMATION_PATH = 'api/v2/automation';

const TASK_ID_FIELDS = ['taskId', 'jobId', 'id', 'task_id'] as const;

/**
 * Reads the task identifier from a submit response. Structured decoding is
 * tried first; a body that is not JSON is taken verbatim as the identifier.
 */
export function parseTaskId(rawBody: string): ParsedTaskId {
  const body = rawBody.trim();
  if (!body) {
    throw new ProtocolError('Import submission returned an empty body', rawBody);
  }

  const parsed = tryParseJson(body);

  if (!parsed.ok) {
    if (body.startsWith('{') || body.startsWith('[') || body.startsWith('"')) {
      logger.warn('Submit response looks like JSON but does not parse, using raw body as task id', {
        parse_error: parsed.error,
        body: truncateBody(body, 200),
      });
    }
    return { kind: 'plain', value: body };
  }

  const value = parsed.value;

  // Numeric bodies are kept verbatim, never round-tripped through Number.
  if (typeof value === 'number') {
    return { kind: 'plain', value: body };
  }

  if (typeof value === 'string') {
    const id = value.trim();
    if (!id) {
      throw new ProtocolError('Import submission returned an empty task id', rawBody);
    }
    return { kind: 'plain', value: id };
  }

  if (isRecord(value)) {
    for (const field of TASK_ID_FIELDS) {
      const candidate = value[field];
      if ((typeof candidate === 'string' && candidate.trim()) || typeof candidate === 'number') {
        return { kind: 'json-field', field, value: String(candidate).trim() };
      }
    }
  }

  throw new ProtocolError('Import submission response carries no task id', rawBody);
}

/**
 * Submits a results archive for asynchronous import. Never retried here: a
 * blind resubmission can create a second import job.
 */
export class RtmImportSubmitter {
  constructor(
    private readonly http: AxiosInstance,
    private readonly baseUrl: string
  ) {}

  async submit(archivePath: string, metadata: ImportJobMetadata): Promise<ImportJob> {
    const contextLogger = createContextLogger({
      step: 'import-submit',
      project_key: metadata.projectKey,
      archive: path.basename(archivePath),
    });

    if (!(await fileExists(archivePath))) {
      throw new LocalIOError(`Archive not found: ${archivePath}`, archivePath);
    }

    const url = joinUrl(this.baseUrl, `${RTM_AUTOMATION_PATH}/import-test-results`);

    const form = new FormData();
    form.append('file', await openAsBlob(archivePath, { type: 'application/zip' }), path.basename(archivePath));
    form.append('projectKey', metadata.projectKey);
    form.append('reportType', metadata.reportType);
    form.append('jobUrl', metadata.jobUrl);
    if (metadata.testExecutionKey) {
      form.append('testExecutionKey', metadata.testExecutionKey);
    }

    contextLogger.info('Submitting import job', { url, report_type: metadata.reportType });

    let statusCode: number;
    let body: string;
    try {
      const response = await this.http.post<string>(url, form, { responseType: 'text' });
      statusCode = response.status;
      body = bodyAsText(response.data);
    } catch (error) {
      if (!axios.isAxiosError(error)) {
        throw error;
      }
      throw new TransientServiceError(`Import submission failed: ${describeRequestError(error)}`);
    }

    if (statusCode < 200 || statusCode >= 300) {
      contextLogger.error('Import submission rejected', { status_code: statusCode, response: truncateBody(body) });
      throw errorForStatus(statusCode, body, 'Import submission');
    }

    const taskId = parseTaskId(body);

    contextLogger.info('Import job submitted', {
      job_id: taskId.value,
      id_source: taskId.kind === 'json-field' ? `json:${taskId.field}` : 'plain',
    });

    return {
      jobId: taskId.value,
      status: 'SUBMITTED',
      rawStatus: 'SUBMITTED',
      progress: 0,
      resultExecutionKey: metadata.testExecutionKey,
    };
  }
}
