import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import nock from 'nock';
import { createHttpClient } from '../../src/integrations/http-client';
import { RtmImportPoller } from '../../src/integrations/rtm-import-poller';
import { parseTaskId, RtmImportSubmitter } from '../../src/integrations/rtm-import-submitter';
import { ImportJobMetadata } from '../../src/models/import-job';
import {
  AuthError,
  ImportJobFailedError,
  LocalIOError,
  NotFoundError,
  ProtocolError,
  TransientServiceError,
} from '../../src/utils/errors';

const BASE = 'https://rtm.example.test';
const SUBMIT_PATH = '/api/v2/automation/import-test-results';
const statusPath = (jobId: string) => `/api/v2/automation/import-status/${jobId}`;

const http = createHttpClient({ auth: { kind: 'bearer', token: 'test-secret' }, timeoutMs: 5000 });

const metadata: ImportJobMetadata = {
  projectKey: 'QA',
  reportType: 'JUNIT',
  jobUrl: 'https://ci.example.test/jobs/1',
};

beforeAll(() => {
  nock.disableNetConnect();
});

afterAll(() => {
  nock.enableNetConnect();
});

afterEach(() => {
  nock.cleanAll();
});

describe('parseTaskId', () => {
  test('plain text body is the task id', () => {
    expect(parseTaskId('job-123\n')).toEqual({ kind: 'plain', value: 'job-123' });
  });

  test('JSON string and number bodies are plain ids', () => {
    expect(parseTaskId('"job-9"')).toEqual({ kind: 'plain', value: 'job-9' });
    expect(parseTaskId('42')).toEqual({ kind: 'plain', value: '42' });
  });

  test('numeric bodies keep their exact text', () => {
    expect(parseTaskId('12345678901234567890')).toEqual({ kind: 'plain', value: '12345678901234567890' });
    expect(parseTaskId(' 1e3 \n')).toEqual({ kind: 'plain', value: '1e3' });
  });

  test('reads the first populated id field of an object', () => {
    expect(parseTaskId('{"jobId":"j-7"}')).toEqual({ kind: 'json-field', field: 'jobId', value: 'j-7' });
    expect(parseTaskId('{"taskId":"","id":3}')).toEqual({ kind: 'json-field', field: 'id', value: '3' });
  });

  test('unparseable JSON-looking text falls back to the raw body', () => {
    expect(parseTaskId('{broken')).toEqual({ kind: 'plain', value: '{broken' });
  });

  test.each(['', '   ', '{"other":1}', '[]', 'null'])('rejects %p', body => {
    expect(() => parseTaskId(body)).toThrow(ProtocolError);
  });
});

describe('RtmImportSubmitter', () => {
  let dir: string;
  let archivePath: string;
  const submitter = new RtmImportSubmitter(http, `${BASE}/`);

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'rtm-submit-'));
    archivePath = path.join(dir, 'results.zip');
    await fs.writeFile(archivePath, 'PK placeholder');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test('plain-text response becomes a submitted job', async () => {
    const scope = nock(BASE, { reqheaders: { authorization: 'Bearer test-secret' } })
      .post(SUBMIT_PATH)
      .reply(200, 'job-123');

    const job = await submitter.submit(archivePath, metadata);

    expect(job).toEqual({
      jobId: 'job-123',
      status: 'SUBMITTED',
      rawStatus: 'SUBMITTED',
      progress: 0,
      resultExecutionKey: undefined,
    });
    expect(scope.isDone()).toBe(true);
  });

  test('JSON response is decoded and an existing execution key is carried', async () => {
    nock(BASE).post(SUBMIT_PATH).reply(202, { taskId: 'task-77' });

    const job = await submitter.submit(archivePath, { ...metadata, testExecutionKey: 'QA-12' });

    expect(job.jobId).toBe('task-77');
    expect(job.resultExecutionKey).toBe('QA-12');
  });

  test('401 maps to an auth error', async () => {
    nock(BASE).post(SUBMIT_PATH).reply(401, 'nope');

    const attempt = submitter.submit(archivePath, metadata);
    await expect(attempt).rejects.toBeInstanceOf(AuthError);
    await expect(attempt).rejects.toThrow('Import submission: invalid credentials (401)');
  });

  test('503 is not retried and surfaces as transient', async () => {
    const scope = nock(BASE).post(SUBMIT_PATH).reply(503, 'down');

    await expect(submitter.submit(archivePath, metadata)).rejects.toBeInstanceOf(TransientServiceError);
    expect(scope.isDone()).toBe(true);
  });

  test('missing archive fails before any request', async () => {
    await expect(submitter.submit(path.join(dir, 'nope.zip'), metadata)).rejects.toBeInstanceOf(LocalIOError);
  });
});

describe('RtmImportPoller', () => {
  let clock: number;
  let sleeps: number[];
  let poller: RtmImportPoller;

  beforeEach(() => {
    clock = 0;
    sleeps = [];
    poller = new RtmImportPoller(http, BASE, {
      now: () => clock,
      sleep: async ms => {
        sleeps.push(ms);
        clock += ms;
      },
    });
  });

  test('polls until the job succeeds', async () => {
    nock(BASE)
      .get(statusPath('job-1'))
      .reply(200, { status: 'IMPORTING', progress: 10 })
      .get(statusPath('job-1'))
      .reply(200, { status: 'importing', progress: 60 })
      .get(statusPath('job-1'))
      .reply(200, { status: 'SUCCEEDED', progress: 100, testExecutionKey: 'QA-55' });

    const job = await poller.pollUntilTerminal('job-1', 2000, 60000);

    expect(job).toEqual({
      jobId: 'job-1',
      status: 'SUCCEEDED',
      rawStatus: 'SUCCEEDED',
      progress: 100,
      resultExecutionKey: 'QA-55',
    });
    expect(sleeps).toEqual([2000, 2000]);
  });

  test('returns TIMEOUT with the last seen state once the deadline passes', async () => {
    const scope = nock(BASE).get(statusPath('job-2')).times(3).reply(200, { status: 'IMPORTING', progress: 40 });

    const job = await poller.pollUntilTerminal('job-2', 2000, 5000);

    expect(job.status).toBe('TIMEOUT');
    expect(job.rawStatus).toBe('IMPORTING');
    expect(job.progress).toBe(40);
    expect(sleeps).toEqual([2000, 2000, 1000]);
    expect(scope.isDone()).toBe(true);
  });

  test('FAILED throws ImportJobFailedError', async () => {
    nock(BASE).get(statusPath('job-3')).reply(200, { status: 'FAILED' });

    await expect(poller.pollUntilTerminal('job-3', 2000, 60000)).rejects.toThrow(
      new ImportJobFailedError('job-3', 'FAILED')
    );
  });

  test('ERROR throws ImportJobFailedError as well', async () => {
    nock(BASE).get(statusPath('job-8')).reply(200, { status: 'ERROR', progress: 30 });

    const attempt = poller.pollUntilTerminal('job-8', 2000, 60000);
    await expect(attempt).rejects.toBeInstanceOf(ImportJobFailedError);
    await expect(attempt).rejects.toThrow('Import job job-8 ended with status ERROR');
  });

  test('a transient 503 is waited out', async () => {
    nock(BASE)
      .get(statusPath('job-4'))
      .reply(503, 'busy')
      .get(statusPath('job-4'))
      .reply(200, { status: 'SUCCEEDED', testExecutionKey: 'QA-8' });

    const job = await poller.pollUntilTerminal('job-4', 2000, 60000);

    expect(job.status).toBe('SUCCEEDED');
    expect(job.progress).toBe(0);
    expect(sleeps).toEqual([2000]);
  });

  test('404 on the status endpoint is fatal', async () => {
    nock(BASE).get(statusPath('job-5')).reply(404, 'gone');

    const attempt = poller.pollUntilTerminal('job-5', 2000, 60000);
    await expect(attempt).rejects.toBeInstanceOf(NotFoundError);
    await expect(attempt).rejects.toThrow('Import status check: resource not found (404)');
  });

  test('a body without status is a protocol error', async () => {
    nock(BASE).get(statusPath('job-6')).reply(200, { progress: 10 });

    await expect(poller.pollUntilTerminal('job-6', 2000, 60000)).rejects.toBeInstanceOf(ProtocolError);
  });

  test('unknown statuses are terminal and progress is clamped', async () => {
    nock(BASE).get(statusPath('job-7')).reply(200, { status: 'Paused', progress: 150 });

    const job = await poller.pollUntilTerminal('job-7', 2000, 60000);

    expect(job.status).toBe('UNKNOWN');
    expect(job.rawStatus).toBe('Paused');
    expect(job.progress).toBe(100);
    expect(sleeps).toEqual([]);
  });
});

describe('RtmImportPoller deadline timer', () => {
  const realPoller = new RtmImportPoller(http, BASE);

  test('the deadline aborts a status request that is still in flight', async () => {
    nock(BASE).get(statusPath('slow-1')).delay(2000).reply(200, { status: 'SUCCEEDED', testExecutionKey: 'QA-1' });

    const startedAt = Date.now();
    const job = await realPoller.pollUntilTerminal('slow-1', 50, 100);

    expect(job.status).toBe('TIMEOUT');
    expect(job.rawStatus).toBe('SUBMITTED');
    expect(Date.now() - startedAt).toBeLessThan(1500);
  });

  test('a deadline beyond the timer limit does not expire early', async () => {
    nock(BASE).get(statusPath('long-1')).delay(200).reply(200, { status: 'SUCCEEDED', testExecutionKey: 'QA-2' });

    const job = await realPoller.pollUntilTerminal('long-1', 100, 3_000_000_000);

    expect(job.status).toBe('SUCCEEDED');
    expect(job.resultExecutionKey).toBe('QA-2');
  });
});
