import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import nock from 'nock';
import { createHttpClient } from '../../src/integrations/http-client';
import { RtmImportPoller } from '../../src/integrations/rtm-import-poller';
import { RtmImportSubmitter } from '../../src/integrations/rtm-import-submitter';
import { UploadRetryEngine } from '../../src/integrations/upload-engine';
import { UploadedArtifact } from '../../src/models/upload';
import {
  artifactPath,
  PreparedDestination,
  PublishContext,
  PublishDestination,
  PublishPipeline,
  PublishRequest,
} from '../../src/pipeline/publish-pipeline';
import { FileVersionStore } from '../../src/storage/version-store';
import { AuthError, ConfigurationError, LocalIOError } from '../../src/utils/errors';

const BASE = 'https://attach.example.test';
const PUBLISHED_URL = 'https://pages.example.test/reports/1';
const RTM_BASE = 'https://rtm.example.test';

class RecordingDestination implements PublishDestination {
  readonly name = 'recording';
  readonly prepared: PublishContext[] = [];
  readonly finalized: UploadedArtifact[][] = [];

  constructor(readonly urlFile: string) {}

  async prepare(context: PublishContext): Promise<PreparedDestination> {
    this.prepared.push(context);
    return {
      attachmentUrl: `${BASE}/upload`,
      successStatuses: [200],
      finalize: async uploaded => {
        this.finalized.push(uploaded);
        return PUBLISHED_URL;
      },
    };
  }
}

describe('artifactPath', () => {
  test('joins base name, version and extension', () => {
    expect(artifactPath('report', 'test_result_report', 3, 'pdf')).toBe(path.join('report', 'test_result_report_v3.pdf'));
  });
});

describe('PublishPipeline', () => {
  let dir: string;
  let reportDir: string;
  let destination: RecordingDestination;
  let versionStore: FileVersionStore;
  let uploadEngine: UploadRetryEngine;
  let request: PublishRequest;

  const writeArtifacts = async (version: number, extensions: string[]) => {
    for (const extension of extensions) {
      await fs.writeFile(artifactPath(reportDir, 'report', version, extension), `artifact ${extension}`);
    }
  };

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'publish-pipeline-'));
    reportDir = path.join(dir, 'report');
    await fs.mkdir(reportDir);
    await fs.writeFile(path.join(reportDir, 'output.txt'), '5 passed in 0.4s');

    destination = new RecordingDestination(path.join(reportDir, 'published_url.txt'));
    versionStore = new FileVersionStore(path.join(reportDir, 'version.txt'));
    const http = createHttpClient({ auth: { kind: 'basic', username: 'ci-bot', password: 'test-secret' }, timeoutMs: 5000 });
    uploadEngine = new UploadRetryEngine(http, { backoffScheduleMs: [1], sleep: async () => undefined });

    request = {
      versionMode: 'allocate',
      reportDir,
      baseName: 'report',
      extensions: ['pdf', 'html'],
      testLogFile: path.join(reportDir, 'output.txt'),
      maxUploadAttempts: 3,
    };
  });

  afterEach(async () => {
    nock.cleanAll();
    await fs.rm(dir, { recursive: true, force: true });
  });

  test('allocates a version, uploads every artifact and saves the published URL', async () => {
    await writeArtifacts(1, ['pdf', 'html']);
    nock(BASE).post('/upload').reply(200, [{ id: 'a-1' }]).post('/upload').reply(200, [{ id: 'a-2' }]);

    const pipeline = new PublishPipeline({ versionStore, uploadEngine, destination });
    const result = await pipeline.run(request);

    expect(result.version).toBe(1);
    expect(result.summary.overallStatus).toBe('PASS');
    expect(result.publishedUrl).toBe(PUBLISHED_URL);
    expect(result.uploaded).toEqual([
      { fileName: 'report_v1.pdf', filePath: artifactPath(reportDir, 'report', 1, 'pdf'), remoteId: 'a-1' },
      { fileName: 'report_v1.html', filePath: artifactPath(reportDir, 'report', 1, 'html'), remoteId: 'a-2' },
    ]);
    expect(destination.prepared[0].summary.passed).toBe(5);
    expect(destination.finalized).toEqual([result.uploaded]);
    expect(await fs.readFile(destination.urlFile, 'utf-8')).toBe(PUBLISHED_URL);
    expect(result.runId).toMatch(/^run-[0-9a-f-]{36}$/);
  });

  test('reuse mode publishes the last allocated version without bumping it', async () => {
    await fs.writeFile(path.join(reportDir, 'version.txt'), '4');
    await writeArtifacts(4, ['pdf', 'html']);
    nock(BASE).post('/upload').times(2).reply(200, []);

    const pipeline = new PublishPipeline({ versionStore, uploadEngine, destination });
    const result = await pipeline.run({ ...request, versionMode: 'reuse' });

    expect(result.version).toBe(4);
    expect(result.uploaded.map(artifact => artifact.remoteId)).toEqual([null, null]);
    expect(await fs.readFile(path.join(reportDir, 'version.txt'), 'utf-8')).toBe('4');
  });

  test('a missing artifact aborts before the destination or any upload is touched', async () => {
    await writeArtifacts(1, ['pdf']);
    const scope = nock(BASE).post('/upload').reply(200, []);

    const pipeline = new PublishPipeline({ versionStore, uploadEngine, destination });

    await expect(pipeline.run(request)).rejects.toThrow(
      new LocalIOError(`Required report file missing: ${artifactPath(reportDir, 'report', 1, 'html')}`, '')
    );
    expect(destination.prepared).toEqual([]);
    expect(scope.isDone()).toBe(false);
  });

  test('a rejected upload stops the run before finalizing', async () => {
    await writeArtifacts(1, ['pdf', 'html']);
    nock(BASE).post('/upload').reply(401, 'bad credentials');

    const pipeline = new PublishPipeline({ versionStore, uploadEngine, destination });

    await expect(pipeline.run(request)).rejects.toBeInstanceOf(AuthError);
    expect(destination.finalized).toEqual([]);
    await expect(fs.access(destination.urlFile)).rejects.toThrow();
  });

  test('runs the import job after publishing and saves the execution key', async () => {
    await writeArtifacts(1, ['pdf', 'html']);
    const archivePath = path.join(dir, 'results.zip');
    await fs.writeFile(archivePath, 'PK placeholder');
    const keyFile = path.join(dir, 'rtm_execution_key.txt');

    nock(BASE).post('/upload').times(2).reply(200, []);
    const rtm = nock(RTM_BASE)
      .post('/api/v2/automation/import-test-results')
      .reply(200, { taskId: 'task-5' })
      .get('/api/v2/automation/import-status/task-5')
      .reply(200, { status: 'SUCCEEDED', progress: 100, testExecutionKey: 'QA-77' });

    const rtmHttp = createHttpClient({ auth: { kind: 'bearer', token: 'test-secret' }, timeoutMs: 5000 });
    const pipeline = new PublishPipeline({
      versionStore,
      uploadEngine,
      destination,
      importClients: {
        submitter: new RtmImportSubmitter(rtmHttp, RTM_BASE),
        poller: new RtmImportPoller(rtmHttp, RTM_BASE),
      },
    });

    const result = await pipeline.run({
      ...request,
      importJob: {
        archivePath,
        metadata: { projectKey: 'QA', reportType: 'JUNIT', jobUrl: 'N/A' },
        pollIntervalMs: 2000,
        deadlineMs: 10000,
        executionKeyFile: keyFile,
        issueKeyPattern: '^[A-Z]+-\\d+$',
      },
    });

    expect(result.executionKey).toBe('QA-77');
    expect(result.importJob?.jobId).toBe('task-5');
    expect(result.importJob?.status).toBe('SUCCEEDED');
    expect(await fs.readFile(keyFile, 'utf-8')).toBe('QA-77');
    expect(await fs.readFile(destination.urlFile, 'utf-8')).toBe(PUBLISHED_URL);
    expect(rtm.isDone()).toBe(true);
  });

  test('an import job without import clients is a configuration error', async () => {
    await writeArtifacts(1, ['pdf', 'html']);
    nock(BASE).post('/upload').times(2).reply(200, []);

    const pipeline = new PublishPipeline({ versionStore, uploadEngine, destination });
    const attempt = pipeline.run({
      ...request,
      importJob: {
        archivePath: path.join(dir, 'results.zip'),
        metadata: { projectKey: 'QA', reportType: 'JUNIT', jobUrl: 'N/A' },
        pollIntervalMs: 2000,
        deadlineMs: 10000,
        executionKeyFile: path.join(dir, 'key.txt'),
        issueKeyPattern: '^[A-Z]+-\\d+$',
      },
    });

    await expect(attempt).rejects.toBeInstanceOf(ConfigurationError);
  });
});
