import path from 'path';
import { TestSummary } from '../models/test-summary';
import { UploadedArtifact, contentTypeFor } from '../models/upload';
import { ImportJob } from '../models/import-job';
import { UploadRetryEngine } from '../integrations/upload-engine';
import { VersionStore } from '../storage/version-store';
import { fileExists } from '../storage/file-storage';
import { savePublishedUrl } from '../storage/reference-store';
import { ConfigurationError, LocalIOError, errorForOutcome } from '../utils/errors';
import { ContextLogger, createContextLogger } from '../utils/logger';
import { generateRunId } from '../utils/uuid-generator';
import { extractSummaryFromFile, formatSummaryLine } from './summary-extractor';
import { ImportClients, ImportJobRequest, runImportStage } from './import-stage';

export interface PublishContext {
  runId: string;
  version: number;
  summary: TestSummary;
  artifactPaths: string[];
}

export interface AttachmentTarget {
  attachmentUrl: string;
  successStatuses: readonly number[];
}

export interface PreparedDestination extends AttachmentTarget {
  /** Called once every artifact is uploaded; returns the published URL. */
  finalize(uploaded: UploadedArtifact[]): Promise<string>;
}

export interface PublishDestination {
  readonly name: string;
  /** Where the published URL is saved for later stages. */
  readonly urlFile: string;
  prepare(context: PublishContext): Promise<PreparedDestination>;
}

export interface PublishPipelineDeps {
  versionStore: VersionStore;
  uploadEngine: UploadRetryEngine;
  destination: PublishDestination;
  importClients?: ImportClients;
}

export interface PublishRequest {
  /** `reuse` takes the version a rendering stage already allocated. */
  versionMode: 'allocate' | 'reuse';
  reportDir: string;
  baseName: string;
  extensions: string[];
  testLogFile: string;
  maxUploadAttempts: number;
  importJob?: ImportJobRequest;
}

export interface PublishResult {
  runId: string;
  version: number;
  summary: TestSummary;
  uploaded: UploadedArtifact[];
  publishedUrl: string;
  importJob?: ImportJob;
  executionKey?: string;
}

export function artifactPath(reportDir: string, baseName: string, version: number, extension: string): string {
  return path.join(reportDir, `${baseName}_v${version}.${extension}`);
}

/**
 * Uploads files one by one to a single attachment endpoint. The first
 * non-success outcome aborts the remaining uploads.
 */
export async function uploadArtifacts(
  engine: UploadRetryEngine,
  target: AttachmentTarget,
  filePaths: string[],
  maxAttempts: number
): Promise<UploadedArtifact[]> {
  const uploaded: UploadedArtifact[] = [];

  for (const filePath of filePaths) {
    const fileName = path.basename(filePath);
    const outcome = await engine.upload(
      {
        url: target.attachmentUrl,
        filePath,
        contentType: contentTypeFor(fileName),
        successStatuses: target.successStatuses,
      },
      maxAttempts
    );

    const failure = errorForOutcome(outcome, fileName);
    if (failure) {
      throw failure;
    }
    if (outcome.kind === 'success') {
      uploaded.push({ fileName, filePath, remoteId: outcome.remoteId });
    }
  }

  return uploaded;
}

export class PublishPipeline {
  constructor(private readonly deps: PublishPipelineDeps) {}

  async run(request: PublishRequest): Promise<PublishResult> {
    const runId = generateRunId();
    const contextLogger = createContextLogger({ run_id: runId, stage: 'publish', destination: this.deps.destination.name });
    const startedAt = Date.now();

    contextLogger.info('Publish pipeline started', { version_mode: request.versionMode });

    try {
      const version = await this.resolveVersion(request.versionMode, contextLogger);
      const stageLogger = contextLogger.child({ version });

      const artifactPaths = await this.locateArtifacts(request, version);
      stageLogger.info('Artifacts located', { artifacts: artifactPaths });

      const summary = await extractSummaryFromFile(request.testLogFile);
      stageLogger.info('Test summary extracted', { status: summary.overallStatus, summary: formatSummaryLine(summary) });

      const context: PublishContext = { runId, version, summary, artifactPaths };
      const prepared = await this.deps.destination.prepare(context);

      const uploaded = await uploadArtifacts(this.deps.uploadEngine, prepared, artifactPaths, request.maxUploadAttempts);

      const publishedUrl = await prepared.finalize(uploaded);
      await savePublishedUrl(this.deps.destination.urlFile, publishedUrl);

      const result: PublishResult = { runId, version, summary, uploaded, publishedUrl };

      if (request.importJob) {
        if (!this.deps.importClients) {
          throw new ConfigurationError('Import job requested but no import clients were configured');
        }
        const imported = await runImportStage(this.deps.importClients, request.importJob, stageLogger);
        result.importJob = imported.job;
        result.executionKey = imported.executionKey;
      }

      stageLogger.info('Publish pipeline completed', {
        published_url: publishedUrl,
        uploaded: uploaded.length,
        execution_key: result.executionKey,
        duration_ms: Date.now() - startedAt,
      });

      return result;
    } catch (error) {
      contextLogger.error('Publish pipeline failed', {
        error: (error as Error).message,
        duration_ms: Date.now() - startedAt,
      });
      throw error;
    }
  }

  private async resolveVersion(mode: PublishRequest['versionMode'], contextLogger: ContextLogger): Promise<number> {
    if (mode === 'allocate') {
      return this.deps.versionStore.allocateNext();
    }

    const current = await this.deps.versionStore.peek();
    if (current === null) {
      contextLogger.warn('No version allocated yet, assuming v1');
      return 1;
    }
    return current;
  }

  private async locateArtifacts(request: PublishRequest, version: number): Promise<string[]> {
    const paths = request.extensions.map(extension =>
      artifactPath(request.reportDir, request.baseName, version, extension)
    );

    for (const filePath of paths) {
      if (!(await fileExists(filePath))) {
        throw new LocalIOError(`Required report file missing: ${filePath}`, filePath);
      }
    }

    return paths;
  }
}
