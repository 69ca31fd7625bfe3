import { PipelineConfig, RtmEnv } from '../models/config';
import { createHttpClient, ServiceAuth } from '../integrations/http-client';
import { UploadRetryEngine } from '../integrations/upload-engine';
import { RtmImportPoller } from '../integrations/rtm-import-poller';
import { RtmImportSubmitter } from '../integrations/rtm-import-submitter';
import { ImportClients } from '../pipeline/import-stage';
import { FileVersionStore } from '../storage/version-store';
import { ConfigurationError } from '../utils/errors';
import { MAX_TIMER_DELAY_MS } from '../utils/retry-handler';

export interface CommandContext {
  env: NodeJS.ProcessEnv;
  config: PipelineConfig;
  /** Writes one result line to stdout. */
  print: (line: string) => void;
}

export type Command = (args: string[], context: CommandContext) => Promise<void>;

export function requireOption(value: string | undefined, flag: string): string {
  const trimmed = value?.trim();
  if (!trimmed) {
    throw new ConfigurationError(`Missing required option --${flag}`);
  }
  return trimmed;
}

export function parsePositiveInt(value: string | undefined, flag: string, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > MAX_TIMER_DELAY_MS) {
    throw new ConfigurationError(`--${flag} must be an integer between 1 and ${MAX_TIMER_DELAY_MS}, got "${value}"`);
  }
  return parsed;
}

export function buildVersionStore(config: PipelineConfig): FileVersionStore {
  return new FileVersionStore(config.paths.versionFile, {
    lockTimeoutMs: config.lock.timeoutMs,
    staleLockMs: config.lock.staleMs,
  });
}

export function buildUploadEngine(config: PipelineConfig, auth: ServiceAuth): UploadRetryEngine {
  const http = createHttpClient({ auth, timeoutMs: config.upload.requestTimeoutMs });
  return new UploadRetryEngine(http, { backoffScheduleMs: config.upload.backoffScheduleMs });
}

export function buildImportClients(config: PipelineConfig, rtm: RtmEnv): ImportClients {
  const http = createHttpClient({
    auth: { kind: 'bearer', token: rtm.RTM_API_TOKEN },
    timeoutMs: config.upload.requestTimeoutMs,
  });
  return {
    submitter: new RtmImportSubmitter(http, rtm.RTM_BASE),
    poller: new RtmImportPoller(http, rtm.RTM_BASE),
  };
}
