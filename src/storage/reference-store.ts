import { readTextIfExists, writeText } from './file-storage';
import { ExecutionReference, isValidIssueKey } from '../models/execution-reference';
import { ConfigurationError, LocalIOError, ProtocolError } from '../utils/errors';
import logger from '../utils/logger';

/**
 * Plain-text files handed between independently invoked pipeline stages:
 * the execution key, and the published page or issue URLs.
 */

export async function saveExecutionKey(filePath: string, key: string, pattern: string): Promise<void> {
  if (!isValidIssueKey(key, pattern)) {
    throw new ProtocolError(`Refusing to persist malformed execution key: ${key}`);
  }

  await writeText(filePath, key);
  logger.info('Execution key saved', { execution_key: key, file_path: filePath });
}

export interface ExecutionKeySources {
  /** Explicit value from a CLI flag. */
  explicit?: string;
  /** Value of RTM_EXECUTION_KEY. */
  env?: string;
  filePath: string;
  pattern: string;
}

/**
 * Resolves the execution key from, in order, the explicit flag, the
 * environment and the key file written by an earlier stage.
 */
export async function resolveExecutionKey(sources: ExecutionKeySources): Promise<ExecutionReference> {
  let reference: ExecutionReference;

  if (sources.explicit?.trim()) {
    reference = { key: sources.explicit.trim(), source: 'JIRA' };
  } else if (sources.env?.trim()) {
    reference = { key: sources.env.trim(), source: 'ENV' };
  } else {
    const stored = await readTextIfExists(sources.filePath);
    if (stored === null) {
      throw new LocalIOError(
        `No execution key given and ${sources.filePath} does not exist`,
        sources.filePath
      );
    }
    reference = { key: stored.trim(), source: 'RTM' };
  }

  if (!isValidIssueKey(reference.key, sources.pattern)) {
    throw new ConfigurationError(`Invalid issue key format: ${reference.key}`);
  }

  return reference;
}

export async function savePublishedUrl(filePath: string, url: string): Promise<void> {
  await writeText(filePath, url);
  logger.info('Published URL saved', { url, file_path: filePath });
}
