import { TestSummary } from '../models/test-summary';
import { readTextIfExists } from '../storage/file-storage';
import logger from '../utils/logger';

const COUNTER_PATTERNS = {
  passed: /(\d+)\s+passed/i,
  failed: /(\d+)\s+failed/i,
  skipped: /(\d+)\s+skipped/i,
  errors: /(\d+)\s+errors?/i,
} as const;

function firstCount(text: string, pattern: RegExp): number {
  const match = pattern.exec(text);
  return match ? parseInt(match[1], 10) : 0;
}

function summarize(passed: number, failed: number, errors: number, skipped: number): TestSummary {
  const total = passed + failed + errors + skipped;
  return {
    passed,
    failed,
    errors,
    skipped,
    total,
    passRate: total > 0 ? (passed / total) * 100 : 0,
    // Skipped tests do not affect the verdict.
    overallStatus: failed === 0 && errors === 0 ? 'PASS' : 'FAIL',
  };
}

/**
 * Pulls pass/fail/error/skip counts out of free-text test runner output.
 * Counters with no match are 0; empty input is a valid, all-zero run.
 */
export function extractSummary(rawText: string): TestSummary {
  return summarize(
    firstCount(rawText, COUNTER_PATTERNS.passed),
    firstCount(rawText, COUNTER_PATTERNS.failed),
    firstCount(rawText, COUNTER_PATTERNS.errors),
    firstCount(rawText, COUNTER_PATTERNS.skipped)
  );
}

export function unknownSummary(): TestSummary {
  return { ...summarize(0, 0, 0, 0), overallStatus: 'UNKNOWN' };
}

export async function extractSummaryFromFile(logPath: string): Promise<TestSummary> {
  const text = await readTextIfExists(logPath);

  if (text === null) {
    logger.warn('Test log not found, summary status is UNKNOWN', { log_path: logPath });
    return unknownSummary();
  }

  return extractSummary(text);
}

export function formatSummaryLine(summary: TestSummary): string {
  return (
    `${summary.passed} passed | ${summary.failed} failed | ${summary.errors} errors | ` +
    `${summary.skipped} skipped | pass rate ${summary.passRate.toFixed(1)}%`
  );
}
