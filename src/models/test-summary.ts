export type OverallStatus = 'PASS' | 'FAIL' | 'UNKNOWN';

export interface TestSummary {
  passed: number;
  failed: number;
  errors: number;
  skipped: number;
  total: number;
  /** Percentage in [0, 100]; 0 when no tests ran. */
  passRate: number;
  overallStatus: OverallStatus;
}
