export type ReferenceSource = 'JIRA' | 'RTM' | 'ENV';

export interface ExecutionReference {
  key: string;
  source: ReferenceSource;
}

export const DEFAULT_ISSUE_KEY_PATTERN = '^[A-Z]{1,10}-\\d+$';

export function isValidIssueKey(key: string, pattern: string = DEFAULT_ISSUE_KEY_PATTERN): boolean {
  return new RegExp(pattern).test(key);
}
