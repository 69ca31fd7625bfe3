export interface PathsConfig {
  reportDir: string;
  baseName: string;
  versionFile: string;
  testLogFile: string;
  executionKeyFile: string;
  pageUrlFile: string;
  jiraUrlFile: string;
}

export interface UploadConfig {
  backoffScheduleMs: number[];
  maxAttempts: number;
  requestTimeoutMs: number;
}

export interface ImportConfig {
  reportType: string;
  pollIntervalMs: number;
  deadlineMs: number;
}

export interface LockConfig {
  timeoutMs: number;
  staleMs: number;
}

export interface PipelineConfig {
  paths: PathsConfig;
  artifactExtensions: string[];
  issueKeyPattern: string;
  upload: UploadConfig;
  import: ImportConfig;
  lock: LockConfig;
  confluence: {
    titlePrefix: string;
  };
}

export interface JiraEnv {
  JIRA_URL: string;
  JIRA_USER: string;
  JIRA_API_TOKEN: string;
}

export interface ConfluenceEnv {
  CONFLUENCE_BASE: string;
  CONFLUENCE_USER: string;
  CONFLUENCE_TOKEN: string;
  CONFLUENCE_SPACE: string;
  CONFLUENCE_TITLE?: string;
}

export interface RtmEnv {
  RTM_BASE: string;
  RTM_API_TOKEN: string;
}
