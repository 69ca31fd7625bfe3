import path from 'path';
import Joi from 'joi';
import { ConfluenceEnv, JiraEnv, PipelineConfig, RtmEnv } from '../models/config';
import { DEFAULT_ISSUE_KEY_PATTERN } from '../models/execution-reference';
import { fileExists, readJSON } from '../storage/file-storage';
import { ConfigurationError } from './errors';
import { MAX_TIMER_DELAY_MS } from './retry-handler';
import logger from './logger';

const pipelineConfigSchema = Joi.object<PipelineConfig>({
  paths: Joi.object({
    reportDir: Joi.string().default('report'),
    baseName: Joi.string().default('test_result_report'),
    versionFile: Joi.string().default('report/version.txt'),
    testLogFile: Joi.string().default('report/pytest_output.txt'),
    executionKeyFile: Joi.string().default('rtm_execution_key.txt'),
    pageUrlFile: Joi.string().default('report/confluence_url.txt'),
    jiraUrlFile: Joi.string().default('report/jira_url.txt'),
  }).default(),
  artifactExtensions: Joi.array().items(Joi.string().pattern(/^[a-z0-9]+$/i)).min(1).default(['pdf', 'html']),
  issueKeyPattern: Joi.string().default(DEFAULT_ISSUE_KEY_PATTERN),
  upload: Joi.object({
    backoffScheduleMs: Joi.array().items(Joi.number().integer().min(0).max(MAX_TIMER_DELAY_MS)).min(1).default([2000, 4000, 6000, 10000, 15000, 20000, 30000]),
    maxAttempts: Joi.number().integer().min(1).default(7),
    requestTimeoutMs: Joi.number().integer().min(1).max(MAX_TIMER_DELAY_MS).default(60000),
  }).default(),
  import: Joi.object({
    reportType: Joi.string().default('JUNIT'),
    pollIntervalMs: Joi.number().integer().min(1).max(MAX_TIMER_DELAY_MS).default(2000),
    deadlineMs: Joi.number().integer().min(1).max(MAX_TIMER_DELAY_MS).default(600000),
  }).default(),
  lock: Joi.object({
    timeoutMs: Joi.number().integer().min(0).default(10000),
    staleMs: Joi.number().integer().min(1).default(60000),
  }).default(),
  confluence: Joi.object({
    titlePrefix: Joi.string().default('Test Result Report'),
  }).default(),
});

export function parsePipelineConfig(raw: unknown): PipelineConfig {
  const { error, value } = pipelineConfigSchema.validate(raw ?? {}, { abortEarly: false });
  if (error) {
    throw new ConfigurationError(`Invalid pipeline configuration: ${error.message}`);
  }

  try {
    new RegExp(value.issueKeyPattern);
  } catch (patternError) {
    throw new ConfigurationError(`Invalid issueKeyPattern: ${(patternError as Error).message}`);
  }

  return value;
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.PIPELINE_CONFIG || path.join(process.cwd(), 'config', 'pipeline.json');
}

/** Missing config file means all defaults. */
export async function loadPipelineConfig(configPath: string = resolveConfigPath()): Promise<PipelineConfig> {
  if (!(await fileExists(configPath))) {
    logger.debug('Pipeline config not found, using defaults', { config_path: configPath });
    return parsePipelineConfig({});
  }

  const raw = await readJSON<unknown>(configPath);
  const config = parsePipelineConfig(raw);
  logger.debug('Pipeline config loaded', { config_path: configPath });
  return config;
}

const requiredUrl = Joi.string().trim().uri({ scheme: ['http', 'https'] }).required();
const requiredString = Joi.string().trim().required();

const jiraEnvSchema = Joi.object<JiraEnv>({
  JIRA_URL: requiredUrl,
  JIRA_USER: requiredString,
  JIRA_API_TOKEN: requiredString,
}).unknown(true);

const confluenceEnvSchema = Joi.object<ConfluenceEnv>({
  CONFLUENCE_BASE: requiredUrl.pattern(/\/rest\/api/, { invert: true, name: 'no /rest/api suffix' }),
  CONFLUENCE_USER: requiredString,
  CONFLUENCE_TOKEN: requiredString,
  CONFLUENCE_SPACE: requiredString,
  CONFLUENCE_TITLE: Joi.string().trim().allow('').optional(),
}).unknown(true);

const rtmEnvSchema = Joi.object<RtmEnv>({
  RTM_BASE: requiredUrl,
  RTM_API_TOKEN: requiredString,
}).unknown(true);

function validateEnv<T>(schema: Joi.ObjectSchema<T>, env: NodeJS.ProcessEnv, service: string): T {
  const { error, value } = schema.validate(env, { abortEarly: false, convert: true });
  if (error) {
    const details = error.details.map(detail => detail.message).join('; ');
    throw new ConfigurationError(`Invalid ${service} environment: ${details}`);
  }
  return value;
}

export function requireJiraEnv(env: NodeJS.ProcessEnv = process.env): JiraEnv {
  return validateEnv(jiraEnvSchema, env, 'Jira');
}

export function requireConfluenceEnv(env: NodeJS.ProcessEnv = process.env): ConfluenceEnv {
  return validateEnv(confluenceEnvSchema, env, 'Confluence');
}

export function requireRtmEnv(env: NodeJS.ProcessEnv = process.env): RtmEnv {
  return validateEnv(rtmEnvSchema, env, 'RTM');
}
