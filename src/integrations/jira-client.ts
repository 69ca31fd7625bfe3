import JiraApi from 'jira-client';
import { ProtocolError, TransientServiceError, errorForStatus, PipelineError } from '../utils/errors';
import { isRecord, bodyAsText } from '../utils/http-body';
import logger from '../utils/logger';
import { joinUrl } from './http-client';

export interface JiraConnection {
  baseUrl: string;
  username: string;
  apiToken: string;
}

export interface TestExecutionRequest {
  projectKey: string;
  summary: string;
  description: string;
  issueType: string;
}

export function createJiraApi(connection: JiraConnection): JiraApi {
  const url = new URL(connection.baseUrl);

  return new JiraApi({
    protocol: url.protocol.replace(/:$/, ''),
    host: url.hostname,
    ...(url.port && { port: url.port }),
    base: url.pathname.replace(/\/+$/, ''),
    username: connection.username,
    password: connection.apiToken,
    apiVersion: '3',
    strictSSL: true,
  });
}

export function jiraAttachmentUrl(baseUrl: string, issueKey: string): string {
  return joinUrl(baseUrl, `rest/api/3/issue/${encodeURIComponent(issueKey)}/attachments`);
}

export function jiraBrowseUrl(baseUrl: string, issueKey: string): string {
  return joinUrl(baseUrl, `browse/${encodeURIComponent(issueKey)}`);
}

/** Jira REST v3 takes descriptions as Atlassian Document Format. */
function toAdf(text: string): Record<string, unknown> {
  return {
    type: 'doc',
    version: 1,
    content: [{ type: 'paragraph', content: [{ type: 'text', text }] }],
  };
}

function toPipelineError(error: unknown, context: string): PipelineError {
  if (isRecord(error) && typeof error.statusCode === 'number') {
    return errorForStatus(error.statusCode, bodyAsText(error.error ?? error.message), context);
  }
  return new TransientServiceError(`${context}: ${error instanceof Error ? error.message : String(error)}`);
}

/** One-shot: a retried create could open a second execution issue. */
export async function createTestExecution(jira: JiraApi, request: TestExecutionRequest): Promise<string> {
  logger.info('Creating Jira test execution', {
    project_key: request.projectKey,
    summary: request.summary,
    issue_type: request.issueType,
  });

  let issue: JiraApi.JsonResponse;
  try {
    issue = await jira.addNewIssue({
      fields: {
        project: { key: request.projectKey },
        summary: request.summary,
        description: toAdf(request.description),
        issuetype: { name: request.issueType },
      },
    });
  } catch (error) {
    const pipelineError = toPipelineError(error, 'Jira issue creation');
    logger.error('Failed to create Jira test execution', {
      error: pipelineError.message,
      response: pipelineError.responseBody,
    });
    throw pipelineError;
  }

  const key: unknown = issue.key;
  if (typeof key !== 'string' || !key) {
    throw new ProtocolError('Jira returned success but no issue key', JSON.stringify(issue));
  }

  logger.info('Jira test execution created', { issue_key: key, issue_id: issue.id });
  return key;
}
