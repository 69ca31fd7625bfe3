import { parseArgs } from 'util';
import { createJiraApi, createTestExecution } from '../integrations/jira-client';
import { saveExecutionKey } from '../storage/reference-store';
import { requireJiraEnv } from '../utils/config-loader';
import { Command, requireOption } from './shared';

export const CREATE_EXECUTION_USAGE = `
Usage: ci-report-publisher create-execution --project <KEY> --summary <text> --output <file>

Creates a Jira "Test Execution" issue and writes its key to <file>.

Options:
  --project <KEY>        Jira project key
  --summary <text>       Issue summary
  --description <text>   Issue description
  --issue-type <name>    Issue type name (default: Test Execution)
  --output <file>        File receiving the issue key

Environment: JIRA_URL, JIRA_USER, JIRA_API_TOKEN
`.trim();

export const createExecutionCommand: Command = async (args, context) => {
  const { values } = parseArgs({
    args,
    options: {
      project: { type: 'string' },
      summary: { type: 'string' },
      description: { type: 'string' },
      'issue-type': { type: 'string' },
      output: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
  });

  if (values.help) {
    context.print(CREATE_EXECUTION_USAGE);
    return;
  }

  const projectKey = requireOption(values.project, 'project');
  const summary = requireOption(values.summary, 'summary');
  const output = requireOption(values.output, 'output');
  const jiraEnv = requireJiraEnv(context.env);

  const jira = createJiraApi({
    baseUrl: jiraEnv.JIRA_URL,
    username: jiraEnv.JIRA_USER,
    apiToken: jiraEnv.JIRA_API_TOKEN,
  });

  const issueKey = await createTestExecution(jira, {
    projectKey,
    summary,
    description: values.description ?? 'Automated Test Execution run via CI pipeline',
    issueType: values['issue-type'] ?? 'Test Execution',
  });

  await saveExecutionKey(output, issueKey, context.config.issueKeyPattern);
  context.print(issueKey);
};
