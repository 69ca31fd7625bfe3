import { parseArgs } from 'util';
import { jiraAttachmentUrl, jiraBrowseUrl } from '../integrations/jira-client';
import { uploadArtifacts } from '../pipeline/publish-pipeline';
import { resolveExecutionKey, savePublishedUrl } from '../storage/reference-store';
import { requireJiraEnv } from '../utils/config-loader';
import { createContextLogger } from '../utils/logger';
import { buildUploadEngine, Command, requireOption } from './shared';

export const ATTACH_REPORTS_USAGE = `
Usage: ci-report-publisher attach-reports --pdf <file> --html <file> [--execution-key <KEY>]

Attaches report files to a Jira test execution. The key comes from
--execution-key, $RTM_EXECUTION_KEY or the key file, in that order.

Environment: JIRA_URL, JIRA_USER, JIRA_API_TOKEN
`.trim();

export const attachReportsCommand: Command = async (args, context) => {
  const { values } = parseArgs({
    args,
    options: {
      pdf: { type: 'string' },
      html: { type: 'string' },
      'execution-key': { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
  });

  if (values.help) {
    context.print(ATTACH_REPORTS_USAGE);
    return;
  }

  const { config, env } = context;
  const files = [requireOption(values.pdf, 'pdf'), requireOption(values.html, 'html')];
  const jiraEnv = requireJiraEnv(env);

  const reference = await resolveExecutionKey({
    explicit: values['execution-key'],
    env: env.RTM_EXECUTION_KEY,
    filePath: config.paths.executionKeyFile,
    pattern: config.issueKeyPattern,
  });

  const contextLogger = createContextLogger({ stage: 'attach-reports', execution_key: reference.key });
  contextLogger.info('Attaching reports to Jira test execution', { key_source: reference.source, files });

  const engine = buildUploadEngine(config, {
    kind: 'basic',
    username: jiraEnv.JIRA_USER,
    password: jiraEnv.JIRA_API_TOKEN,
  });

  const uploaded = await uploadArtifacts(
    engine,
    { attachmentUrl: jiraAttachmentUrl(jiraEnv.JIRA_URL, reference.key), successStatuses: [200, 201] },
    files,
    config.upload.maxAttempts
  );

  const browseUrl = jiraBrowseUrl(jiraEnv.JIRA_URL, reference.key);
  await savePublishedUrl(config.paths.jiraUrlFile, browseUrl);

  contextLogger.info('All attachments uploaded', { uploaded: uploaded.map(artifact => artifact.fileName) });
  context.print(browseUrl);
};
