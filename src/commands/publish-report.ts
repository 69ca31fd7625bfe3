import { parseArgs } from 'util';
import { createConfluenceClient } from '../integrations/confluence-client';
import { ConfluenceDestination } from '../pipeline/destinations/confluence-destination';
import { JiraDestination } from '../pipeline/destinations/jira-destination';
import { ImportClients, ImportJobRequest } from '../pipeline/import-stage';
import { PublishDestination, PublishPipeline } from '../pipeline/publish-pipeline';
import { ServiceAuth } from '../integrations/http-client';
import { resolveExecutionKey } from '../storage/reference-store';
import { requireConfluenceEnv, requireJiraEnv, requireRtmEnv } from '../utils/config-loader';
import { ConfigurationError } from '../utils/errors';
import { buildImportClients, buildUploadEngine, buildVersionStore, Command, CommandContext, requireOption } from './shared';

export const PUBLISH_REPORT_USAGE = `
Usage: ci-report-publisher publish-report [options]

Publishes <reportDir>/<baseName>_v<version>.<ext> artifacts with the test
summary, then optionally imports a results archive into RTM.

Without --reuse-version a new version is allocated. When next-version ran
before the report was rendered, as in the usual CI job, pass --reuse-version
so the published files match the rendered ones.

Options:
  --target <confluence|jira>  Where to publish (default: confluence)
  --reuse-version             Use the last allocated version instead of allocating
  --execution-key <KEY>       Jira target: issue to attach to
  --archive <zip>             Also import this results archive into RTM
  --project <KEY>             RTM project key (required with --archive)
  --job-url <url>             CI job URL (default: $CI_JOB_URL or N/A)
  --report-type <type>        RTM report format (default from config)

Environment:
  confluence: CONFLUENCE_BASE, CONFLUENCE_USER, CONFLUENCE_TOKEN, CONFLUENCE_SPACE, CONFLUENCE_TITLE
  jira:       JIRA_URL, JIRA_USER, JIRA_API_TOKEN
  --archive:  RTM_BASE, RTM_API_TOKEN
`.trim();

interface DestinationSetup {
  destination: PublishDestination;
  auth: ServiceAuth;
}

async function setupDestination(
  target: string,
  executionKey: string | undefined,
  context: CommandContext
): Promise<DestinationSetup> {
  const { config, env } = context;

  if (target === 'confluence') {
    const confluenceEnv = requireConfluenceEnv(env);
    const baseUrl = confluenceEnv.CONFLUENCE_BASE.replace(/\/+$/, '');
    const client = createConfluenceClient({
      baseUrl,
      username: confluenceEnv.CONFLUENCE_USER,
      apiToken: confluenceEnv.CONFLUENCE_TOKEN,
      spaceKey: confluenceEnv.CONFLUENCE_SPACE,
    });

    return {
      destination: new ConfluenceDestination(client, {
        baseUrl,
        spaceKey: confluenceEnv.CONFLUENCE_SPACE,
        titlePrefix: confluenceEnv.CONFLUENCE_TITLE || config.confluence.titlePrefix,
        urlFile: config.paths.pageUrlFile,
      }),
      auth: { kind: 'basic', username: confluenceEnv.CONFLUENCE_USER, password: confluenceEnv.CONFLUENCE_TOKEN },
    };
  }

  if (target === 'jira') {
    const jiraEnv = requireJiraEnv(env);
    const reference = await resolveExecutionKey({
      explicit: executionKey,
      env: env.RTM_EXECUTION_KEY,
      filePath: config.paths.executionKeyFile,
      pattern: config.issueKeyPattern,
    });

    return {
      destination: new JiraDestination(jiraEnv.JIRA_URL, reference.key, config.paths.jiraUrlFile),
      auth: { kind: 'basic', username: jiraEnv.JIRA_USER, password: jiraEnv.JIRA_API_TOKEN },
    };
  }

  throw new ConfigurationError(`Unknown --target "${target}", expected confluence or jira`);
}

export const publishReportCommand: Command = async (args, context) => {
  const { values } = parseArgs({
    args,
    options: {
      target: { type: 'string' },
      'reuse-version': { type: 'boolean', default: false },
      'execution-key': { type: 'string' },
      archive: { type: 'string' },
      project: { type: 'string' },
      'job-url': { type: 'string' },
      'report-type': { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
  });

  if (values.help) {
    context.print(PUBLISH_REPORT_USAGE);
    return;
  }

  const { config, env } = context;
  const { destination, auth } = await setupDestination(values.target ?? 'confluence', values['execution-key'], context);

  let importJob: ImportJobRequest | undefined;
  let importClients: ImportClients | undefined;
  if (values.archive) {
    const rtmEnv = requireRtmEnv(env);
    importClients = buildImportClients(config, rtmEnv);
    importJob = {
      archivePath: values.archive,
      metadata: {
        projectKey: requireOption(values.project, 'project'),
        reportType: values['report-type'] ?? config.import.reportType,
        jobUrl: values['job-url'] || env.CI_JOB_URL || 'N/A',
        testExecutionKey: values['execution-key'] || undefined,
      },
      pollIntervalMs: config.import.pollIntervalMs,
      deadlineMs: config.import.deadlineMs,
      executionKeyFile: config.paths.executionKeyFile,
      issueKeyPattern: config.issueKeyPattern,
    };
  }

  const pipeline = new PublishPipeline({
    versionStore: buildVersionStore(config),
    uploadEngine: buildUploadEngine(config, auth),
    destination,
    importClients,
  });

  const result = await pipeline.run({
    versionMode: values['reuse-version'] ? 'reuse' : 'allocate',
    reportDir: config.paths.reportDir,
    baseName: config.paths.baseName,
    extensions: config.artifactExtensions,
    testLogFile: config.paths.testLogFile,
    maxUploadAttempts: config.upload.maxAttempts,
    importJob,
  });

  context.print(result.publishedUrl);
  if (result.executionKey) {
    context.print(result.executionKey);
  }
};
