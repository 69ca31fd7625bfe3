import { parseArgs } from 'util';
import { runImportStage } from '../pipeline/import-stage';
import { requireRtmEnv } from '../utils/config-loader';
import { createContextLogger } from '../utils/logger';
import { buildImportClients, Command, parsePositiveInt, requireOption } from './shared';

export const UPLOAD_RESULTS_USAGE = `
Usage: ci-report-publisher upload-results --archive <zip> --project <KEY> [options]

Submits a results archive to RTM, polls the import job to completion and
writes the resulting test execution key to the key file.

Options:
  --archive <zip>           Results archive to import
  --project <KEY>           Project key
  --rtm-base <url>          RTM base URL (default: $RTM_BASE)
  --job-url <url>           CI job URL (default: $CI_JOB_URL or N/A)
  --execution-key <KEY>     Import into an existing test execution
  --report-type <type>      Report format (default from config, JUNIT)
  --output <file>           Key file (default from config)
  --poll-interval-ms <ms>   Delay between status checks
  --deadline-ms <ms>        Give up polling after this long

Environment: RTM_API_TOKEN, RTM_BASE
`.trim();

export const uploadResultsCommand: Command = async (args, context) => {
  const { values } = parseArgs({
    args,
    options: {
      archive: { type: 'string' },
      project: { type: 'string' },
      'rtm-base': { type: 'string' },
      'job-url': { type: 'string' },
      'execution-key': { type: 'string' },
      'report-type': { type: 'string' },
      output: { type: 'string' },
      'poll-interval-ms': { type: 'string' },
      'deadline-ms': { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
  });

  if (values.help) {
    context.print(UPLOAD_RESULTS_USAGE);
    return;
  }

  const { config, env } = context;
  const archivePath = requireOption(values.archive, 'archive');
  const projectKey = requireOption(values.project, 'project');
  const rtmEnv = requireRtmEnv({ ...env, RTM_BASE: values['rtm-base'] ?? env.RTM_BASE });

  const contextLogger = createContextLogger({ stage: 'upload-results', project_key: projectKey });
  const executionKey = values['execution-key'] || undefined;

  const { executionKey: resultKey } = await runImportStage(
    buildImportClients(config, rtmEnv),
    {
      archivePath,
      metadata: {
        projectKey,
        reportType: values['report-type'] ?? config.import.reportType,
        jobUrl: values['job-url'] || env.CI_JOB_URL || 'N/A',
        testExecutionKey: executionKey,
      },
      pollIntervalMs: parsePositiveInt(values['poll-interval-ms'], 'poll-interval-ms', config.import.pollIntervalMs),
      deadlineMs: parsePositiveInt(values['deadline-ms'], 'deadline-ms', config.import.deadlineMs),
      executionKeyFile: values.output ?? config.paths.executionKeyFile,
      issueKeyPattern: config.issueKeyPattern,
    },
    contextLogger
  );

  context.print(resultKey);
};
