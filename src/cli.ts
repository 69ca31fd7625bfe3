import { ATTACH_REPORTS_USAGE, attachReportsCommand } from './commands/attach-reports';
import { CREATE_EXECUTION_USAGE, createExecutionCommand } from './commands/create-execution';
import { NEXT_VERSION_USAGE, nextVersionCommand } from './commands/next-version';
import { PUBLISH_REPORT_USAGE, publishReportCommand } from './commands/publish-report';
import { Command } from './commands/shared';
import { UPLOAD_RESULTS_USAGE, uploadResultsCommand } from './commands/upload-results';
import { loadPipelineConfig, resolveConfigPath } from './utils/config-loader';
import { PipelineError } from './utils/errors';
import { createContextLogger } from './utils/logger';

interface CommandEntry {
  run: Command;
  usage: string;
  description: string;
}

const COMMANDS: Record<string, CommandEntry> = {
  'next-version': {
    run: nextVersionCommand,
    usage: NEXT_VERSION_USAGE,
    description: 'Allocate the next report version',
  },
  'create-execution': {
    run: createExecutionCommand,
    usage: CREATE_EXECUTION_USAGE,
    description: 'Create a Jira test execution issue',
  },
  'upload-results': {
    run: uploadResultsCommand,
    usage: UPLOAD_RESULTS_USAGE,
    description: 'Import a results archive into RTM',
  },
  'attach-reports': {
    run: attachReportsCommand,
    usage: ATTACH_REPORTS_USAGE,
    description: 'Attach report files to a Jira test execution',
  },
  'publish-report': {
    run: publishReportCommand,
    usage: PUBLISH_REPORT_USAGE,
    description: 'Publish versioned report artifacts',
  },
};

export function usage(): string {
  const width = Math.max(...Object.keys(COMMANDS).map(name => name.length));
  const lines = Object.entries(COMMANDS).map(
    ([name, entry]) => `  ${name.padEnd(width)}  ${entry.description}`
  );
  return ['Usage: ci-report-publisher <command> [options]', '', 'Commands:', ...lines].join('\n');
}

/** Runs one command and returns the process exit code. */
export async function runCli(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  print: (line: string) => void = line => process.stdout.write(`${line}\n`)
): Promise<number> {
  const [name, ...args] = argv;

  if (name === '--help' || name === '-h' || name === 'help') {
    const topic = args[0] ? COMMANDS[args[0]] : undefined;
    print(topic ? topic.usage : usage());
    return 0;
  }

  const entry = name ? COMMANDS[name] : undefined;
  if (!entry) {
    print(usage());
    return 1;
  }

  const contextLogger = createContextLogger({ stage: name });
  const startedAt = Date.now();

  try {
    const config = await loadPipelineConfig(resolveConfigPath(env));
    await entry.run(args, { env, config, print });
    contextLogger.debug('Command finished', { duration_ms: Date.now() - startedAt });
    return 0;
  } catch (error) {
    const meta: Record<string, unknown> = {
      error: error instanceof Error ? error.message : String(error),
      error_type: error instanceof Error ? error.name : typeof error,
      duration_ms: Date.now() - startedAt,
    };
    if (error instanceof PipelineError) {
      meta.status_code = error.statusCode;
      if (error.responseBody) {
        meta.response_body = error.responseBody;
      }
    }
    contextLogger.error('Command failed', meta);
    return 1;
  }
}
