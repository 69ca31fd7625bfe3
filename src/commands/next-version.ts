import { parseArgs } from 'util';
import { buildVersionStore, Command } from './shared';

export const NEXT_VERSION_USAGE = `
Usage: ci-report-publisher next-version [--peek]

Allocates the next report artifact version and prints it.

Options:
  --peek    Print the last allocated version (0 if none) without allocating
`.trim();

export const nextVersionCommand: Command = async (args, context) => {
  const { values } = parseArgs({
    args,
    options: {
      peek: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
  });

  if (values.help) {
    context.print(NEXT_VERSION_USAGE);
    return;
  }

  const store = buildVersionStore(context.config);
  const version = values.peek ? (await store.peek()) ?? 0 : await store.allocateNext();
  context.print(String(version));
};
