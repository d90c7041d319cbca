#!/usr/bin/env node

import { Command } from 'commander';
import { registerCreateCommand } from './commands/create';
import { registerListCommand } from './commands/list';
import type { CliDependencies } from './lib/context';

export const CLI_VERSION = '0.1.0';

export function createProgram(deps: CliDependencies = {}): Command {
  const program = new Command();

  program
    .name('s3t')
    .description(
      [
        'Create and browse Amazon S3 Tables resources (table bucket, namespace, table).',
        '',
        'Credentials come from the default AWS credential chain: `aws configure`,',
        'AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY, or an instance role.'
      ].join('\n')
    )
    .version(CLI_VERSION)
    .option('--profile <name>', 'AWS profile from ~/.aws/credentials or ~/.aws/config')
    .option('--region <region>', 'AWS region for API calls')
    .option('--endpoint <url>', 'Override the S3 Tables endpoint URL')
    .option('--log-level <level>', 'Diagnostic log level written to stderr (default: warn)');

  registerCreateCommand(program, deps);
  registerListCommand(program, deps);

  for (const command of program.commands) {
    command.allowExcessArguments(false);
  }

  return program;
}

export async function run(argv: string[]): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(message);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void run(process.argv);
}
