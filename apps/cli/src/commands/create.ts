import { Command } from 'commander';
import type { GlobalOptions } from '../lib/config';
import { createCommandContext, runCommand, type CliDependencies } from '../lib/context';
import { formatProvisionSummary, printLines } from '../lib/output';
import { TableProvisioner } from '../lib/provisioner';
import { validateAll } from '../lib/validation';

type CreateOptions = {
  json?: boolean;
};

export function registerCreateCommand(program: Command, deps: CliDependencies = {}): void {
  program
    .command('create')
    .description(
      'Create a table bucket, namespace and table in that order. Resources that already exist are kept and reported.'
    )
    .argument('<table-bucket>', 'Table bucket name (3-63 characters: a-z, 0-9, -)')
    .argument('<namespace>', 'Namespace name (1-255 characters: a-z, 0-9, _)')
    .argument('<table>', 'Table name (1-255 characters: a-z, 0-9, _)')
    .option('--json', 'Print the result as JSON')
    .action(async (tableBucket: string, namespace: string, table: string, cmdOptions: CreateOptions) => {
      validateAll(tableBucket, namespace, table);

      const context = createCommandContext(program.opts<GlobalOptions>(), deps);
      const provisioner = new TableProvisioner({ catalog: context.catalog, logger: context.logger });

      const result = await runCommand(context, (signal) =>
        provisioner.ensure(tableBucket, namespace, table, { signal })
      );

      if (cmdOptions.json) {
        console.log(JSON.stringify(result, null, 2));
        return;
      }
      printLines(formatProvisionSummary(result));
    });
}
