import { Command } from 'commander';
import { resolveTableBucketArn } from '@s3t/tables-client';
import type { GlobalOptions } from '../lib/config';
import { createCommandContext, runCommand, type CliDependencies, type CommandContext } from '../lib/context';
import { NavigationController } from '../lib/navigator';
import { formatTableDetails, printLines } from '../lib/output';

async function showTableDetails(
  context: CommandContext,
  signal: AbortSignal,
  tableBucket: string,
  namespace: string,
  table: string
): Promise<void> {
  const tableBucketArn = await resolveTableBucketArn(context.catalog, tableBucket, { signal });
  const details = await context.catalog.getTableDetails(tableBucketArn, namespace, table, { signal });
  printLines([...formatTableDetails(details), '']);
}

async function browse(
  context: CommandContext,
  signal: AbortSignal,
  tableBucket: string | undefined,
  namespace: string | undefined
): Promise<void> {
  const controller = new NavigationController({
    catalog: context.catalog,
    picker: context.picker,
    logger: context.logger,
    signal
  });

  if (!tableBucket) {
    await controller.runSession('TableBucket');
    return;
  }

  const bucketArn = await resolveTableBucketArn(context.catalog, tableBucket, { signal });
  if (!namespace) {
    await controller.runSession('Namespace', { bucketName: tableBucket, bucketArn });
    return;
  }
  await controller.runSession('Table', { bucketName: tableBucket, bucketArn, namespace });
}

export function registerListCommand(program: Command, deps: CliDependencies = {}): void {
  program
    .command('list')
    .description(
      [
        'Browse table buckets, namespaces and tables interactively.',
        'Type to filter, choose ".. (Back)" to go up a level, Ctrl+C to quit.',
        'With a table bucket the session starts at its namespaces, with a namespace at its tables;',
        'with all three arguments the table details are printed directly.'
      ].join('\n')
    )
    .argument('[table-bucket]', 'Table bucket to start from')
    .argument('[namespace]', 'Namespace to start from')
    .argument('[table]', 'Table to describe')
    .action(async (tableBucket: string | undefined, namespace: string | undefined, table: string | undefined) => {
      const context = createCommandContext(program.opts<GlobalOptions>(), deps);

      await runCommand(context, async (signal) => {
        if (tableBucket && namespace && table) {
          await showTableDetails(context, signal, tableBucket, namespace, table);
          return;
        }
        await browse(context, signal, tableBucket, namespace);
      });
    });
}
