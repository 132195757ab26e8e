import type { CommandModule } from 'yargs';
import type { EntitySnapshot } from '../../entity/ManagedEntity';
import type { CliContext, CliEntityKind } from '../lib/context';
import { clientFor, ENTITY_KINDS, formatSnapshot, withCatalog } from '../lib/context';

export interface ListArgs {
  kind: CliEntityKind;
  pattern?: string;
  json: boolean;
}

export function listCommand(context: CliContext): CommandModule<object, ListArgs> {
  return {
    command: 'list <kind> [pattern]',
    describe: 'List entities whose name matches a case-insensitive regular expression',
    builder: (yargs) =>
      yargs
        .positional('kind', { choices: ENTITY_KINDS, demandOption: true })
        .positional('pattern', { type: 'string', description: 'Name pattern (default: all)' })
        .option('json', { type: 'boolean', description: 'Output as JSON', default: false }),
    handler: async (argv) => withCatalog(context, async (catalog) => {
      const snapshots: EntitySnapshot<object>[] = [];
      for await (const entity of clientFor(catalog, argv.kind).list(argv.pattern)) {
        snapshots.push(entity.toJSON());
      }
      if (argv.json) {
        context.output.log(JSON.stringify(snapshots, null, 2));
        return;
      }
      if (snapshots.length === 0) {
        context.output.log(`No ${argv.kind}s found.`);
        return;
      }
      for (const snapshot of snapshots) {
        context.output.log(formatSnapshot(snapshot));
      }
    }),
  };
}
