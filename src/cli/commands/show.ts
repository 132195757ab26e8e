import type { CommandModule } from 'yargs';
import type { CliContext, CliEntityKind } from '../lib/context';
import { clientFor, ENTITY_KINDS, formatSnapshot, withCatalog } from '../lib/context';

export interface ShowArgs {
  kind: CliEntityKind;
  name: string;
  json: boolean;
}

export function showCommand(context: CliContext): CommandModule<object, ShowArgs> {
  return {
    command: 'show <kind> <name>',
    describe: 'Show one entity with its attributes',
    builder: (yargs) =>
      yargs
        .positional('kind', { choices: ENTITY_KINDS, demandOption: true })
        .positional('name', { type: 'string', demandOption: true })
        .option('json', { type: 'boolean', description: 'Output as JSON', default: false }),
    handler: async (argv) => withCatalog(context, async (catalog) => {
      const snapshot = (await clientFor(catalog, argv.kind).fetch(argv.name)).toJSON();
      if (argv.json) {
        context.output.log(JSON.stringify(snapshot, null, 2));
        return;
      }
      context.output.log(formatSnapshot(snapshot));
      for (const [ key, value ] of Object.entries(snapshot.attributes)) {
        context.output.log(`  ${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`);
      }
    }),
  };
}
