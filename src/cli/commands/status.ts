import type { CommandModule } from 'yargs';
import type { CliContext, CliEntityKind } from '../lib/context';
import { clientFor, ENTITY_KINDS, withCatalog } from '../lib/context';

export interface StatusArgs {
  kind: CliEntityKind;
  name: string;
  json: boolean;
}

export function statusCommand(context: CliContext): CommandModule<object, StatusArgs> {
  return {
    command: 'status <kind> <name>',
    describe: 'Show whether an entity is enabled',
    builder: (yargs) =>
      yargs
        .positional('kind', { choices: ENTITY_KINDS, demandOption: true })
        .positional('name', { type: 'string', demandOption: true })
        .option('json', { type: 'boolean', description: 'Output as JSON', default: false }),
    handler: async (argv) => withCatalog(context, async (catalog) => {
      const status = await clientFor(catalog, argv.kind).status(argv.name);
      if (argv.json) {
        context.output.log(JSON.stringify({ name: argv.name, status: status ?? null }));
        return;
      }
      context.output.log(`${argv.name}: ${status ?? 'not found'}`);
    }),
  };
}
