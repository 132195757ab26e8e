import type { CommandModule } from 'yargs';
import type { CliContext, CliEntityKind } from '../lib/context';
import { clientFor, ENTITY_KINDS, withCatalog } from '../lib/context';

export interface SetArgs {
  kind: CliEntityKind;
  name: string;
  key: string;
  value: string;
}

/**
 * The value is passed in its text form; lists and records are written as
 * JSON (`'["T1","T2"]'`).
 */
export function setCommand(context: CliContext): CommandModule<object, SetArgs> {
  return {
    command: 'set <kind> <name> <key> <value>',
    describe: 'Update one attribute of an entity',
    builder: (yargs) =>
      yargs
        .positional('kind', { choices: ENTITY_KINDS, demandOption: true })
        .positional('name', { type: 'string', demandOption: true })
        .positional('key', { type: 'string', demandOption: true })
        .positional('value', { type: 'string', demandOption: true }),
    handler: async (argv) => withCatalog(context, async (catalog) => {
      await clientFor(catalog, argv.kind).setAttribute(argv.name, argv.key, argv.value);
      context.output.log(`Updated ${argv.key} of ${argv.kind} ${argv.name}`);
    }),
  };
}
