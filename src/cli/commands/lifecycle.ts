import type { CommandModule } from 'yargs';
import type { CliContext, CliEntityKind } from '../lib/context';
import { clientFor, ENTITY_KINDS, withCatalog } from '../lib/context';

export interface LifecycleArgs {
  kind: CliEntityKind;
  name: string;
}

export interface DeleteArgs extends LifecycleArgs {
  force: boolean;
}

export function enableCommand(context: CliContext): CommandModule<object, LifecycleArgs> {
  return {
    command: 'enable <kind> <name>',
    describe: 'Enable an entity',
    builder: (yargs) =>
      yargs
        .positional('kind', { choices: ENTITY_KINDS, demandOption: true })
        .positional('name', { type: 'string', demandOption: true }),
    handler: async (argv) => withCatalog(context, async (catalog) => {
      await clientFor(catalog, argv.kind).enable(argv.name);
      context.output.log(`Enabled ${argv.kind} ${argv.name}`);
    }),
  };
}

export function disableCommand(context: CliContext): CommandModule<object, LifecycleArgs> {
  return {
    command: 'disable <kind> <name>',
    describe: 'Disable an entity',
    builder: (yargs) =>
      yargs
        .positional('kind', { choices: ENTITY_KINDS, demandOption: true })
        .positional('name', { type: 'string', demandOption: true }),
    handler: async (argv) => withCatalog(context, async (catalog) => {
      await clientFor(catalog, argv.kind).disable(argv.name);
      context.output.log(`Disabled ${argv.kind} ${argv.name}`);
    }),
  };
}

export function deleteCommand(context: CliContext): CommandModule<object, DeleteArgs> {
  return {
    command: 'delete <kind> <name>',
    describe: 'Delete an entity',
    builder: (yargs) =>
      yargs
        .positional('kind', { choices: ENTITY_KINDS, demandOption: true })
        .positional('name', { type: 'string', demandOption: true })
        .option('force', {
          alias: 'f',
          type: 'boolean',
          description: 'Delete even when enabled or already gone',
          default: false,
        }),
    handler: async (argv) => withCatalog(context, async (catalog) => {
      await clientFor(catalog, argv.kind).delete(argv.name, { force: argv.force });
      context.output.log(`Deleted ${argv.kind} ${argv.name}`);
    }),
  };
}
