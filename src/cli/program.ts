import yargs from 'yargs';
import type { Argv } from 'yargs';
import { deleteCommand, disableCommand, enableCommand } from './commands/lifecycle';
import { listCommand } from './commands/list';
import { runCommand } from './commands/run';
import { setCommand } from './commands/set';
import { showCommand } from './commands/show';
import { statusCommand } from './commands/status';
import type { CliContext } from './lib/context';
import { defaultContext } from './lib/context';

export function buildCli(argv: string[], context: CliContext = defaultContext): Argv {
  return yargs(argv)
    .scriptName('agentdb')
    .usage('$0 <command> [options]')
    .command(listCommand(context))
    .command(showCommand(context))
    .command(statusCommand(context))
    .command(enableCommand(context))
    .command(disableCommand(context))
    .command(deleteCommand(context))
    .command(setCommand(context))
    .command(runCommand(context))
    .demandCommand(1, 'Please specify a command')
    .strict()
    .help();
}
