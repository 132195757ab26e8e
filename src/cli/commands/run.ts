import type { CommandModule } from 'yargs';
import type { CliContext } from '../lib/context';
import { withCatalog } from '../lib/context';

export interface RunArgs {
  team: string;
  prompt: string;
  'conversation-id': string;
  json: boolean;
}

export function runCommand(context: CliContext): CommandModule<object, RunArgs> {
  return {
    command: 'run <team> <prompt>',
    describe: 'Send a prompt to a team',
    builder: (yargs) =>
      yargs
        .positional('team', { type: 'string', demandOption: true })
        .positional('prompt', { type: 'string', demandOption: true })
        .option('conversation-id', {
          alias: 'c',
          type: 'string',
          description: 'Conversation the prompt belongs to',
          demandOption: true,
        })
        .option('json', { type: 'boolean', description: 'Output as JSON', default: false }),
    handler: async (argv) => withCatalog(context, async (catalog) => {
      const response = await catalog.teams.run(argv.team, argv.prompt, { conversationId: argv.conversationId });
      if (argv.json) {
        context.output.log(JSON.stringify(typeof response === 'string' ? { content: response } : response));
        return;
      }
      context.output.log(typeof response === 'string' ? response : response.content);
      if (typeof response !== 'string' && response.state === 'needs_input') {
        context.output.error('(team is waiting for more input)');
      }
    }),
  };
}
