/**
 * TeamClient - 团队实体与执行
 *
 * A team runs its agents over their tasks in `process` order. `run` is the
 * only call here that does more than manage catalog state.
 */

import type { AgentBackend } from '../backend/AgentBackend';
import { AttributeSchema, enumField, isPlainObject, objectListField, stringField } from '../entity/AttributeSchema';
import { EntityClient } from '../entity/EntityClient';
import type { EntityKind } from '../entity/EntityKind';
import type { EntityOperations } from '../entity/ManagedEntity';
import { ManagedEntity } from '../entity/ManagedEntity';
import type { EntityState } from '../entity/types';
import { ErrorCode, TeamNotFoundError } from '../errors/AgentErrors';
import { logContext } from '../logging/LogContext';

export const TEAM_PROCESSES = [ 'sequential' ] as const;
export type TeamProcess = (typeof TEAM_PROCESSES)[number];

export interface TeamMember {
  /** Agent name. */
  name: string;
  /** Task the agent performs. */
  task: string;
}

export interface TeamAttributes {
  agents: TeamMember[];
  process: TeamProcess;
}

export interface TeamRunParams {
  conversationId: string;
  [key: string]: unknown;
}

export const TEAM_RESPONSE_STATES = [ 'final', 'needs_input' ] as const;
export type TeamResponseState = (typeof TEAM_RESPONSE_STATES)[number];

export interface StructuredTeamResponse {
  state: TeamResponseState;
  content: string;
  raw: string;
}

export type TeamResponse = string | StructuredTeamResponse;

const teamMemberSchema = new AttributeSchema<TeamMember>({
  name: stringField('name', { required: true }),
  task: stringField('task', { required: true }),
});

export const teamSchema = new AttributeSchema<TeamAttributes>({
  agents: objectListField('agents', teamMemberSchema, {
    required: true,
    rule: (value) => (value.length === 0 ? 'must not be empty' : undefined),
  }),
  process: enumField('process', TEAM_PROCESSES, { required: true }),
});

export const teamKind: EntityKind<TeamAttributes> = {
  id: 'team',
  label: 'Team',
  packageName: 'ai_agent',
  table: 'ai_agent_team',
  errorCode: ErrorCode.TEAM,
  schema: teamSchema,
  defaultEnabled: true,
  notFound: (name, message, init) => new TeamNotFoundError(name, message, init),
};

function isResponseState(value: unknown): value is TeamResponseState {
  return TEAM_RESPONSE_STATES.some((state) => state === value);
}

/**
 * Returns the structured form when `raw` is a JSON envelope with a known
 * `state` and a string `content`; otherwise `raw` itself.
 */
export function parseTeamResponse(raw: string): TeamResponse {
  const trimmed = raw.trim();
  if (!trimmed.startsWith('{')) {
    return raw;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return raw;
  }
  if (isPlainObject(parsed) && isResponseState(parsed.state) && typeof parsed.content === 'string') {
    return { state: parsed.state, content: parsed.content, raw };
  }
  return raw;
}

export class TeamClient extends EntityClient<TeamAttributes, Team> {
  public constructor(backend: AgentBackend) {
    super(backend, teamKind);
  }

  protected createHandle(state: EntityState<TeamAttributes>): Team {
    return new Team(this, state, this);
  }

  /**
   * Sends `prompt` to the team within the conversation named by
   * `params.conversationId`. Remaining params are forwarded with snake_case
   * keys.
   */
  public async run(name: string, prompt: string, params: TeamRunParams): Promise<TeamResponse> {
    const { conversationId, ...rest } = params;
    if (typeof conversationId !== 'string' || conversationId.trim().length === 0) {
      throw this.invalid(name, [ '"conversationId" is required to run a team' ]);
    }
    if (typeof prompt !== 'string' || prompt.trim().length === 0) {
      throw this.invalid(name, [ 'prompt must not be empty' ]);
    }
    const wireParams: Record<string, unknown> = { conversation_id: conversationId };
    for (const [ key, value ] of Object.entries(rest)) {
      wireParams[toSnakeCase(key)] = value;
    }

    return logContext.run({ conversationId }, async () => {
      this.logger.info(`Running team ${name}`);
      const raw = await this.invoke('run', name, () => this.backend.runTeam(name, prompt, wireParams));
      const response = parseTeamResponse(raw);
      this.logger.debug(`Team ${name} answered (${typeof response === 'string' ? 'text' : response.state})`);
      return response;
    });
  }
}

export function toSnakeCase(key: string): string {
  return key.replace(/[A-Z]/gu, (letter) => `_${letter.toLowerCase()}`);
}

export class Team extends ManagedEntity<TeamAttributes> {
  public constructor(
    operations: EntityOperations<TeamAttributes>,
    state: EntityState<TeamAttributes>,
    private readonly runner: Pick<TeamClient, 'run'>,
  ) {
    super(operations, state);
  }

  public async run(prompt: string, params: TeamRunParams): Promise<TeamResponse> {
    return this.runner.run(this.name, prompt, params);
  }
}
