import type { AgentBackend } from '../backend/AgentBackend';
import { AttributeSchema, booleanField, stringField } from '../entity/AttributeSchema';
import { EntityClient } from '../entity/EntityClient';
import type { EntityKind } from '../entity/EntityKind';
import { ManagedEntity } from '../entity/ManagedEntity';
import type { EntityState } from '../entity/types';
import { AgentNotFoundError, ErrorCode } from '../errors/AgentErrors';

export interface AgentAttributes {
  profileName: string;
  role: string;
  enableHumanTool?: boolean;
}

export const agentSchema = new AttributeSchema<AgentAttributes>({
  profileName: stringField('profile_name', { required: true }),
  role: stringField('role', { required: true }),
  enableHumanTool: booleanField('enable_human_tool'),
});

export const agentKind: EntityKind<AgentAttributes> = {
  id: 'agent',
  label: 'Agent',
  packageName: 'ai_agent',
  table: 'ai_agent',
  errorCode: ErrorCode.AGENT,
  schema: agentSchema,
  defaultEnabled: true,
  notFound: (name, message, init) => new AgentNotFoundError(name, message, init),
};

export class Agent extends ManagedEntity<AgentAttributes> {}

export class AgentClient extends EntityClient<AgentAttributes, Agent> {
  public constructor(backend: AgentBackend) {
    super(backend, agentKind);
  }

  protected createHandle(state: EntityState<AgentAttributes>): Agent {
    return new Agent(this, state);
  }
}
