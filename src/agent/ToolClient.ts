/**
 * ToolClient - 工具实体
 *
 * A tool is either built in (`toolType`) or backed by a stored function
 * (`function`). Built-in tools take their settings from `toolParams`.
 */

import type { AgentBackend } from '../backend/AgentBackend';
import {
  AttributeSchema,
  enumField,
  objectField,
  objectListField,
  stringField,
} from '../entity/AttributeSchema';
import { EntityClient } from '../entity/EntityClient';
import type { EntityKind } from '../entity/EntityKind';
import { ManagedEntity } from '../entity/ManagedEntity';
import type { EntityState } from '../entity/types';
import { ErrorCode, ToolNotFoundError } from '../errors/AgentErrors';

export const TOOL_TYPES = [ 'SQL', 'RAG', 'WEBSEARCH', 'NOTIFICATION', 'HUMAN', 'HTTP' ] as const;
export type ToolType = (typeof TOOL_TYPES)[number];

export const NOTIFICATION_TYPES = [ 'EMAIL', 'SLACK' ] as const;
export type NotificationType = (typeof NOTIFICATION_TYPES)[number];

export interface ToolInput {
  name: string;
  description?: string;
}

export interface ToolParams {
  profileName?: string;
  credentialName?: string;
  notificationType?: NotificationType;
  recipient?: string;
  sender?: string;
  smtpHost?: string;
  slackChannel?: string;
  endpoint?: string;
}

export interface ToolAttributes {
  toolType?: ToolType;
  instruction?: string;
  function?: string;
  toolInputs?: ToolInput[];
  toolParams?: ToolParams;
}

const toolInputSchema = new AttributeSchema<ToolInput>({
  name: stringField('name', { required: true }),
  description: stringField('description'),
});

export const toolParamsSchema = new AttributeSchema<ToolParams>({
  profileName: stringField('profile_name'),
  credentialName: stringField('credential_name'),
  notificationType: enumField('notification_type', NOTIFICATION_TYPES),
  recipient: stringField('recipient'),
  sender: stringField('sender'),
  smtpHost: stringField('smtp_host'),
  slackChannel: stringField('slack_channel'),
  endpoint: stringField('endpoint'),
});

export const toolSchema = new AttributeSchema<ToolAttributes>({
  toolType: enumField('tool_type', TOOL_TYPES),
  instruction: stringField('instruction'),
  function: stringField('function'),
  toolInputs: objectListField('tool_inputs', toolInputSchema),
  toolParams: objectField('tool_params', toolParamsSchema),
});

export const toolKind: EntityKind<ToolAttributes> = {
  id: 'tool',
  label: 'Tool',
  packageName: 'ai_agent',
  table: 'ai_agent_tool',
  errorCode: ErrorCode.TOOL,
  schema: toolSchema,
  defaultEnabled: true,
  notFound: (name, message, init) => new ToolNotFoundError(name, message, init),
  constraints: (attributes) => {
    if (attributes.toolType === undefined && attributes.function === undefined) {
      return [ 'one of "toolType" or "function" is required' ];
    }
    if (attributes.toolType !== undefined && attributes.function !== undefined) {
      return [ '"toolType" and "function" are mutually exclusive' ];
    }
    return [];
  },
};

export class Tool extends ManagedEntity<ToolAttributes> {}

/** Options shared by the tool factories. */
export interface ToolFactoryOptions {
  description?: string;
  instruction?: string;
  replace?: boolean;
  enabled?: boolean;
}

export interface EmailNotificationSettings {
  credentialName: string;
  recipient: string;
  sender: string;
  smtpHost: string;
}

export interface SlackNotificationSettings {
  credentialName: string;
  slackChannel: string;
}

export interface HttpSettings {
  credentialName: string;
  endpoint: string;
}

export class ToolClient extends EntityClient<ToolAttributes, Tool> {
  public constructor(backend: AgentBackend) {
    super(backend, toolKind);
  }

  protected createHandle(state: EntityState<ToolAttributes>): Tool {
    return new Tool(this, state);
  }

  /** Natural-language-to-SQL over the objects of an AI profile. */
  public async createSqlTool(name: string, profileName: string, options: ToolFactoryOptions = {}): Promise<Tool> {
    return this.createTyped(name, 'SQL', { profileName }, options);
  }

  /** Retrieval over the vector index of an AI profile. */
  public async createRagTool(name: string, profileName: string, options: ToolFactoryOptions = {}): Promise<Tool> {
    return this.createTyped(name, 'RAG', { profileName }, options);
  }

  public async createWebSearchTool(
    name: string,
    credentialName: string,
    options: ToolFactoryOptions = {},
  ): Promise<Tool> {
    return this.createTyped(name, 'WEBSEARCH', { credentialName }, options);
  }

  public async createEmailNotificationTool(
    name: string,
    settings: EmailNotificationSettings,
    options: ToolFactoryOptions = {},
  ): Promise<Tool> {
    return this.createTyped(name, 'NOTIFICATION', { notificationType: 'EMAIL', ...settings }, options);
  }

  public async createSlackNotificationTool(
    name: string,
    settings: SlackNotificationSettings,
    options: ToolFactoryOptions = {},
  ): Promise<Tool> {
    return this.createTyped(name, 'NOTIFICATION', { notificationType: 'SLACK', ...settings }, options);
  }

  public async createHttpTool(name: string, settings: HttpSettings, options: ToolFactoryOptions = {}): Promise<Tool> {
    return this.createTyped(name, 'HTTP', { ...settings }, options);
  }

  /**
   * A tool that calls a stored database function. `toolInputs` describe the
   * function's arguments to the model.
   */
  public async createFunctionTool(
    name: string,
    functionName: string,
    options: ToolFactoryOptions & { toolInputs?: ToolInput[] } = {},
  ): Promise<Tool> {
    return this.create({
      name,
      description: options.description,
      attributes: {
        function: functionName,
        instruction: options.instruction,
        toolInputs: options.toolInputs,
      },
    }, { replace: options.replace, enabled: options.enabled });
  }

  /** A built-in tool that needs no parameters, such as `HUMAN`. */
  public async createBuiltInTool(name: string, toolType: ToolType, options: ToolFactoryOptions = {}): Promise<Tool> {
    return this.create({
      name,
      description: options.description,
      attributes: { toolType, instruction: options.instruction },
    }, { replace: options.replace, enabled: options.enabled });
  }

  private async createTyped(
    name: string,
    toolType: ToolType,
    toolParams: ToolParams,
    options: ToolFactoryOptions,
  ): Promise<Tool> {
    return this.create({
      name,
      description: options.description,
      attributes: { toolType, instruction: options.instruction, toolParams },
    }, { replace: options.replace, enabled: options.enabled });
  }
}
