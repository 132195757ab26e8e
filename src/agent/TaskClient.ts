import type { AgentBackend } from '../backend/AgentBackend';
import { AttributeSchema, booleanField, stringField, stringListField } from '../entity/AttributeSchema';
import { EntityClient } from '../entity/EntityClient';
import type { EntityKind } from '../entity/EntityKind';
import { ManagedEntity } from '../entity/ManagedEntity';
import type { EntityState } from '../entity/types';
import { ErrorCode, TaskNotFoundError } from '../errors/AgentErrors';

export interface TaskAttributes {
  instruction: string;
  /** Names of the tools the task may call. */
  tools?: string[];
  /** Name of an upstream task whose output feeds this one. */
  input?: string;
  enableHumanTool?: boolean;
}

export const taskSchema = new AttributeSchema<TaskAttributes>({
  instruction: stringField('instruction', { required: true }),
  tools: stringListField('tools'),
  input: stringField('input'),
  enableHumanTool: booleanField('enable_human_tool'),
});

export const taskKind: EntityKind<TaskAttributes> = {
  id: 'task',
  label: 'Task',
  packageName: 'ai_agent',
  table: 'ai_agent_task',
  errorCode: ErrorCode.TASK,
  schema: taskSchema,
  defaultEnabled: true,
  notFound: (name, message, init) => new TaskNotFoundError(name, message, init),
};

export class Task extends ManagedEntity<TaskAttributes> {}

export class TaskClient extends EntityClient<TaskAttributes, Task> {
  public constructor(backend: AgentBackend) {
    super(backend, taskKind);
  }

  protected createHandle(state: EntityState<TaskAttributes>): Task {
    return new Task(this, state);
  }
}
