/**
 * 实体状态，由服务端维护，只能通过 enable()/disable() 修改
 */
export const EntityStatus = {
  ENABLED: 'ENABLED',
  DISABLED: 'DISABLED',
} as const;

export type EntityStatusType = (typeof EntityStatus)[keyof typeof EntityStatus];

export type EntityKindId = 'profile' | 'tool' | 'task' | 'agent' | 'team';

export function parseEntityStatus(value: unknown): EntityStatusType | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const upper = value.trim().toUpperCase();
  if (upper === EntityStatus.ENABLED || upper === EntityStatus.DISABLED) {
    return upper;
  }
  return undefined;
}

/**
 * Entity as the backend returns it: wire attribute keys, values possibly
 * text-encoded.
 */
export interface EntityRecord {
  name: string;
  description?: string;
  status?: EntityStatusType;
  attributes: Record<string, unknown>;
}

/**
 * What a caller supplies to create an entity.
 */
export interface EntityDefinition<A> {
  name: string;
  description?: string;
  attributes: A;
}

export interface EntityState<A> extends EntityDefinition<A> {
  status?: EntityStatusType;
}

export interface CreateOptions {
  /** Defaults to the kind's default (enabled). */
  enabled?: boolean;
  replace?: boolean;
}

export interface DeleteOptions {
  force?: boolean;
}
