import type { NotFoundError, NotFoundErrorInit } from '../errors/AgentErrors';
import type { AttributeSchema } from './AttributeSchema';
import type { EntityKindId } from './types';

/**
 * Identity of a kind on the wire. The id, package and table name are what
 * the transport derives its procedure and view names from.
 */
export interface BackendKind {
  readonly id: EntityKindId;
  /** Package (schema) that owns the kind's procedures, e.g. `ai_agent`. */
  readonly packageName: string;
  /** Stem of the catalog views, e.g. `ai_agent_tool` → `user_ai_agent_tools`. */
  readonly table: string;
}

export interface EntityKind<A extends object> extends BackendKind {
  readonly label: string;
  /** Stable backend error identifier for this kind (`ERR-NNNNN`). */
  readonly errorCode: string;
  readonly schema: AttributeSchema<A>;
  readonly defaultEnabled: boolean;
  notFound(name: string, message?: string, init?: NotFoundErrorInit): NotFoundError;
  /** Cross-field rules the per-field schema cannot express. */
  constraints?(attributes: A): string[];
}
