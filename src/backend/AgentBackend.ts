import type { BackendKind } from '../entity/EntityKind';
import type { EntityRecord, EntityStatusType } from '../entity/types';

export interface CreateEntityRequest {
  name: string;
  description?: string;
  /** Wire-keyed attributes. */
  attributes: Record<string, unknown>;
  enabled: boolean;
  replace: boolean;
}

export interface CredentialRequest {
  credentialName: string;
  username: string;
  password: string;
}

/**
 * Remote call surface of the agent catalog. One method call is one round
 * trip; errors are thrown raw and decoded by the caller.
 */
export interface AgentBackend {
  create(kind: BackendKind, request: CreateEntityRequest): Promise<void>;
  fetch(kind: BackendKind, name: string): Promise<EntityRecord | undefined>;
  /** Lazily yields every entity whose name matches `pattern` (case-insensitive regex). */
  list(kind: BackendKind, pattern?: string): AsyncIterable<EntityRecord>;
  status(kind: BackendKind, name: string): Promise<EntityStatusType | undefined>;
  enable(kind: BackendKind, name: string): Promise<void>;
  disable(kind: BackendKind, name: string): Promise<void>;
  setAttribute(kind: BackendKind, name: string, key: string, value: unknown): Promise<void>;
  setAttributes(kind: BackendKind, name: string, attributes: Record<string, unknown>): Promise<void>;
  delete(kind: BackendKind, name: string, force: boolean): Promise<void>;
  runTeam(name: string, prompt: string, params: Record<string, unknown>): Promise<string>;
  createCredential(credential: CredentialRequest): Promise<void>;
  dropCredential(name: string, force: boolean): Promise<void>;
}
