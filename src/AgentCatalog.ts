/**
 * AgentCatalog - 目录入口
 *
 * Bundles one client per entity kind over a single backend.
 */

import { AgentClient } from './agent/AgentClient';
import { ProfileClient } from './agent/ProfileClient';
import { TaskClient } from './agent/TaskClient';
import { TeamClient } from './agent/TeamClient';
import { ToolClient } from './agent/ToolClient';
import type { AgentBackend } from './backend/AgentBackend';
import { PgAgentBackend } from './backend/PgAgentBackend';
import type { ClientConfig } from './config/ClientConfig';
import { CredentialClient } from './credential/CredentialClient';
import { AgentDatabase } from './database/AgentDatabase';

export interface AgentCatalog {
  profiles: ProfileClient;
  tools: ToolClient;
  tasks: TaskClient;
  agents: AgentClient;
  teams: TeamClient;
  credentials: CredentialClient;
}

export interface ConnectedAgentCatalog extends AgentCatalog {
  /** Releases this catalog's reference to the shared pool. */
  close(): Promise<void>;
}

export function createAgentCatalog(backend: AgentBackend): AgentCatalog {
  return {
    profiles: new ProfileClient(backend),
    tools: new ToolClient(backend),
    tasks: new TaskClient(backend),
    agents: new AgentClient(backend),
    teams: new TeamClient(backend),
    credentials: new CredentialClient(backend),
  };
}

export function connectAgentCatalog(
  config: Pick<ClientConfig, 'databaseUrl' | 'poolMax' | 'connectionTimeoutMillis'>,
): ConnectedAgentCatalog {
  const database = new AgentDatabase({
    connectionString: config.databaseUrl,
    max: config.poolMax,
    connectionTimeoutMillis: config.connectionTimeoutMillis,
  });
  return {
    ...createAgentCatalog(new PgAgentBackend(database)),
    close: async () => database.close(),
  };
}
