import type { AgentCatalog, ConnectedAgentCatalog } from '../../AgentCatalog';
import { connectAgentCatalog } from '../../AgentCatalog';
import { loadClientConfig } from '../../config/ClientConfig';
import type { EntitySnapshot } from '../../entity/ManagedEntity';
import type { DeleteOptions, EntityStatusType } from '../../entity/types';
import { configureLogging } from '../../logging/ConfigurableLoggerFactory';

export const ENTITY_KINDS = [ 'profile', 'tool', 'task', 'agent', 'team' ] as const;
export type CliEntityKind = (typeof ENTITY_KINDS)[number];

interface SnapshotSource {
  toJSON(): EntitySnapshot<object>;
}

/**
 * The subset of an entity client the commands use, common to every kind.
 */
export interface CliEntityClient {
  list(pattern?: string): AsyncIterable<SnapshotSource>;
  fetch(name: string): Promise<SnapshotSource>;
  status(name: string): Promise<EntityStatusType | undefined>;
  enable(name: string): Promise<void>;
  disable(name: string): Promise<void>;
  delete(name: string, options?: DeleteOptions): Promise<void>;
  setAttribute(name: string, key: string, value: unknown): Promise<void>;
}

export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

export interface CliContext {
  openCatalog(): Promise<ConnectedAgentCatalog>;
  output: CliOutput;
}

export function clientFor(catalog: AgentCatalog, kind: CliEntityKind): CliEntityClient {
  switch (kind) {
    case 'profile': return catalog.profiles;
    case 'tool': return catalog.tools;
    case 'task': return catalog.tasks;
    case 'agent': return catalog.agents;
    case 'team': return catalog.teams;
  }
}

/**
 * Opens a catalog for one command and closes it afterwards. Failures are
 * printed and turn into a non-zero exit code.
 */
export async function withCatalog(
  context: CliContext,
  work: (catalog: AgentCatalog) => Promise<void>,
): Promise<void> {
  let catalog: ConnectedAgentCatalog | undefined;
  try {
    catalog = await context.openCatalog();
    await work(catalog);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    context.output.error(`Error: ${message}`);
    process.exitCode = 1;
  } finally {
    await catalog?.close();
  }
}

export function formatSnapshot(snapshot: EntitySnapshot<object>): string {
  const status = snapshot.status ?? '-';
  const description = snapshot.description ? `  ${snapshot.description}` : '';
  return `${snapshot.name.padEnd(24)} ${status.padEnd(8)}${description}`;
}

export const defaultContext: CliContext = {
  openCatalog: async () => {
    const config = loadClientConfig();
    configureLogging(config);
    return connectAgentCatalog(config);
  },
  output: {
    log: (line) => console.log(line),
    error: (line) => console.error(line),
  },
};
