import type { SQL } from 'drizzle-orm';
import { drizzle } from 'drizzle-orm/node-postgres';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import { getLoggerFor } from 'global-logger-factory';
import type { Pool, PoolClient } from 'pg';
import type { PoolConfig } from './PostgresPoolManager';
import { getSharedPool, releaseSharedPool } from './PostgresPoolManager';

export interface SqlExecutor {
  execute<T extends Record<string, unknown>>(statement: SQL): Promise<T[]>;
}

/**
 * One checked-out connection. Must be released exactly once.
 */
export interface AgentSession extends SqlExecutor {
  release(): void;
}

export interface SessionSource {
  acquire(): Promise<AgentSession>;
}

/**
 * Runs `work` on a fresh session and releases it on every exit path.
 */
export async function withSession<T>(source: SessionSource, work: (session: SqlExecutor) => Promise<T>): Promise<T> {
  const session = await source.acquire();
  try {
    return await work(session);
  } finally {
    session.release();
  }
}

class PooledSession implements AgentSession {
  private readonly db: NodePgDatabase;
  private released = false;

  public constructor(private readonly client: PoolClient) {
    this.db = drizzle(client);
  }

  public async execute<T extends Record<string, unknown>>(statement: SQL): Promise<T[]> {
    if (this.released) {
      throw new Error('Session already released');
    }
    const result = await this.db.execute<T>(statement);
    return result.rows;
  }

  public release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    this.client.release();
  }
}

export type AgentDatabaseOptions = PoolConfig;

/**
 * Owns a reference to a shared pool and hands out scoped sessions.
 */
export class AgentDatabase implements SessionSource {
  protected readonly logger = getLoggerFor(this);
  private readonly pool: Pool;
  private closed = false;

  public constructor(private readonly options: AgentDatabaseOptions) {
    this.pool = getSharedPool(options);
  }

  public async acquire(): Promise<AgentSession> {
    if (this.closed) {
      throw new Error('AgentDatabase is closed');
    }
    const client = await this.pool.connect();
    return new PooledSession(client);
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await releaseSharedPool(this.options);
    this.logger.debug('Released database pool');
  }
}
