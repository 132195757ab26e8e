/**
 * PostgresPoolManager - 共享 PostgreSQL 连接池管理器
 *
 * Catalog instances opened against the same database share one pool; the
 * pool is ended when the last reference is released.
 */

import { Pool } from 'pg';
import { getLoggerFor } from 'global-logger-factory';

export interface PoolConfig {
  connectionString: string;
  max?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}

interface PoolEntry {
  pool: Pool;
  refCount: number;
}

class PoolManager {
  private readonly logger = getLoggerFor('PostgresPoolManager');
  private readonly pools = new Map<string, PoolEntry>();
  private readonly defaultConfig: Omit<PoolConfig, 'connectionString'> = {
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  };

  /**
   * 获取或创建连接池
   */
  public getPool(config: PoolConfig): Pool {
    const key = config.connectionString;

    let entry = this.pools.get(key);
    if (!entry) {
      const pool = new Pool({ ...this.defaultConfig, ...config });
      // Idle client errors surface again on the next query
      pool.on('error', (error: Error) => {
        this.logger.warn(`Idle PostgreSQL client error: ${error.message}`);
      });
      entry = { pool, refCount: 0 };
      this.pools.set(key, entry);
    }

    entry.refCount++;
    return entry.pool;
  }

  /**
   * 释放连接池引用，引用归零时关闭
   */
  public async releasePool(config: PoolConfig): Promise<void> {
    const key = config.connectionString;
    const entry = this.pools.get(key);
    if (!entry) {
      return;
    }

    entry.refCount--;
    if (entry.refCount > 0) {
      return;
    }
    this.pools.delete(key);
    await entry.pool.end();
  }

  public referenceCount(connectionString: string): number {
    return this.pools.get(connectionString)?.refCount ?? 0;
  }
}

const poolManager = new PoolManager();

export function getSharedPool(config: PoolConfig): Pool {
  return poolManager.getPool(config);
}

export async function releaseSharedPool(config: PoolConfig): Promise<void> {
  await poolManager.releasePool(config);
}

export { poolManager };
