import { sql } from 'drizzle-orm';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { AgentDatabase, withSession } from '../../src/database/AgentDatabase';
import type { AgentSession } from '../../src/database/AgentDatabase';
import { poolManager } from '../../src/database/PostgresPoolManager';

const state = vi.hoisted(() => ({
  created: 0,
  ended: 0,
  releasedClients: 0,
}));

vi.mock('pg', () => {
  class FakeClient {
    public async query(): Promise<{ rows: unknown[] }> {
      return { rows: []};
    }

    public release(): void {
      state.releasedClients++;
    }
  }

  class Pool {
    public constructor() {
      state.created++;
    }

    public on(): this {
      return this;
    }

    public async connect(): Promise<FakeClient> {
      return new FakeClient();
    }

    public async end(): Promise<void> {
      state.ended++;
    }
  }

  return { Pool, default: { Pool }};
});

function recordingSession(): AgentSession & { releases: number } {
  return {
    releases: 0,
    execute: async () => [],
    release() {
      this.releases++;
    },
  };
}

describe('withSession', () => {
  it('releases the session after success and after failure', async () => {
    const session = recordingSession();
    const source = { acquire: async () => session };

    await expect(withSession(source, async () => 'ok')).resolves.toBe('ok');
    await expect(withSession(source, async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(session.releases).toBe(2);
  });
});

describe('AgentDatabase', () => {
  beforeEach(() => {
    state.created = 0;
    state.ended = 0;
    state.releasedClients = 0;
  });

  it('shares one pool per connection string and ends it with the last reference', async () => {
    const url = 'postgres://localhost/shared';
    const first = new AgentDatabase({ connectionString: url });
    const second = new AgentDatabase({ connectionString: url });

    expect(state.created).toBe(1);
    expect(poolManager.referenceCount(url)).toBe(2);

    await first.close();
    await first.close();
    expect(state.ended).toBe(0);
    expect(poolManager.referenceCount(url)).toBe(1);

    await second.close();
    expect(state.ended).toBe(1);
    expect(poolManager.referenceCount(url)).toBe(0);
  });

  it('releases a checked-out client exactly once', async () => {
    const database = new AgentDatabase({ connectionString: 'postgres://localhost/sessions' });

    const session = await database.acquire();
    session.release();
    session.release();

    expect(state.releasedClients).toBe(1);
    await expect(session.execute(sql`select 1`)).rejects.toThrow('Session already released');
    await database.close();
    await expect(database.acquire()).rejects.toThrow('AgentDatabase is closed');
  });
});
