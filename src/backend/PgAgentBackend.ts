/**
 * PgAgentBackend - 基于 PostgreSQL 存储过程的远程调用实现
 *
 * Lifecycle operations are `CALL <package>.<verb>_<kind>(...)` with named
 * arguments; reads go through the `user_<table>s` and
 * `user_<table>_attributes` catalog views.
 */

import { sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import { getLoggerFor } from 'global-logger-factory';
import type { SessionSource } from '../database/AgentDatabase';
import { withSession } from '../database/AgentDatabase';
import { isPlainObject } from '../entity/AttributeSchema';
import type { BackendKind } from '../entity/EntityKind';
import type { EntityRecord, EntityStatusType } from '../entity/types';
import { parseEntityStatus } from '../entity/types';
import type { AgentBackend, CreateEntityRequest, CredentialRequest } from './AgentBackend';
import { sqlNames } from './SqlNames';

export const MATCH_ALL_PATTERN = '.*';

interface EntityRow extends Record<string, unknown> {
  name: string;
  description: string | null;
  status: string | null;
  attributes: unknown;
}

function toEntityRecord(row: EntityRow): EntityRecord {
  const attributes: unknown = typeof row.attributes === 'string' ? JSON.parse(row.attributes) : row.attributes;
  return {
    name: row.name,
    description: row.description ?? undefined,
    status: parseEntityStatus(row.status),
    attributes: isPlainObject(attributes) ? attributes : {},
  };
}

export class PgAgentBackend implements AgentBackend {
  protected readonly logger = getLoggerFor(this);

  public constructor(private readonly sessions: SessionSource) {}

  public async create(kind: BackendKind, request: CreateEntityRequest): Promise<void> {
    const names = sqlNames(kind);
    this.logger.debug(`CALL ${names.procedure('create')} for ${request.name}`);
    await this.run(sql`CALL ${sql.raw(names.procedure('create'))}(${sql.raw(names.nameColumn)} => ${request.name}, attributes => ${JSON.stringify(request.attributes)}::jsonb, status => ${request.enabled ? 'enabled' : 'disabled'}, description => ${request.description ?? null}, replace => ${request.replace})`);
  }

  public async fetch(kind: BackendKind, name: string): Promise<EntityRecord | undefined> {
    const names = sqlNames(kind);
    const rows = await withSession(this.sessions, (session) =>
      session.execute<EntityRow>(this.selectEntities(kind, sql`o.${sql.raw(names.nameColumn)} = ${name}`)));
    return rows.length > 0 ? toEntityRecord(rows[0]) : undefined;
  }

  public async *list(kind: BackendKind, pattern: string = MATCH_ALL_PATTERN): AsyncGenerator<EntityRecord> {
    const names = sqlNames(kind);
    const session = await this.sessions.acquire();
    try {
      const rows = await session.execute<EntityRow>(
        this.selectEntities(kind, sql`o.${sql.raw(names.nameColumn)} ~* ${pattern}`),
      );
      for (const row of rows) {
        yield toEntityRecord(row);
      }
    } finally {
      session.release();
    }
  }

  public async status(kind: BackendKind, name: string): Promise<EntityStatusType | undefined> {
    const names = sqlNames(kind);
    const rows = await withSession(this.sessions, (session) =>
      session.execute<{ status: string | null }>(
        sql`SELECT status FROM ${sql.raw(names.objectsView)} WHERE ${sql.raw(names.nameColumn)} = ${name}`,
      ));
    return rows.length > 0 ? parseEntityStatus(rows[0].status) : undefined;
  }

  public async enable(kind: BackendKind, name: string): Promise<void> {
    const names = sqlNames(kind);
    await this.run(sql`CALL ${sql.raw(names.procedure('enable'))}(${sql.raw(names.nameColumn)} => ${name})`);
  }

  public async disable(kind: BackendKind, name: string): Promise<void> {
    const names = sqlNames(kind);
    await this.run(sql`CALL ${sql.raw(names.procedure('disable'))}(${sql.raw(names.nameColumn)} => ${name})`);
  }

  public async setAttribute(kind: BackendKind, name: string, key: string, value: unknown): Promise<void> {
    const names = sqlNames(kind);
    await this.run(sql`CALL ${sql.raw(names.setAttribute)}(object_name => ${name}, object_type => ${kind.id}, attribute_name => ${key}, attribute_value => ${JSON.stringify(value)}::jsonb)`);
  }

  public async setAttributes(kind: BackendKind, name: string, attributes: Record<string, unknown>): Promise<void> {
    const names = sqlNames(kind);
    await this.run(sql`CALL ${sql.raw(names.setAttributes)}(object_name => ${name}, object_type => ${kind.id}, attributes => ${JSON.stringify(attributes)}::jsonb)`);
  }

  public async delete(kind: BackendKind, name: string, force: boolean): Promise<void> {
    const names = sqlNames(kind);
    await this.run(sql`CALL ${sql.raw(names.procedure('drop'))}(${sql.raw(names.nameColumn)} => ${name}, force => ${force})`);
  }

  public async runTeam(name: string, prompt: string, params: Record<string, unknown>): Promise<string> {
    const rows = await withSession(this.sessions, (session) =>
      session.execute<{ response: unknown }>(
        sql`SELECT ai_agent.run_team(team_name => ${name}, user_prompt => ${prompt}, params => ${JSON.stringify(params)}::jsonb) AS response`,
      ));
    const response = rows[0]?.response;
    if (typeof response === 'string') {
      return response;
    }
    return response === undefined || response === null ? '' : JSON.stringify(response);
  }

  public async createCredential(credential: CredentialRequest): Promise<void> {
    await this.run(sql`CALL ai_credential.create_credential(credential_name => ${credential.credentialName}, username => ${credential.username}, password => ${credential.password})`);
  }

  public async dropCredential(name: string, force: boolean): Promise<void> {
    await this.run(sql`CALL ai_credential.drop_credential(credential_name => ${name}, force => ${force})`);
  }

  protected selectEntities(kind: BackendKind, where: SQL): SQL {
    const names = sqlNames(kind);
    const column = sql.raw(names.nameColumn);
    return sql`SELECT o.${column} AS name, o.description, o.status, COALESCE((SELECT jsonb_object_agg(a.attribute_name, a.attribute_value) FROM ${sql.raw(names.attributesView)} a WHERE a.${column} = o.${column}), '{}'::jsonb) AS attributes FROM ${sql.raw(names.objectsView)} o WHERE ${where} ORDER BY o.${column}`;
  }

  private async run(statement: SQL): Promise<void> {
    await withSession(this.sessions, (session) => session.execute(statement));
  }
}
