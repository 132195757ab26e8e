/**
 * EntityClient - 单一实体类型的生命周期客户端
 *
 * Every call is one backend round trip. Attribute problems the client can
 * see locally are raised before any remote call; everything the backend
 * rejects is decoded once, here, into the typed error hierarchy.
 */

import { getLoggerFor } from 'global-logger-factory';
import type { AgentBackend } from '../backend/AgentBackend';
import { ValidationError } from '../errors/AgentErrors';
import { decodeBackendError } from '../errors/BackendErrorDecoder';
import type { AttributeChange } from './AttributeSchema';
import { AttributeError } from './AttributeSchema';
import type { EntityKind } from './EntityKind';
import type { EntityOperations, ManagedEntity } from './ManagedEntity';
import type {
  CreateOptions,
  DeleteOptions,
  EntityDefinition,
  EntityRecord,
  EntityState,
  EntityStatusType,
} from './types';

export abstract class EntityClient<A extends object, E extends ManagedEntity<A> = ManagedEntity<A>>
implements EntityOperations<A> {
  protected readonly logger = getLoggerFor(this);

  public constructor(
    protected readonly backend: AgentBackend,
    public readonly kind: EntityKind<A>,
  ) {}

  /**
   * Builds a local handle without contacting the backend. Call `create()` on
   * it to persist.
   */
  public define(definition: EntityDefinition<A>): E {
    return this.createHandle({ ...definition, status: undefined });
  }

  public async create(definition: EntityDefinition<A>, options: CreateOptions = {}): Promise<E> {
    this.assertValid(definition.name, definition.attributes);
    const enabled = options.enabled ?? this.kind.defaultEnabled;
    await this.invoke('create', definition.name, () => this.backend.create(this.kind, {
      name: definition.name,
      description: definition.description,
      attributes: this.kind.schema.encode(definition.attributes),
      enabled,
      replace: options.replace ?? false,
    }));
    this.logger.info(`Created ${this.kind.label} ${definition.name}`);
    return this.createHandle({
      ...definition,
      attributes: this.kind.schema.copy(definition.attributes),
      status: enabled ? 'ENABLED' : 'DISABLED',
    });
  }

  public async fetch(name: string): Promise<E> {
    const record = await this.invoke('fetch', name, () => this.backend.fetch(this.kind, name));
    if (!record) {
      throw this.kind.notFound(name);
    }
    return this.toHandle(record);
  }

  /**
   * Yields every entity of this kind whose name matches `pattern`, a
   * case-insensitive regular expression. The default matches all.
   */
  public async *list(pattern?: string): AsyncGenerator<E> {
    try {
      for await (const record of this.backend.list(this.kind, pattern)) {
        yield this.toHandle(record);
      }
    } catch (error: unknown) {
      throw this.translate('list', pattern ?? '', error);
    }
  }

  public async status(name: string): Promise<EntityStatusType | undefined> {
    return this.invoke('status', name, () => this.backend.status(this.kind, name));
  }

  public async enable(name: string): Promise<void> {
    await this.invoke('enable', name, () => this.backend.enable(this.kind, name));
  }

  public async disable(name: string): Promise<void> {
    await this.invoke('disable', name, () => this.backend.disable(this.kind, name));
  }

  /**
   * Updates one attribute. `key` may be the field name or its wire key; the
   * value may be typed or in its text form. When `current` is given, the
   * kind's cross-field rules are checked against the record that results.
   */
  public async setAttribute(name: string, key: string, value: unknown, current?: A): Promise<void> {
    const field = this.kind.schema.field(key);
    if (!field) {
      throw this.invalid(name, [ `"${key}" is not a known attribute` ]);
    }
    if (value === undefined || value === null) {
      throw this.invalid(name, [ `"${key}" must have a value` ]);
    }
    let decoded: unknown;
    let candidate: A | undefined;
    try {
      decoded = field.decode(value);
      candidate = current && this.kind.schema.apply(current, key, decoded);
    } catch (error: unknown) {
      if (error instanceof AttributeError) {
        throw this.invalid(name, [ error.message ], error);
      }
      throw error;
    }
    const problem = field.check(decoded);
    if (problem) {
      throw this.invalid(name, [ `"${key}" ${problem}` ]);
    }
    const problems = candidate && this.kind.constraints ? this.kind.constraints(candidate) : [];
    if (problems.length > 0) {
      throw this.invalid(name, problems);
    }
    await this.invoke('setAttribute', name, () =>
      this.backend.setAttribute(this.kind, name, field.wire, field.encode(decoded)));
  }

  /**
   * Replaces the attribute set in one call and reports which fields changed
   * relative to `previous`, when given.
   */
  public async setAttributes(name: string, attributes: A, previous?: A): Promise<AttributeChange[]> {
    this.assertValid(name, attributes);
    await this.invoke('setAttributes', name, () =>
      this.backend.setAttributes(this.kind, name, this.kind.schema.encode(attributes)));
    return previous ? this.kind.schema.diff(previous, attributes) : [];
  }

  public async delete(name: string, options: DeleteOptions = {}): Promise<void> {
    await this.invoke('delete', name, () => this.backend.delete(this.kind, name, options.force ?? false));
    this.logger.info(`Deleted ${this.kind.label} ${name}`);
  }

  /** Wraps a state in the kind's handle class. */
  protected abstract createHandle(state: EntityState<A>): E;

  protected toHandle(record: EntityRecord): E {
    let attributes: A;
    try {
      attributes = this.kind.schema.decode(record.attributes);
    } catch (error: unknown) {
      if (error instanceof AttributeError) {
        throw this.invalid(record.name, [ error.message ], error);
      }
      throw error;
    }
    return this.createHandle({
      name: record.name,
      description: record.description,
      status: record.status,
      attributes,
    });
  }

  protected assertValid(name: string, attributes: A): void {
    const problems: string[] = [];
    if (typeof name !== 'string' || name.trim().length === 0) {
      problems.push('name must not be empty');
    }
    const fieldProblems = this.kind.schema.validate(attributes);
    problems.push(...fieldProblems);
    if (fieldProblems.length === 0 && this.kind.constraints) {
      problems.push(...this.kind.constraints(attributes));
    }
    if (problems.length > 0) {
      throw this.invalid(name, problems);
    }
  }

  protected invalid(name: string, problems: string[], cause?: unknown): ValidationError {
    return new ValidationError(
      `${this.kind.errorCode}: Invalid ${this.kind.label} "${name}": ${problems.join('; ')}`,
      { code: this.kind.errorCode, cause },
    );
  }

  protected async invoke<T>(operation: string, name: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error: unknown) {
      throw this.translate(operation, name, error);
    }
  }

  private translate(operation: string, name: string, error: unknown): unknown {
    const decoded = decodeBackendError(error, {
      entityName: name,
      notFound: (entityName, message, init) => this.kind.notFound(entityName, message, init),
    });
    const reason = decoded instanceof Error ? decoded.message : String(decoded);
    this.logger.warn(`${this.kind.label} ${operation} ${name} failed: ${reason}`);
    return decoded;
  }
}
