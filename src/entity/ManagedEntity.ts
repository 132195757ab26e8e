import type { AttributeChange } from './AttributeSchema';
import type { EntityKind } from './EntityKind';
import type {
  CreateOptions,
  DeleteOptions,
  EntityDefinition,
  EntityState,
  EntityStatusType,
} from './types';
import { EntityStatus } from './types';

/**
 * The client operations an entity handle delegates to.
 */
export interface EntityOperations<A extends object> {
  readonly kind: EntityKind<A>;
  create(definition: EntityDefinition<A>, options?: CreateOptions): Promise<unknown>;
  fetch(name: string): Promise<ManagedEntity<A>>;
  status(name: string): Promise<EntityStatusType | undefined>;
  enable(name: string): Promise<void>;
  disable(name: string): Promise<void>;
  setAttribute(name: string, key: string, value: unknown, current?: A): Promise<void>;
  setAttributes(name: string, attributes: A, previous?: A): Promise<AttributeChange[]>;
  delete(name: string, options?: DeleteOptions): Promise<void>;
}

export interface EntitySnapshot<A> {
  name: string;
  description?: string;
  status?: EntityStatusType;
  attributes: A;
}

/**
 * In-memory view of one named entity. Local fields change only after the
 * corresponding remote call has succeeded.
 */
export class ManagedEntity<A extends object> {
  public readonly name: string;
  public description?: string;
  public attributes: A;
  /** Last status known to this handle; `undefined` once deleted. */
  public status?: EntityStatusType;

  public constructor(protected readonly operations: EntityOperations<A>, state: EntityState<A>) {
    this.name = state.name;
    this.description = state.description;
    this.attributes = state.attributes;
    this.status = state.status;
  }

  public async create(options: CreateOptions = {}): Promise<this> {
    await this.operations.create(this.toDefinition(), options);
    const enabled = options.enabled ?? this.operations.kind.defaultEnabled;
    this.status = enabled ? EntityStatus.ENABLED : EntityStatus.DISABLED;
    return this;
  }

  public async enable(): Promise<void> {
    await this.operations.enable(this.name);
    this.status = EntityStatus.ENABLED;
  }

  public async disable(): Promise<void> {
    await this.operations.disable(this.name);
    this.status = EntityStatus.DISABLED;
  }

  public async setAttribute(key: string, value: unknown): Promise<void> {
    await this.operations.setAttribute(this.name, key, value, this.attributes);
    this.attributes = this.operations.kind.schema.apply(this.attributes, key, value);
  }

  public async setAttributes(attributes: A): Promise<AttributeChange[]> {
    const changes = await this.operations.setAttributes(this.name, attributes, this.attributes);
    this.attributes = this.operations.kind.schema.copy(attributes);
    return changes;
  }

  public async delete(options: DeleteOptions = {}): Promise<void> {
    await this.operations.delete(this.name, options);
    this.status = undefined;
  }

  /**
   * Re-reads description, attributes and status from the backend.
   */
  public async refresh(): Promise<this> {
    const latest = await this.operations.fetch(this.name);
    this.description = latest.description;
    this.attributes = latest.attributes;
    this.status = latest.status;
    return this;
  }

  public async currentStatus(): Promise<EntityStatusType | undefined> {
    return this.operations.status(this.name);
  }

  public toDefinition(): EntityDefinition<A> {
    return { name: this.name, description: this.description, attributes: this.attributes };
  }

  public toJSON(): EntitySnapshot<A> {
    return {
      name: this.name,
      description: this.description,
      status: this.status,
      attributes: this.attributes,
    };
  }
}
