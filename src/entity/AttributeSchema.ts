/**
 * AttributeSchema - 每种实体的属性表
 *
 * Field name → {wire key, type, required, allowed values}. Client records use
 * camelCase field names; the backend stores snake_case wire keys and, in its
 * attribute views, text values. Decoding therefore accepts both native JSON
 * values and their text encodings.
 */

export type AttributeType = 'string' | 'enum' | 'boolean' | 'number' | 'string[]' | 'object' | 'object[]';

export interface AttributeField<T> {
  readonly wire: string;
  readonly type: AttributeType;
  readonly required: boolean;
  readonly allowed?: readonly string[];
  /** Converts a stored or caller-supplied value into its typed form. */
  decode(raw: unknown): T | undefined;
  encode(value: T): unknown;
  /** Returns the problem with `value`, or undefined when it is acceptable. */
  check(value: unknown): string | undefined;
}

export type AttributeFields<A> = { readonly [K in keyof A]-?: AttributeField<NonNullable<A[K]>> };

type FieldTable = Readonly<Record<string, AttributeField<unknown>>>;

export interface AttributeDescriptor {
  name: string;
  wire: string;
  type: AttributeType;
  required: boolean;
  allowed?: readonly string[];
}

export interface AttributeChange {
  key: string;
  wire: string;
  before: unknown;
  after: unknown;
}

export class AttributeError extends Error {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AttributeError';
  }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRecord(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value));
}

function parseJsonText(raw: unknown): unknown {
  if (typeof raw !== 'string') {
    return raw;
  }
  const trimmed = raw.trim();
  if (!trimmed.startsWith('[') && !trimmed.startsWith('{')) {
    return raw;
  }
  return JSON.parse(trimmed);
}

export interface FieldOptions<T = unknown> {
  required?: boolean;
  /** Extra rule applied to a well-typed value, e.g. a range or a non-empty list. */
  rule?: (value: T) => string | undefined;
}

interface FieldImpl<T> {
  type: AttributeType;
  allowed?: readonly string[];
  decode(raw: unknown): T;
  typeCheck(value: unknown): string | undefined;
  encode?(value: T): unknown;
}

function makeField<T>(wire: string, options: FieldOptions<T>, impl: FieldImpl<T>): AttributeField<T> {
  const required = options.required ?? false;
  return {
    wire,
    type: impl.type,
    required,
    allowed: impl.allowed,
    decode: (raw) => {
      if (raw === undefined || raw === null) {
        return undefined;
      }
      try {
        return impl.decode(raw);
      } catch (error: unknown) {
        if (error instanceof AttributeError) {
          throw error;
        }
        throw new AttributeError(`"${wire}" could not be decoded: ${String(error)}`, { cause: error });
      }
    },
    encode: (value) => (impl.encode ? impl.encode(value) : value),
    check: (value) => {
      if (value === undefined) {
        return required ? 'is required' : undefined;
      }
      if (value === null) {
        return 'must not be null';
      }
      const problem = impl.typeCheck(value);
      if (problem || !options.rule) {
        return problem;
      }
      return options.rule(impl.decode(value));
    },
  };
}

function checkText(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return 'must be a string';
  }
  return value.trim().length === 0 ? 'must not be empty' : undefined;
}

function decodeText(raw: unknown): string {
  if (typeof raw === 'string') {
    return raw;
  }
  if (typeof raw === 'number' || typeof raw === 'boolean') {
    return String(raw);
  }
  throw new AttributeError(`expected text, got ${typeof raw}`);
}

export function stringField(wire: string, options: FieldOptions<string> = {}): AttributeField<string> {
  return makeField(wire, options, {
    type: 'string',
    decode: decodeText,
    typeCheck: checkText,
  });
}

export function enumField<T extends string>(
  wire: string,
  allowed: readonly T[],
  options: FieldOptions<T> = {},
): AttributeField<T> {
  const describe = `must be one of: ${allowed.join(', ')}`;
  return makeField(wire, options, {
    type: 'enum',
    allowed,
    decode: (raw) => {
      const text = decodeText(raw);
      const match = allowed.find((candidate) => candidate === text);
      if (match === undefined) {
        throw new AttributeError(`"${wire}" ${describe}`);
      }
      return match;
    },
    typeCheck: (value) => checkText(value) ?? (allowed.some((candidate) => candidate === value) ? undefined : describe),
  });
}

export function booleanField(wire: string, options: FieldOptions<boolean> = {}): AttributeField<boolean> {
  return makeField(wire, options, {
    type: 'boolean',
    decode: (raw) => {
      if (typeof raw === 'boolean') {
        return raw;
      }
      const text = decodeText(raw).trim().toLowerCase();
      if (text === 'true') {
        return true;
      }
      if (text === 'false') {
        return false;
      }
      throw new AttributeError(`"${wire}" must be true or false`);
    },
    typeCheck: (value) => (typeof value === 'boolean' ? undefined : 'must be a boolean'),
  });
}

export function numberField(wire: string, options: FieldOptions<number> = {}): AttributeField<number> {
  return makeField(wire, options, {
    type: 'number',
    decode: (raw) => {
      if (typeof raw === 'number') {
        return raw;
      }
      const text = decodeText(raw).trim();
      const parsed = Number(text);
      if (text.length === 0 || !Number.isFinite(parsed)) {
        throw new AttributeError(`"${wire}" must be a number`);
      }
      return parsed;
    },
    typeCheck: (value) => (typeof value === 'number' && Number.isFinite(value) ? undefined : 'must be a finite number'),
  });
}

export function stringListField(wire: string, options: FieldOptions<string[]> = {}): AttributeField<string[]> {
  return makeField(wire, options, {
    type: 'string[]',
    decode: (raw) => {
      const parsed = parseJsonText(raw);
      if (!Array.isArray(parsed)) {
        throw new AttributeError(`"${wire}" must be a list`);
      }
      return parsed.map(decodeText);
    },
    typeCheck: (value) => {
      if (!Array.isArray(value) || value.some((item) => checkText(item) !== undefined)) {
        return 'must be a list of non-empty strings';
      }
      return undefined;
    },
    encode: (value) => [ ...value ],
  });
}

export function objectField<T extends object>(
  wire: string,
  schema: AttributeSchema<T>,
  options: FieldOptions<T> = {},
): AttributeField<T> {
  return makeField(wire, options, {
    type: 'object',
    decode: (raw) => {
      const parsed = parseJsonText(raw);
      if (!isPlainObject(parsed)) {
        throw new AttributeError(`"${wire}" must be an object`);
      }
      return schema.decode(parsed);
    },
    typeCheck: (value) => {
      const problems = schema.validate(value);
      return problems.length > 0 ? problems.join(', ') : undefined;
    },
    encode: (value) => schema.encode(value),
  });
}

export function objectListField<T extends object>(
  wire: string,
  schema: AttributeSchema<T>,
  options: FieldOptions<T[]> = {},
): AttributeField<T[]> {
  return makeField(wire, options, {
    type: 'object[]',
    decode: (raw) => {
      const parsed = parseJsonText(raw);
      if (!Array.isArray(parsed)) {
        throw new AttributeError(`"${wire}" must be a list`);
      }
      return parsed.map((item: unknown) => {
        if (!isPlainObject(item)) {
          throw new AttributeError(`"${wire}" entries must be objects`);
        }
        return schema.decode(item);
      });
    },
    typeCheck: (value) => {
      if (!Array.isArray(value)) {
        return 'must be a list';
      }
      const problems = value.flatMap((item: unknown, index) =>
        schema.validate(item).map((problem) => `[${index}] ${problem}`));
      return problems.length > 0 ? problems.join(', ') : undefined;
    },
    encode: (value) => value.map((item) => schema.encode(item)),
  });
}

/**
 * Schema of one attributes record. Construct it with a field table that
 * covers every key of `A`; the compiler rejects a table that misses one.
 */
export class AttributeSchema<A extends object> {
  private readonly fields: FieldTable;
  private readonly wireToName: Map<string, string>;

  public constructor(fields: AttributeFields<A> & FieldTable) {
    this.fields = fields;
    this.wireToName = new Map(Object.entries(fields).map(([ name, field ]) => [ field.wire, name ]));
  }

  public keys(): string[] {
    return Object.keys(this.fields);
  }

  public describe(): AttributeDescriptor[] {
    return Object.entries(this.fields).map(([ name, field ]) => ({
      name,
      wire: field.wire,
      type: field.type,
      required: field.required,
      allowed: field.allowed,
    }));
  }

  /**
   * Resolves a field name or wire key to the field name, or undefined when
   * the key is unknown.
   */
  public resolveKey(key: string): string | undefined {
    if (Object.prototype.hasOwnProperty.call(this.fields, key)) {
      return key;
    }
    return this.wireToName.get(key);
  }

  public field(key: string): AttributeField<unknown> | undefined {
    const name = this.resolveKey(key);
    return name === undefined ? undefined : this.fields[name];
  }

  public validate(value: unknown): string[] {
    if (!isPlainObject(value)) {
      return [ 'must be an object' ];
    }
    const problems: string[] = [];
    for (const [ name, field ] of Object.entries(this.fields)) {
      const problem = field.check(value[name]);
      if (problem) {
        problems.push(`"${name}" ${problem}`);
      }
    }
    for (const key of Object.keys(value)) {
      if (!this.resolveKey(key)) {
        problems.push(`"${key}" is not a known attribute`);
      }
    }
    return problems;
  }

  public encode(value: A): Record<string, unknown> {
    const record = toRecord(value);
    const wire: Record<string, unknown> = {};
    for (const [ name, field ] of Object.entries(this.fields)) {
      const item = record[name];
      if (item !== undefined && item !== null) {
        wire[field.wire] = field.encode(item);
      }
    }
    return wire;
  }

  public decode(wire: Record<string, unknown>): A {
    const record: Record<string, unknown> = {};
    for (const [ name, field ] of Object.entries(this.fields)) {
      const decoded = field.decode(wire[field.wire] ?? wire[name]);
      if (decoded !== undefined) {
        record[name] = decoded;
      }
    }
    if (!this.isComplete(record)) {
      const missing = this.missingRequired(record);
      throw new AttributeError(`missing required attribute(s): ${missing.join(', ')}`);
    }
    return record;
  }

  /** Deep copy through the wire form. */
  public copy(value: A): A {
    return this.decode(this.encode(value));
  }

  public isComplete(value: unknown): value is A {
    return isPlainObject(value) && this.missingRequired(value).length === 0;
  }

  /**
   * Returns a copy of `attributes` with one field replaced. `raw` may be the
   * typed value or its text form.
   */
  public apply(attributes: A, key: string, raw: unknown): A {
    const name = this.resolveKey(key);
    if (name === undefined) {
      throw new AttributeError(`"${key}" is not a known attribute`);
    }
    const next = { ...toRecord(attributes), [name]: this.fields[name].decode(raw) };
    if (!this.isComplete(next)) {
      throw new AttributeError(`missing required attribute(s): ${this.missingRequired(next).join(', ')}`);
    }
    return next;
  }

  /**
   * Lists the fields whose wire form differs between two records.
   */
  public diff(before: A, after: A): AttributeChange[] {
    const left = this.encode(before);
    const right = this.encode(after);
    const changes: AttributeChange[] = [];
    for (const [ name, field ] of Object.entries(this.fields)) {
      if (JSON.stringify(left[field.wire]) !== JSON.stringify(right[field.wire])) {
        changes.push({ key: name, wire: field.wire, before: left[field.wire], after: right[field.wire] });
      }
    }
    return changes;
  }

  private missingRequired(record: Record<string, unknown>): string[] {
    return Object.entries(this.fields)
      .filter(([ name, field ]) => field.required && (record[name] === undefined || record[name] === null))
      .map(([ name ]) => name);
  }
}
