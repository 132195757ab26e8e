/**
 * Agent catalog 错误类型
 *
 * All backend failures reach the caller as one of these classes. The backend
 * message is kept verbatim in `message` so callers can match on the embedded
 * `ERR-NNNNN` identifier.
 */

export type DomainErrorCategory =
  | 'not_found'
  | 'already_exists'
  | 'validation'
  | 'invalid_state'
  | 'invalid_pattern'
  | 'rule_violation';

export const ErrorCode = {
  PROFILE: 'ERR-20046',
  AGENT: 'ERR-20050',
  TASK: 'ERR-20051',
  TOOL: 'ERR-20052',
  TEAM: 'ERR-20053',
  CREDENTIAL: 'ERR-20022',
  NOT_FOUND: 'NOT_FOUND',
} as const;

export interface DomainErrorInit {
  code: string;
  category: DomainErrorCategory;
  sqlState?: string;
  detail?: string;
  cause?: unknown;
}

export class AgentClientError extends Error {
  public constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AgentClientError';
  }
}

export class DomainError extends AgentClientError {
  public readonly category: DomainErrorCategory;
  public readonly sqlState?: string;
  public readonly detail?: string;

  public constructor(message: string, init: DomainErrorInit) {
    super(message, init.code, { cause: init.cause });
    this.name = 'DomainError';
    this.category = init.category;
    this.sqlState = init.sqlState;
    this.detail = init.detail;
  }
}

export class ValidationError extends DomainError {
  public constructor(message: string, init: Omit<DomainErrorInit, 'category'>) {
    super(message, { ...init, category: 'validation' });
    this.name = 'ValidationError';
  }
}

export class AlreadyExistsError extends DomainError {
  public constructor(message: string, init: Omit<DomainErrorInit, 'category'>) {
    super(message, { ...init, category: 'already_exists' });
    this.name = 'AlreadyExistsError';
  }
}

export type NotFoundErrorInit = Partial<Omit<DomainErrorInit, 'category'>>;

/**
 * The named entity does not exist for the requested operation.
 */
export class NotFoundError extends DomainError {
  public constructor(
    public readonly entityName: string,
    message: string,
    init: NotFoundErrorInit = {},
  ) {
    super(message, { ...init, code: init.code ?? ErrorCode.NOT_FOUND, category: 'not_found' });
    this.name = 'NotFoundError';
  }
}

export class ProfileNotFoundError extends NotFoundError {
  public constructor(name: string, message = `Profile "${name}" does not exist`, init?: NotFoundErrorInit) {
    super(name, message, init);
    this.name = 'ProfileNotFoundError';
  }
}

export class ToolNotFoundError extends NotFoundError {
  public constructor(name: string, message = `Tool "${name}" does not exist`, init?: NotFoundErrorInit) {
    super(name, message, init);
    this.name = 'ToolNotFoundError';
  }
}

export class TaskNotFoundError extends NotFoundError {
  public constructor(name: string, message = `Task "${name}" does not exist`, init?: NotFoundErrorInit) {
    super(name, message, init);
    this.name = 'TaskNotFoundError';
  }
}

export class AgentNotFoundError extends NotFoundError {
  public constructor(name: string, message = `Agent "${name}" does not exist`, init?: NotFoundErrorInit) {
    super(name, message, init);
    this.name = 'AgentNotFoundError';
  }
}

export class TeamNotFoundError extends NotFoundError {
  public constructor(name: string, message = `Team "${name}" does not exist`, init?: NotFoundErrorInit) {
    super(name, message, init);
    this.name = 'TeamNotFoundError';
  }
}

export class CredentialNotFoundError extends NotFoundError {
  public constructor(name: string, message = `Credential "${name}" does not exist`, init?: NotFoundErrorInit) {
    super(name, message, init);
    this.name = 'CredentialNotFoundError';
  }
}

export class ConfigurationError extends AgentClientError {
  public constructor(message: string) {
    super(message, 'CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}
