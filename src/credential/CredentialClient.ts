/**
 * CredentialClient - 命名凭据
 *
 * Entities refer to credentials by name only. The secret is passed through
 * to the backend once, at creation, and never logged or kept.
 */

import { getLoggerFor } from 'global-logger-factory';
import type { AgentBackend, CredentialRequest } from '../backend/AgentBackend';
import { AlreadyExistsError, CredentialNotFoundError, ErrorCode, ValidationError } from '../errors/AgentErrors';
import { decodeBackendError } from '../errors/BackendErrorDecoder';

export type CredentialDefinition = CredentialRequest;

export interface CredentialCreateOptions {
  replace?: boolean;
}

export interface CredentialDeleteOptions {
  force?: boolean;
}

export class CredentialClient {
  protected readonly logger = getLoggerFor(this);

  public constructor(private readonly backend: AgentBackend) {}

  /**
   * Stores a credential. With `replace`, an existing credential of the same
   * name is dropped and created again.
   */
  public async create(credential: CredentialDefinition, options: CredentialCreateOptions = {}): Promise<void> {
    this.assertValid(credential);
    try {
      await this.invoke(credential.credentialName, () => this.backend.createCredential(credential));
    } catch (error: unknown) {
      if (!(options.replace && error instanceof AlreadyExistsError)) {
        throw error;
      }
      this.logger.info(`Replacing credential ${credential.credentialName}`);
      await this.invoke(credential.credentialName, () => this.backend.dropCredential(credential.credentialName, true));
      await this.invoke(credential.credentialName, () => this.backend.createCredential(credential));
    }
    this.logger.info(`Created credential ${credential.credentialName}`);
  }

  public async delete(name: string, options: CredentialDeleteOptions = {}): Promise<void> {
    await this.invoke(name, () => this.backend.dropCredential(name, options.force ?? false));
    this.logger.info(`Deleted credential ${name}`);
  }

  private assertValid(credential: CredentialDefinition): void {
    const problems = ([ 'credentialName', 'username', 'password' ] as const)
      .filter((key) => typeof credential[key] !== 'string' || credential[key].trim().length === 0)
      .map((key) => `"${key}" must not be empty`);
    if (problems.length > 0) {
      throw new ValidationError(
        `${ErrorCode.CREDENTIAL}: Invalid Credential "${credential.credentialName}": ${problems.join('; ')}`,
        { code: ErrorCode.CREDENTIAL },
      );
    }
  }

  private async invoke(name: string, call: () => Promise<void>): Promise<void> {
    try {
      await call();
    } catch (error: unknown) {
      const decoded = decodeBackendError(error, {
        entityName: name,
        notFound: (entityName, message, init) => new CredentialNotFoundError(entityName, message, init),
      });
      const reason = decoded instanceof Error ? decoded.message : String(decoded);
      this.logger.warn(`Credential call for ${name} failed: ${reason}`);
      throw decoded;
    }
  }
}
