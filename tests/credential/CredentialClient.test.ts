import { describe, expect, it } from 'vitest';
import { CredentialClient } from '../../src/credential/CredentialClient';
import { AlreadyExistsError, CredentialNotFoundError, ValidationError } from '../../src/errors/AgentErrors';
import { InMemoryAgentBackend } from '../helpers/InMemoryAgentBackend';

const credential = { credentialName: 'OPENAI_CRED', username: 'user', password: 'test-secret' };

describe('CredentialClient', () => {
  it('creates a credential once', async () => {
    const backend = new InMemoryAgentBackend();
    const credentials = new CredentialClient(backend);

    await credentials.create(credential);

    expect(backend.credentials.get('OPENAI_CRED')).toEqual(credential);
    await expect(credentials.create(credential)).rejects.toBeInstanceOf(AlreadyExistsError);
  });

  it('replaces by dropping and creating again', async () => {
    const backend = new InMemoryAgentBackend();
    const credentials = new CredentialClient(backend);
    await credentials.create(credential);

    await credentials.create({ ...credential, password: 'test-secret-2' }, { replace: true });

    expect(backend.credentials.get('OPENAI_CRED')?.password).toBe('test-secret-2');
    expect(backend.calls.map((call) => call.method)).toEqual([
      'createCredential',
      'createCredential',
      'dropCredential',
      'createCredential',
    ]);
  });

  it('validates before calling the backend', async () => {
    const backend = new InMemoryAgentBackend();
    const credentials = new CredentialClient(backend);

    await expect(credentials.create({ ...credential, password: '' })).rejects.toThrow(
      new ValidationError('ERR-20022: Invalid Credential "OPENAI_CRED": "password" must not be empty', { code: 'ERR-20022' }),
    );
    expect(backend.calls).toEqual([]);
  });

  it('deletes with or without force', async () => {
    const credentials = new CredentialClient(new InMemoryAgentBackend());

    await credentials.delete('MISSING', { force: true });
    await expect(credentials.delete('MISSING')).rejects.toBeInstanceOf(CredentialNotFoundError);
  });
});
