import { describe, expect, it } from 'vitest';
import { Profile, ProfileClient } from '../../src/agent/ProfileClient';
import { ProfileNotFoundError, ValidationError } from '../../src/errors/AgentErrors';
import { InMemoryAgentBackend } from '../helpers/InMemoryAgentBackend';

describe('ProfileClient', () => {
  it('round-trips every attribute type', async () => {
    const profiles = new ProfileClient(new InMemoryAgentBackend());
    const attributes = {
      provider: 'oci' as const,
      credentialName: 'OCI_CRED',
      model: 'meta.llama-3.1-70b-instruct',
      objectList: [{ owner: 'SH', name: 'SALES' }, { owner: 'HR' }],
      temperature: 0.3,
      maxTokens: 1024,
      comments: true,
      conversation: false,
      region: 'us-chicago-1',
    };

    await profiles.create({ name: 'OCI_PROFILE', description: 'OCI', attributes });
    const profile = await profiles.fetch('OCI_PROFILE');

    expect(profile).toBeInstanceOf(Profile);
    expect(profile.attributes).toEqual(attributes);
    expect(profile.description).toBe('OCI');
  });

  it('checks numeric ranges', async () => {
    const profiles = new ProfileClient(new InMemoryAgentBackend());

    await expect(profiles.create({
      name: 'HOT',
      attributes: { provider: 'openai', credentialName: 'C', temperature: 3, maxTokens: 0 },
    })).rejects.toThrow(
      'ERR-20046: Invalid Profile "HOT": "temperature" must be between 0 and 2; "maxTokens" must be a positive integer',
    );
  });

  it('checks numeric ranges on setAttribute', async () => {
    const backend = new InMemoryAgentBackend();
    const profiles = new ProfileClient(backend);

    await expect(profiles.setAttribute('P', 'temperature', 9)).rejects.toThrow(
      new ValidationError('ERR-20046: Invalid Profile "P": "temperature" must be between 0 and 2', { code: 'ERR-20046' }),
    );
    await expect(profiles.setAttribute('P', 'max_tokens', '0')).rejects.toThrow(
      'ERR-20046: Invalid Profile "P": "max_tokens" must be a positive integer',
    );
    expect(backend.callsTo('setAttribute')).toEqual([]);
  });

  it('uses the profile error id for backend failures', async () => {
    const profiles = new ProfileClient(new InMemoryAgentBackend());

    await expect(profiles.disable('NONE')).rejects.toEqual(
      expect.objectContaining({ name: 'ProfileNotFoundError', code: 'ERR-20046' }),
    );
    await expect(profiles.fetch('NONE')).rejects.toBeInstanceOf(ProfileNotFoundError);
  });
});
