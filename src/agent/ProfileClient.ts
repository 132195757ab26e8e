import type { AgentBackend } from '../backend/AgentBackend';
import { EntityClient } from '../entity/EntityClient';
import type { EntityKind } from '../entity/EntityKind';
import { ManagedEntity } from '../entity/ManagedEntity';
import type { EntityState } from '../entity/types';
import {
  AttributeSchema,
  booleanField,
  enumField,
  numberField,
  objectListField,
  stringField,
} from '../entity/AttributeSchema';
import { ErrorCode, ProfileNotFoundError } from '../errors/AgentErrors';

export const PROVIDERS = [
  'oci',
  'openai',
  'cohere',
  'azure',
  'google',
  'anthropic',
  'huggingface',
  'aws',
] as const;

export type Provider = (typeof PROVIDERS)[number];

export interface ProfileObject {
  owner: string;
  name?: string;
}

export interface ProfileAttributes {
  provider: Provider;
  credentialName: string;
  model?: string;
  objectList?: ProfileObject[];
  vectorIndexName?: string;
  temperature?: number;
  maxTokens?: number;
  comments?: boolean;
  conversation?: boolean;
  region?: string;
}

const profileObjectSchema = new AttributeSchema<ProfileObject>({
  owner: stringField('owner', { required: true }),
  name: stringField('name'),
});

export const profileSchema = new AttributeSchema<ProfileAttributes>({
  provider: enumField('provider', PROVIDERS, { required: true }),
  credentialName: stringField('credential_name', { required: true }),
  model: stringField('model'),
  objectList: objectListField('object_list', profileObjectSchema),
  vectorIndexName: stringField('vector_index_name'),
  temperature: numberField('temperature', {
    rule: (value) => (value < 0 || value > 2 ? 'must be between 0 and 2' : undefined),
  }),
  maxTokens: numberField('max_tokens', {
    rule: (value) => (Number.isInteger(value) && value > 0 ? undefined : 'must be a positive integer'),
  }),
  comments: booleanField('comments'),
  conversation: booleanField('conversation'),
  region: stringField('region'),
});

export const profileKind: EntityKind<ProfileAttributes> = {
  id: 'profile',
  label: 'Profile',
  packageName: 'ai_profile',
  table: 'ai_profile',
  errorCode: ErrorCode.PROFILE,
  schema: profileSchema,
  defaultEnabled: true,
  notFound: (name, message, init) => new ProfileNotFoundError(name, message, init),
};

/**
 * An AI profile: provider, credential and model settings that tools and
 * agents refer to by name.
 */
export class Profile extends ManagedEntity<ProfileAttributes> {}

export class ProfileClient extends EntityClient<ProfileAttributes, Profile> {
  public constructor(backend: AgentBackend) {
    super(backend, profileKind);
  }

  protected createHandle(state: EntityState<ProfileAttributes>): Profile {
    return new Profile(this, state);
  }
}
