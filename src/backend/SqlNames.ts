import type { BackendKind } from '../entity/EntityKind';

export type LifecycleVerb = 'create' | 'drop' | 'enable' | 'disable';

export interface SqlNames {
  procedure(verb: LifecycleVerb): string;
  setAttribute: string;
  setAttributes: string;
  objectsView: string;
  attributesView: string;
  nameColumn: string;
}

function assertIdentifier(name: string): string {
  if (!/^[a-z][a-z0-9_]*(?:\.[a-z][a-z0-9_]*)?$/u.test(name)) {
    throw new Error(`Invalid identifier: "${name}". Only lowercase alphanumerics and underscore are allowed.`);
  }
  return name;
}

/**
 * Derives procedure, view and column names from a kind.
 * `tool` in `ai_agent` → `ai_agent.create_tool`, `user_ai_agent_tools`, `tool_name`.
 */
export function sqlNames(kind: BackendKind): SqlNames {
  return {
    procedure: (verb) => assertIdentifier(`${kind.packageName}.${verb}_${kind.id}`),
    setAttribute: assertIdentifier(`${kind.packageName}.set_attribute`),
    setAttributes: assertIdentifier(`${kind.packageName}.set_attributes`),
    objectsView: assertIdentifier(`user_${kind.table}s`),
    attributesView: assertIdentifier(`user_${kind.table}_attributes`),
    nameColumn: assertIdentifier(`${kind.id}_name`),
  };
}
