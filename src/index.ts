export * from './agent/AgentClient';
export * from './agent/ProfileClient';
export * from './agent/TaskClient';
export * from './agent/TeamClient';
export * from './agent/ToolClient';
export * from './AgentCatalog';
export * from './backend/AgentBackend';
export * from './backend/PgAgentBackend';
export * from './backend/SqlNames';
export * from './config/ClientConfig';
export * from './credential/CredentialClient';
export * from './database/AgentDatabase';
export * from './database/PostgresPoolManager';
export * from './entity/AttributeSchema';
export * from './entity/EntityClient';
export * from './entity/EntityKind';
export * from './entity/ManagedEntity';
export * from './entity/types';
export * from './errors/AgentErrors';
export * from './errors/BackendErrorDecoder';
export * from './logging/ConfigurableLoggerFactory';
export * from './logging/LogContext';
