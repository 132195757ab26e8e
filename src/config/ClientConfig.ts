import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { ConfigurationError } from '../errors/AgentErrors';

export interface ClientConfig {
  /** PostgreSQL connection string of the agent catalog. */
  databaseUrl: string;
  poolMax: number;
  connectionTimeoutMillis: number;
  logLevel: string;
  /** Rotating log file pattern; `false` disables file logging. */
  logFile: string | false;
}

export interface LoadConfigOptions {
  /** Directory searched for `.env.local` and `.env`. Defaults to the working directory. */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<ClientConfig>;
}

export const ENV_FILES = [ '.env.local', '.env' ];

const LOG_LEVELS = [ 'error', 'warn', 'info', 'verbose', 'debug', 'silly' ];

/**
 * Reads the env files, earlier files winning over later ones. The process
 * environment wins over both.
 */
function readEnvFiles(cwd: string): Record<string, string> {
  const merged: Record<string, string> = {};
  for (const file of [ ...ENV_FILES ].reverse()) {
    const envPath = path.resolve(cwd, file);
    if (fs.existsSync(envPath)) {
      Object.assign(merged, dotenv.parse(fs.readFileSync(envPath, 'utf-8')));
    }
  }
  return merged;
}

function positiveInteger(source: Record<string, string | undefined>, key: string, fallback: number): number {
  const raw = source[key]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function loadClientConfig(options: LoadConfigOptions = {}): ClientConfig {
  const source: Record<string, string | undefined> = {
    ...readEnvFiles(options.cwd ?? process.cwd()),
    ...(options.env ?? process.env),
  };

  const logLevel = source.AGENTDB_LOG_LEVEL?.trim().toLowerCase() || 'info';
  if (!LOG_LEVELS.includes(logLevel)) {
    throw new ConfigurationError(`AGENTDB_LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`);
  }
  const logFileRaw = source.AGENTDB_LOG_FILE?.trim();

  const config: ClientConfig = {
    databaseUrl: source.AGENTDB_URL?.trim() ?? '',
    poolMax: positiveInteger(source, 'AGENTDB_POOL_MAX', 10),
    connectionTimeoutMillis: positiveInteger(source, 'AGENTDB_CONNECT_TIMEOUT_MS', 5000),
    logLevel,
    logFile: logFileRaw === 'false' ? false : logFileRaw || './logs/agentdb-%DATE%.log',
    ...options.overrides,
  };

  if (!config.databaseUrl) {
    throw new ConfigurationError('AGENTDB_URL is required');
  }
  if (!/^postgres(?:ql)?:\/\//u.test(config.databaseUrl)) {
    throw new ConfigurationError('AGENTDB_URL must be a postgres:// or postgresql:// connection string');
  }
  return config;
}
