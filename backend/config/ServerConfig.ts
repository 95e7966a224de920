import path from 'node:path';

import { isLogLevel, type LogLevel } from '../logging/Logger';

export type LanguageDefinition = {
  key: string;
  name: string;
};

export type Neo4jConfig = {
  uri: string;
  user: string;
  password: string;
  database?: string;
  connectTimeoutMs: number;
};

export type ServerConfig = {
  port: number;
  requestTimeoutMs: number;
  /** null when any of NEO4J_URI / NEO4J_USER / NEO4J_PASSWORD is missing. */
  neo4j: Neo4jConfig | null;
  languages: LanguageDefinition[];
  defaultOrganizationKey: string;
  seedFile: string;
  telemetry: { enabled: boolean; structuredLogs: boolean };
  logLevel: LogLevel;
};

export type Env = Record<string, string | undefined>;

export const DEFAULT_LANGUAGES = 'java:Java,js:JavaScript,py:Python';

export const DEFAULT_ORGANIZATION_KEY = 'default-organization';

export const DEFAULT_SEED_FILE = path.resolve(
  __dirname,
  '..',
  '..',
  'data',
  'seed.json',
);

const read = (env: Env, name: string): string => (env[name] ?? '').trim();

const positiveInt = (env: Env, name: string, fallback: number): number => {
  const raw = read(env, name);
  if (!raw) return fallback;
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : fallback;
};

const flag = (env: Env, name: string, fallback: boolean): boolean => {
  const v = read(env, name).toLowerCase();
  if (!v) return fallback;
  return v === '1' || v === 'true' || v === 'yes';
};

/**
 * Parses `key:Name` pairs separated by commas. A bare key uses itself as the
 * display name. Throws on an empty list or a duplicated key.
 */
export function parseLanguages(raw: string): LanguageDefinition[] {
  const languages: LanguageDefinition[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(',')) {
    const trimmed = entry.trim();
    if (!trimmed) continue;

    const separator = trimmed.indexOf(':');
    const key = (separator < 0 ? trimmed : trimmed.slice(0, separator)).trim();
    const name = (separator < 0 ? trimmed : trimmed.slice(separator + 1)).trim();
    if (!key) throw new Error(`Invalid language entry '${trimmed}'.`);
    if (seen.has(key)) throw new Error(`Language '${key}' is declared twice.`);

    seen.add(key);
    languages.push({ key, name: name || key });
  }

  if (languages.length === 0) {
    throw new Error('At least one language must be configured.');
  }
  return languages;
}

const neo4jFrom = (env: Env): Neo4jConfig | null => {
  const uri = read(env, 'NEO4J_URI');
  const user = read(env, 'NEO4J_USER');
  const password = read(env, 'NEO4J_PASSWORD');
  if (!uri || !user || !password) return null;

  return {
    uri,
    user,
    password,
    database: read(env, 'NEO4J_DATABASE') || undefined,
    connectTimeoutMs: positiveInt(env, 'NEO4J_CONNECT_TIMEOUT_MS', 5000),
  };
};

export function loadServerConfig(env: Env = process.env): ServerConfig {
  const logLevel = read(env, 'QP_LOG_LEVEL').toLowerCase();
  return {
    port: positiveInt(env, 'API_PORT', 3001),
    requestTimeoutMs: positiveInt(env, 'API_TIMEOUT_MS', 15000),
    neo4j: neo4jFrom(env),
    languages: parseLanguages(read(env, 'QP_LANGUAGES') || DEFAULT_LANGUAGES),
    defaultOrganizationKey:
      read(env, 'QP_DEFAULT_ORGANIZATION') || DEFAULT_ORGANIZATION_KEY,
    seedFile: read(env, 'QP_SEED_FILE') || DEFAULT_SEED_FILE,
    telemetry: {
      enabled: flag(env, 'QP_TELEMETRY', true),
      structuredLogs: flag(env, 'QP_TELEMETRY_LOGS', true),
    },
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
  };
}
