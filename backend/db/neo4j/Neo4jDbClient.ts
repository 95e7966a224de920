import neo4j, {
  Neo4jError,
  type Driver,
  type Session,
  type Transaction,
} from 'neo4j-driver';

import { DomainError } from '../../reliability/DomainError';
import type {
  ComponentDao,
  DbClient,
  DbSession,
  LoadedTemplateDao,
  OrganizationDao,
  PropertiesDao,
  QualityProfileDao,
  RuleDao,
} from '../DbClient';
import {
  Neo4jComponentDao,
  Neo4jLoadedTemplateDao,
  Neo4jOrganizationDao,
  Neo4jPropertiesDao,
} from './Neo4jCatalogDaos';
import { Neo4jQualityProfileDao } from './Neo4jQualityProfileDao';
import { Neo4jRuleDao } from './Neo4jRuleDao';

export type CypherRow = Record<string, unknown>;

export type CypherParams = Record<string, unknown>;

/** Executes one Cypher statement and returns its records as plain objects. */
export interface CypherRunner {
  run(cypher: string, params?: CypherParams): Promise<CypherRow[]>;
}

export type Neo4jDbClientConfig = {
  /** Owned by the client; closed by `close()`. */
  driver: Driver;

  /** Optional database name (Neo4j multi-database). */
  database?: string;
};

/** Converts driver integers to numbers (strings when outside the safe range). */
export const toNative = (value: unknown): unknown => {
  if (neo4j.isInt(value)) {
    return value.inSafeRange() ? value.toNumber() : value.toString();
  }

  if (Array.isArray(value)) return value.map((v) => toNative(v));

  if (value && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = toNative(v);
    return out;
  }

  return value;
};

const toDatabaseUnavailableError = (
  operation: string,
  err: unknown,
): DomainError => {
  const neo4jCode = err instanceof Neo4jError ? err.code : undefined;
  const message = err instanceof Error ? err.message : String(err);
  return new DomainError({
    code: 'DATABASE_UNAVAILABLE',
    message: `Neo4j unavailable during ${operation}: ${message}`,
    details: { operation, neo4jCode },
    cause: err,
  });
};

/**
 * Session bound to a single explicit transaction, begun on the first
 * statement. Cypher lives in the DAO classes; this class only owns the
 * transaction lifecycle.
 */
class Neo4jDbSession implements DbSession, CypherRunner {
  private readonly session: Session;
  private tx: Transaction | null = null;
  private closed = false;

  readonly organizations: OrganizationDao;
  readonly components: ComponentDao;
  readonly qualityProfiles: QualityProfileDao;
  readonly rules: RuleDao;
  readonly properties: PropertiesDao;
  readonly loadedTemplates: LoadedTemplateDao;

  constructor(driver: Driver, database?: string) {
    this.session = driver.session({
      database,
      defaultAccessMode: neo4j.session.WRITE,
    });
    this.organizations = new Neo4jOrganizationDao(this);
    this.components = new Neo4jComponentDao(this);
    this.qualityProfiles = new Neo4jQualityProfileDao(this);
    this.rules = new Neo4jRuleDao(this);
    this.properties = new Neo4jPropertiesDao(this);
    this.loadedTemplates = new Neo4jLoadedTemplateDao(this);
  }

  private transaction(): Transaction {
    if (this.closed) throw new Error('Session is closed.');
    if (!this.tx) this.tx = this.session.beginTransaction();
    return this.tx;
  }

  async run(cypher: string, params: CypherParams = {}): Promise<CypherRow[]> {
    const tx = this.transaction();
    try {
      const result = await tx.run(cypher, params);
      return result.records.map((record) => {
        const row: CypherRow = {};
        for (const key of record.keys) {
          row[String(key)] = toNative(record.get(key));
        }
        return row;
      });
    } catch (err) {
      throw toDatabaseUnavailableError('run', err);
    }
  }

  async commit(): Promise<void> {
    const tx = this.tx;
    if (!tx) return;
    this.tx = null;
    try {
      await tx.commit();
    } catch (err) {
      throw toDatabaseUnavailableError('commit', err);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const tx = this.tx;
    this.tx = null;
    try {
      if (tx?.isOpen()) await tx.rollback();
    } finally {
      await this.session.close();
    }
  }
}

export class Neo4jDbClient implements DbClient {
  private readonly driver: Driver;
  private readonly database?: string;

  constructor(config: Neo4jDbClientConfig) {
    this.driver = config.driver;
    this.database = config.database;
  }

  openSession(): DbSession {
    return new Neo4jDbSession(this.driver, this.database);
  }

  async close(): Promise<void> {
    await this.driver.close();
  }
}
