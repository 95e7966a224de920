import neo4j from 'neo4j-driver';

import type { Neo4jConfig } from '../../config/ServerConfig';
import { createLogger } from '../../logging/Logger';
import { Neo4jDbClient } from './Neo4jDbClient';

const log = createLogger('neo4j');

const CONSTRAINTS = [
  'CREATE CONSTRAINT organization_key IF NOT EXISTS FOR (o:Organization) REQUIRE o.key IS UNIQUE',
  'CREATE CONSTRAINT component_uuid IF NOT EXISTS FOR (c:Component) REQUIRE c.uuid IS UNIQUE',
  'CREATE CONSTRAINT component_key IF NOT EXISTS FOR (c:Component) REQUIRE c.key IS UNIQUE',
  'CREATE CONSTRAINT quality_profile_key IF NOT EXISTS FOR (p:QualityProfile) REQUIRE p.key IS UNIQUE',
  'CREATE CONSTRAINT rule_key IF NOT EXISTS FOR (r:Rule) REQUIRE r.key IS UNIQUE',
];

const timeout = (ms: number) =>
  new Promise<'timeout'>((resolve) => {
    setTimeout(() => resolve('timeout'), ms).unref();
  });

/**
 * Connects to Neo4j and ensures uniqueness constraints exist.
 *
 * Resolves null when the server cannot be reached within
 * `connectTimeoutMs`; the caller decides what to fall back to.
 */
export async function connectNeo4j(
  config: Neo4jConfig,
): Promise<Neo4jDbClient | null> {
  const driver = neo4j.driver(
    config.uri,
    neo4j.auth.basic(config.user, config.password),
  );

  const outcome = await Promise.race([
    driver.verifyConnectivity().then(
      () => 'connected' as const,
      (err: unknown) => {
        log.error('connectivity check failed', { uri: config.uri, err });
        return 'failed' as const;
      },
    ),
    timeout(config.connectTimeoutMs),
  ]);

  if (outcome !== 'connected') {
    if (outcome === 'timeout') {
      log.warn('connectivity check timed out', {
        uri: config.uri,
        timeoutMs: config.connectTimeoutMs,
      });
    }
    await driver.close();
    return null;
  }

  const session = driver.session({ database: config.database });
  try {
    for (const statement of CONSTRAINTS) {
      await session.run(statement);
    }
  } catch (err) {
    await session.close();
    await driver.close();
    throw err;
  }
  await session.close();

  log.info('connected', {
    uri: config.uri,
    database: config.database ?? null,
  });
  return new Neo4jDbClient({ driver, database: config.database });
}
