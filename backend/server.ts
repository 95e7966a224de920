import 'dotenv/config';

import { createApp } from './app';
import { loadServerConfig, type ServerConfig } from './config/ServerConfig';
import type { DbClient } from './db/DbClient';
import { InMemoryDbClient } from './db/inmemory/InMemoryDbClient';
import { loadSeedFile } from './db/inmemory/seed';
import { connectNeo4j } from './db/neo4j/Neo4jBootstrap';
import { createLogger, setLogLevel } from './logging/Logger';
import { createServerContext } from './platform/ServerContext';
import { configureTelemetry } from './telemetry/Telemetry';

const log = createLogger('server');

const openDatabase = async (config: ServerConfig): Promise<DbClient> => {
  if (config.neo4j) {
    const client = await connectNeo4j(config.neo4j);
    if (client) return client;
    log.warn('continuing with the in-memory database');
  }
  log.info('using in-memory database', { seedFile: config.seedFile });
  return new InMemoryDbClient(loadSeedFile(config.seedFile));
};

const bootstrap = async () => {
  const config = loadServerConfig();
  setLogLevel(config.logLevel);
  configureTelemetry(config.telemetry);

  const dbClient = await openDatabase(config);
  const context = createServerContext({ config, dbClient });

  try {
    await context.startupTasks.startAll();
  } catch (err) {
    await context.startupTasks.stopAll();
    await dbClient.close();
    throw err;
  }

  const server = createApp(context).listen(config.port, () => {
    log.info('listening', {
      url: `http://localhost:${config.port}`,
      languages: context.languages.keys(),
    });
  });

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info('shutting down', { signal });
    server.close();
    await context.startupTasks.stopAll();
    await dbClient.close();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        log.error('shutdown failed', { err });
        process.exitCode = 1;
      });
    });
  }
};

bootstrap().catch((err: unknown) => {
  log.error('failed to start', { err });
  process.exitCode = 1;
});
