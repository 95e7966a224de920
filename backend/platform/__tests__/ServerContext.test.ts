import type { Request, Response } from 'express';

import { DEFAULT_SEED_FILE, loadServerConfig } from '../../config/ServerConfig';
import { InMemoryDbClient } from '../../db/inmemory/InMemoryDbClient';
import { loadSeedFile } from '../../db/inmemory/seed';
import { createSystemController } from '../../modules/system/system.controller';
import { FixedClock } from '../Clock';
import { createServerContext } from '../ServerContext';

const NOW = Date.parse('2026-10-01T00:00:00.000Z');

describe('createServerContext', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('startup clears the seeded overrides and fills the rule index', async () => {
    const dbClient = new InMemoryDbClient(loadSeedFile(DEFAULT_SEED_FILE));
    const context = createServerContext({
      config: loadServerConfig({}),
      dbClient,
      clock: new FixedClock(NOW),
    });

    expect(context.startupTasks.registered()).toEqual([
      'ClearRulesOverloadedDebt',
    ]);

    await context.startupTasks.startAll();

    const updated = dbClient
      .snapshot()
      .rules.filter((rule) => rule.updatedAt === NOW)
      .map((rule) => rule.key);
    expect(updated).toEqual(['java:S101', 'java:S102']);
    expect(context.ruleIndex.count()).toBe(5);
    expect(context.ruleIndex.search({ language: 'java' })).toHaveLength(3);
  });

  test('system status reports the rule index', async () => {
    const context = createServerContext({
      config: loadServerConfig({}),
      dbClient: new InMemoryDbClient(loadSeedFile(DEFAULT_SEED_FILE)),
      clock: new FixedClock(NOW),
    });
    await context.startupTasks.startAll();

    let body: unknown;
    const res = {
      json(payload: unknown) {
        body = payload;
        return this;
      },
    };
    createSystemController(context).status(
      {} as Request,
      res as unknown as Response,
    );

    expect(body).toEqual({
      success: true,
      data: {
        startupTasks: ['ClearRulesOverloadedDebt'],
        ruleIndex: { documents: 5, indexedAt: '2026-10-01T00:00:00.000Z' },
      },
    });
  });
});
