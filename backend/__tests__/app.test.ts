import type { Server } from 'http';

import { createApp } from '../app';
import { DEFAULT_SEED_FILE, loadServerConfig } from '../config/ServerConfig';
import { InMemoryDbClient } from '../db/inmemory/InMemoryDbClient';
import { loadSeedFile } from '../db/inmemory/seed';
import { createServerContext, type ServerContext } from '../platform/ServerContext';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

const buildContext = (env: Record<string, string> = {}) =>
  createServerContext({
    config: loadServerConfig(env),
    dbClient: new InMemoryDbClient(loadSeedFile(DEFAULT_SEED_FILE)),
  });

const listen = (context: ServerContext) =>
  new Promise<{ server: Server; baseUrl: string }>((resolve) => {
    const server = createApp(context).listen(0, () => {
      const address = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : 0;
      resolve({ server, baseUrl: `http://127.0.0.1:${port}` });
    });
  });

const messagesOf = (spy: jest.SpyInstance) =>
  spy.mock.calls.map((call: unknown[]) => {
    const line: { message?: unknown } = JSON.parse(String(call[0]));
    return line.message;
  });

describe('createApp', () => {
  let server: Server | null = null;
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    const running = server;
    server = null;
    if (running === null) return;
    running.closeAllConnections();
    await new Promise<void>((resolve) => running.close(() => resolve()));
  });

  test('serves a profile search', async () => {
    const started = await listen(buildContext());
    server = started.server;

    const res = await fetch(
      `${started.baseUrl}/api/qualityprofiles/search?language=py`,
    );
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({
      success: true,
      data: {
        profiles: [
          { key: 'py-strict', name: 'Strict', isDefault: false },
          { key: 'py-way', name: 'Team Way', isDefault: true },
        ],
      },
    });
  });

  test('answers 504 for a slow search and keeps serving afterwards', async () => {
    const context = buildContext({ API_TIMEOUT_MS: '20' });
    jest
      .spyOn(context.qualityProfiles, 'search')
      .mockImplementation(async () => {
        await delay(100);
        return { profiles: [] };
      });
    const started = await listen(context);
    server = started.server;

    const res = await fetch(`${started.baseUrl}/api/qualityprofiles/search`);
    expect(res.status).toBe(504);
    expect(await res.json()).toEqual({
      success: false,
      errorMessage: 'Gateway Timeout',
    });

    await delay(150);

    const health = await fetch(`${started.baseUrl}/health`);
    expect(health.status).toBe(200);
    expect(messagesOf(warn)).toEqual([
      'request timed out',
      'search finished after the response was sent',
    ]);
  });

  test('maps a failing search through the error envelope', async () => {
    const context = buildContext();
    const started = await listen(context);
    server = started.server;

    const res = await fetch(
      `${started.baseUrl}/api/qualityprofiles/search?defaults=true&projectKey=acme:payments`,
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      success: false,
      errorMessage: "The 'defaults' parameter cannot be combined with 'projectKey'.",
      error: { code: 'VALIDATION_ERROR' },
    });
  });

  test('answers 404 with a JSON body for unknown api paths', async () => {
    const started = await listen(buildContext());
    server = started.server;

    const res = await fetch(`${started.baseUrl}/api/nope`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      success: false,
      errorMessage: 'Not Found',
    });
  });

  test('reports system status', async () => {
    const context = buildContext();
    const started = await listen(context);
    server = started.server;

    const res = await fetch(`${started.baseUrl}/api/system/status`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      data: {
        startupTasks: ['ClearRulesOverloadedDebt'],
        ruleIndex: { documents: 0, indexedAt: null },
      },
    });
  });
});
