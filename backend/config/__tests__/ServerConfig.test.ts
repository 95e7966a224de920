import {
  DEFAULT_SEED_FILE,
  loadServerConfig,
  parseLanguages,
} from '../ServerConfig';

describe('parseLanguages', () => {
  test('reads key:Name pairs and bare keys', () => {
    expect(parseLanguages(' java:Java , go ,ts:TypeScript,')).toEqual([
      { key: 'java', name: 'Java' },
      { key: 'go', name: 'go' },
      { key: 'ts', name: 'TypeScript' },
    ]);
  });

  test('rejects duplicates, empty keys and empty lists', () => {
    expect(() => parseLanguages('java,java:Java')).toThrow(
      "Language 'java' is declared twice.",
    );
    expect(() => parseLanguages(':Java')).toThrow("Invalid language entry ':Java'.");
    expect(() => parseLanguages(' , ')).toThrow(
      'At least one language must be configured.',
    );
  });
});

describe('loadServerConfig', () => {
  test('applies defaults for an empty environment', () => {
    expect(loadServerConfig({})).toEqual({
      port: 3001,
      requestTimeoutMs: 15000,
      neo4j: null,
      languages: [
        { key: 'java', name: 'Java' },
        { key: 'js', name: 'JavaScript' },
        { key: 'py', name: 'Python' },
      ],
      defaultOrganizationKey: 'default-organization',
      seedFile: DEFAULT_SEED_FILE,
      telemetry: { enabled: true, structuredLogs: true },
      logLevel: 'info',
    });
  });

  test('needs uri, user and password to configure Neo4j', () => {
    expect(
      loadServerConfig({ NEO4J_URI: 'bolt://localhost:7687', NEO4J_USER: 'neo4j' })
        .neo4j,
    ).toBeNull();

    expect(
      loadServerConfig({
        NEO4J_URI: 'bolt://localhost:7687',
        NEO4J_USER: 'neo4j',
        NEO4J_PASSWORD: 'test-password',
        NEO4J_DATABASE: 'quality',
      }).neo4j,
    ).toEqual({
      uri: 'bolt://localhost:7687',
      user: 'neo4j',
      password: 'test-password',
      database: 'quality',
      connectTimeoutMs: 5000,
    });
  });

  test('falls back on invalid numbers, flags and levels', () => {
    const config = loadServerConfig({
      API_PORT: 'eighty',
      API_TIMEOUT_MS: '-5',
      QP_TELEMETRY: 'no',
      QP_TELEMETRY_LOGS: 'YES',
      QP_LOG_LEVEL: 'chatty',
    });

    expect(config.port).toBe(3001);
    expect(config.requestTimeoutMs).toBe(15000);
    expect(config.telemetry).toEqual({ enabled: false, structuredLogs: true });
    expect(config.logLevel).toBe('info');
  });

  test('reads overrides', () => {
    const config = loadServerConfig({
      API_PORT: '9000',
      QP_DEFAULT_ORGANIZATION: 'acme',
      QP_SEED_FILE: '/tmp/seed.json',
      QP_LOG_LEVEL: 'WARN',
    });

    expect(config.port).toBe(9000);
    expect(config.defaultOrganizationKey).toBe('acme');
    expect(config.seedFile).toBe('/tmp/seed.json');
    expect(config.logLevel).toBe('warn');
  });
});
