import {
  InMemoryDbClient,
  type InMemoryDatabaseState,
} from '../../db/inmemory/InMemoryDbClient';
import { ONE_SHOT_TASK_TYPE } from '../../db/records';
import { FixedClock } from '../../platform/Clock';
import { RuleIndex } from '../../rule/RuleIndex';
import { RuleIndexer } from '../../rule/RuleIndexer';
import { makeRule } from '../../__tests__/helpers/builders';
import {
  CLEAR_RULES_OVERLOADED_DEBT_KEY,
  ClearRulesOverloadedDebt,
  REMEDIATION_MODEL_LICENSE_PROPERTY,
} from '../ClearRulesOverloadedDebt';

const CREATED_AT = 1_700_000_000_000;
const NOW = 1_800_000_000_000;

const rules = () => [
  makeRule('java:S1'),
  makeRule('java:S2', {
    remediationFunction: 'LINEAR',
    remediationGapMultiplier: '2min',
  }),
  makeRule('java:S3', { remediationBaseEffort: '10min' }),
];

const setup = (state?: Partial<InMemoryDatabaseState>) => {
  const db = new InMemoryDbClient({ rules: rules(), ...(state ?? {}) });
  const clock = new FixedClock(NOW);
  const ruleIndex = new RuleIndex();
  const task = new ClearRulesOverloadedDebt({
    dbClient: db,
    ruleIndexer: new RuleIndexer(db, ruleIndex, clock),
    clock,
  });
  return { db, clock, ruleIndex, task };
};

const marker = {
  key: CLEAR_RULES_OVERLOADED_DEBT_KEY,
  type: ONE_SHOT_TASK_TYPE,
};

const warnLines = (spy: jest.SpyInstance): string[] =>
  spy.mock.calls.map((call: unknown[]) => {
    const parsed: unknown = JSON.parse(String(call[0]));
    return typeof parsed === 'object' && parsed !== null && 'message' in parsed
      ? String(parsed.message)
      : '';
  });

describe('ClearRulesOverloadedDebt', () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('clears remediation overrides when the plugin is not installed', async () => {
    const { db, task } = setup();

    await task.start();

    const snapshot = db.snapshot();
    expect(snapshot.rules).toEqual([
      makeRule('java:S1'),
      makeRule('java:S2', { updatedAt: NOW }),
      makeRule('java:S3', { updatedAt: NOW }),
    ]);
    expect(snapshot.loadedTemplates).toEqual([marker]);
  });

  test('warns twice when at least one rule was cleared', async () => {
    const { task } = setup();

    await task.start();

    expect(warnLines(warn)).toEqual([
      'The remediation model has been cleaned to remove any redundant data left over from previous migrations.',
      '=> As a result, the technical debt of existing issues in your projects may change slightly when those projects are reanalyzed.',
    ]);
  });

  test('stays silent when no rule carries overrides', async () => {
    const { db, task } = setup({ rules: [makeRule('java:S1')] });

    await task.start();

    expect(warn).not.toHaveBeenCalled();
    expect(db.snapshot().loadedTemplates).toEqual([marker]);
  });

  test('reindexes rules after committing', async () => {
    const { ruleIndex, task } = setup();

    await task.start();

    expect(ruleIndex.count()).toBe(3);
    expect(ruleIndex.lastIndexedAt()).toBe(NOW);
    expect(ruleIndex.search({ overloadedDebt: true })).toEqual([]);
    expect(ruleIndex.get('java:S2')).toEqual({
      key: 'java:S2',
      name: 'Rule java:S2',
      language: 'java',
      hasOverloadedDebt: false,
      updatedAt: NOW,
    });
  });

  test('keeps overrides but records the run when the plugin is installed', async () => {
    const { db, ruleIndex, task } = setup({
      properties: [
        {
          key: REMEDIATION_MODEL_LICENSE_PROPERTY,
          value: 'test-license-hash',
          componentUuid: null,
        },
      ],
    });

    await task.start();

    const snapshot = db.snapshot();
    expect(snapshot.rules).toEqual(rules());
    expect(snapshot.loadedTemplates).toEqual([marker]);
    expect(ruleIndex.search({ overloadedDebt: true }).map((d) => d.key)).toEqual(
      ['java:S2', 'java:S3'],
    );
  });

  test('a project-level license property does not count as installed', async () => {
    const { db, task } = setup({
      properties: [
        {
          key: REMEDIATION_MODEL_LICENSE_PROPERTY,
          value: 'test-license-hash',
          componentUuid: 'prj-1',
        },
      ],
    });

    await task.start();

    expect(
      db.snapshot().rules.map((rule) => rule.remediationFunction),
    ).toEqual([null, null, null]);
  });

  test('does nothing once the marker exists', async () => {
    const { db, ruleIndex, task } = setup({ loadedTemplates: [marker] });

    await task.start();

    const snapshot = db.snapshot();
    expect(snapshot.rules).toEqual(rules());
    expect(snapshot.loadedTemplates).toEqual([marker]);
    expect(ruleIndex.count()).toBe(0);
    expect(ruleIndex.lastIndexedAt()).toBeNull();
  });

  test('a second start leaves the first run untouched', async () => {
    const { db, clock, task } = setup();

    await task.start();
    clock.set(NOW + 60_000);
    await task.start();

    const snapshot = db.snapshot();
    expect(snapshot.rules.map((rule) => rule.updatedAt)).toEqual([
      CREATED_AT,
      NOW,
      NOW,
    ]);
    expect(snapshot.loadedTemplates).toHaveLength(1);
  });

  test('stop is a no-op', async () => {
    const { task } = setup();

    await expect(task.stop()).resolves.toBeUndefined();
  });
});
