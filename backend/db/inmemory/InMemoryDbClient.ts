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
import { firstPerLanguage } from '../profileSelection';
import type {
  ActiveRuleRecord,
  ComponentRecord,
  LoadedTemplateRecord,
  OrganizationRecord,
  ProjectProfileRecord,
  PropertyRecord,
  QualityProfileRecord,
  RuleRecord,
} from '../records';

export type InMemoryDatabaseState = {
  organizations: OrganizationRecord[];
  components: ComponentRecord[];
  qualityProfiles: QualityProfileRecord[];
  projectProfiles: ProjectProfileRecord[];
  activeRules: ActiveRuleRecord[];
  rules: RuleRecord[];
  properties: PropertyRecord[];
  loadedTemplates: LoadedTemplateRecord[];
};

export const emptyDatabaseState = (): InMemoryDatabaseState => ({
  organizations: [],
  components: [],
  qualityProfiles: [],
  projectProfiles: [],
  activeRules: [],
  rules: [],
  properties: [],
  loadedTemplates: [],
});

const countBy = <T>(
  rows: readonly T[],
  keys: readonly string[],
  keyOf: (row: T) => string,
): Map<string, number> => {
  const counts = new Map<string, number>(keys.map((key) => [key, 0]));
  for (const row of rows) {
    const key = keyOf(row);
    const current = counts.get(key);
    if (current !== undefined) counts.set(key, current + 1);
  }
  return counts;
};

class InMemoryDbSession implements DbSession {
  private readonly working: InMemoryDatabaseState;
  private closed = false;

  readonly organizations: OrganizationDao;
  readonly components: ComponentDao;
  readonly qualityProfiles: QualityProfileDao;
  readonly rules: RuleDao;
  readonly properties: PropertiesDao;
  readonly loadedTemplates: LoadedTemplateDao;

  constructor(
    snapshot: InMemoryDatabaseState,
    private readonly onCommit: (state: InMemoryDatabaseState) => void,
  ) {
    this.working = structuredClone(snapshot);
    const db = () => this.state();

    this.organizations = {
      selectByKey: async (key) =>
        db().organizations.find((o) => o.key === key) ?? null,
    };

    this.components = {
      selectByKey: async (key) =>
        db().components.find((c) => c.key === key) ?? null,
      selectByUuid: async (uuid) =>
        db().components.find((c) => c.uuid === uuid) ?? null,
    };

    this.qualityProfiles = {
      selectAll: async (organizationUuid) =>
        db().qualityProfiles.filter(
          (p) => p.organizationUuid === organizationUuid,
        ),
      selectByLanguage: async (organizationUuid, language) =>
        db().qualityProfiles.filter(
          (p) =>
            p.organizationUuid === organizationUuid && p.language === language,
        ),
      selectByNameAndLanguages: async (organizationUuid, name, languages) =>
        firstPerLanguage(
          db().qualityProfiles.filter(
            (p) =>
              p.organizationUuid === organizationUuid &&
              p.name === name &&
              languages.includes(p.language),
          ),
        ),
      selectByProjectAndLanguages: async (
        organizationUuid,
        projectKey,
        languages,
      ) => {
        const project = db().components.find((c) => c.key === projectKey);
        if (!project) return [];
        const associated = new Set(
          db()
            .projectProfiles.filter((pp) => pp.projectUuid === project.uuid)
            .map((pp) => pp.profileKey),
        );
        return firstPerLanguage(
          db().qualityProfiles.filter(
            (p) =>
              p.organizationUuid === organizationUuid &&
              associated.has(p.key) &&
              languages.includes(p.language),
          ),
        );
      },
      selectDefaults: async (organizationUuid, languages) =>
        firstPerLanguage(
          db().qualityProfiles.filter(
            (p) =>
              p.organizationUuid === organizationUuid &&
              p.isDefault &&
              languages.includes(p.language),
          ),
        ),
      countActiveRulesByProfile: async (profileKeys) =>
        countBy(db().activeRules, profileKeys, (ar) => ar.profileKey),
      countProjectsByProfile: async (profileKeys) =>
        countBy(db().projectProfiles, profileKeys, (pp) => pp.profileKey),
    };

    this.rules = {
      selectAll: async () => db().rules.map((rule) => ({ ...rule })),
      update: async (rule) => {
        const rules = db().rules;
        const index = rules.findIndex((r) => r.key === rule.key);
        if (index < 0) throw new Error(`Rule ${rule.key} does not exist.`);
        rules[index] = { ...rule };
      },
    };

    this.properties = {
      selectGlobalProperty: async (key) =>
        db().properties.find(
          (p) => p.key === key && p.componentUuid === null,
        ) ?? null,
    };

    this.loadedTemplates = {
      countByTypeAndKey: async (type, key) =>
        db().loadedTemplates.filter((t) => t.type === type && t.key === key)
          .length,
      insert: async (template) => {
        db().loadedTemplates.push({ ...template });
      },
    };
  }

  private state(): InMemoryDatabaseState {
    if (this.closed) throw new Error('Session is closed.');
    return this.working;
  }

  async commit(): Promise<void> {
    this.onCommit(structuredClone(this.state()));
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * Process-local database used by tests and by the development server when no
 * Neo4j instance is configured.
 *
 * Each session works on its own copy; `commit()` replaces the shared state
 * wholesale (last commit wins).
 */
export class InMemoryDbClient implements DbClient {
  private state: InMemoryDatabaseState;

  constructor(initial?: Partial<InMemoryDatabaseState>) {
    this.state = { ...emptyDatabaseState(), ...structuredClone(initial ?? {}) };
  }

  openSession(): DbSession {
    return new InMemoryDbSession(this.state, (next) => {
      this.state = next;
    });
  }

  /** Copy of the committed state. */
  snapshot(): InMemoryDatabaseState {
    return structuredClone(this.state);
  }

  async close(): Promise<void> {
    // Nothing held open.
  }
}
