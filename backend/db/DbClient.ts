import type {
  ComponentRecord,
  LoadedTemplateRecord,
  OrganizationRecord,
  PropertyRecord,
  QualityProfileRecord,
  RuleRecord,
} from './records';

export interface OrganizationDao {
  selectByKey(key: string): Promise<OrganizationRecord | null>;
}

export interface ComponentDao {
  selectByKey(key: string): Promise<ComponentRecord | null>;
  selectByUuid(uuid: string): Promise<ComponentRecord | null>;
}

/**
 * Language arguments are sets of language keys; implementations return at
 * most one profile per language for the lookups that resolve a profile.
 */
export interface QualityProfileDao {
  selectAll(organizationUuid: string): Promise<QualityProfileRecord[]>;
  selectByLanguage(
    organizationUuid: string,
    language: string,
  ): Promise<QualityProfileRecord[]>;
  selectByNameAndLanguages(
    organizationUuid: string,
    name: string,
    languages: readonly string[],
  ): Promise<QualityProfileRecord[]>;
  selectByProjectAndLanguages(
    organizationUuid: string,
    projectKey: string,
    languages: readonly string[],
  ): Promise<QualityProfileRecord[]>;
  selectDefaults(
    organizationUuid: string,
    languages: readonly string[],
  ): Promise<QualityProfileRecord[]>;
  countActiveRulesByProfile(
    profileKeys: readonly string[],
  ): Promise<Map<string, number>>;
  countProjectsByProfile(
    profileKeys: readonly string[],
  ): Promise<Map<string, number>>;
}

export interface RuleDao {
  selectAll(): Promise<RuleRecord[]>;
  update(rule: RuleRecord): Promise<void>;
}

export interface PropertiesDao {
  selectGlobalProperty(key: string): Promise<PropertyRecord | null>;
}

export interface LoadedTemplateDao {
  countByTypeAndKey(type: string, key: string): Promise<number>;
  insert(template: LoadedTemplateRecord): Promise<void>;
}

/**
 * One unit of work. Reads see the session's own writes; nothing is visible
 * to other sessions until `commit()`. `close()` without a commit discards.
 */
export interface DbSession {
  readonly organizations: OrganizationDao;
  readonly components: ComponentDao;
  readonly qualityProfiles: QualityProfileDao;
  readonly rules: RuleDao;
  readonly properties: PropertiesDao;
  readonly loadedTemplates: LoadedTemplateDao;
  commit(): Promise<void>;
  close(): Promise<void>;
}

export interface DbClient {
  openSession(): DbSession;
  close(): Promise<void>;
}

/** Opens a session, runs `work`, and always closes the session. */
export async function withSession<T>(
  dbClient: DbClient,
  work: (session: DbSession) => Promise<T>,
): Promise<T> {
  const session = dbClient.openSession();
  try {
    return await work(session);
  } finally {
    await session.close();
  }
}
