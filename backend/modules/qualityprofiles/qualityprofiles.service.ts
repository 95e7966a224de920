import { withSession, type DbClient, type DbSession } from '../../db/DbClient';
import type { Languages } from '../../languages/Languages';
import type { QualityProfile } from '../../qualityprofile/QualityProfile';
import type {
  ProfileSearchRequest,
  QualityProfileResolver,
} from '../../qualityprofile/QualityProfileResolver';
import { validationError } from '../../reliability/DomainError';
import { telemetry } from '../../telemetry/Telemetry';
import type {
  SearchProfileItem,
  SearchProfilesResponse,
  SearchQuery,
} from './qualityprofiles.types';

export type QualityProfilesServiceDeps = {
  dbClient: DbClient;
  languages: Languages;
  resolver: QualityProfileResolver;
};

/** Single-valued, trimmed parameter; blank counts as absent. */
const readParam = (query: SearchQuery, ...names: string[]): string | null => {
  for (const name of names) {
    const value = query[name];
    if (value === undefined) continue;
    if (typeof value !== 'string') {
      throw validationError(`Parameter '${name}' must be given once.`);
    }
    const trimmed = value.trim();
    if (trimmed) return trimmed;
  }
  return null;
};

const readBoolean = (query: SearchQuery, name: string): boolean => {
  const value = readParam(query, name);
  if (value === null || value === 'false') return false;
  if (value === 'true') return true;
  throw validationError(
    `Value of parameter '${name}' (${value}) must be one of: [true, false]`,
  );
};

export function parseSearchRequest(
  query: SearchQuery,
  languages: Languages,
): ProfileSearchRequest {
  const request: ProfileSearchRequest = {
    defaults: readBoolean(query, 'defaults'),
    language: readParam(query, 'language'),
    projectKey: readParam(query, 'projectKey', 'componentKey'),
    profileName: readParam(query, 'profileName', 'qualityProfile'),
    organizationKey: readParam(query, 'organization'),
  };

  if (request.language !== null && !languages.has(request.language)) {
    throw validationError(
      `Value of parameter 'language' (${request.language}) must be one of: [${languages.keys().join(', ')}]`,
    );
  }

  if (
    request.language !== null &&
    (request.projectKey !== null ||
      request.profileName !== null ||
      request.defaults)
  ) {
    throw validationError(
      "The 'language' parameter cannot be combined with 'projectKey', 'profileName' or 'defaults'.",
    );
  }

  if (request.defaults && request.projectKey !== null) {
    throw validationError(
      "The 'defaults' parameter cannot be combined with 'projectKey'.",
    );
  }

  return request;
}

const searchMode = (request: ProfileSearchRequest) => {
  if (request.defaults) return 'defaults';
  if (request.projectKey !== null) return 'project';
  return 'all';
};

export class QualityProfilesService {
  constructor(private readonly deps: QualityProfilesServiceDeps) {}

  async search(query: SearchQuery): Promise<SearchProfilesResponse> {
    const request = parseSearchRequest(query, this.deps.languages);

    return telemetry.time(
      'qualityprofiles.search',
      { mode: searchMode(request) },
      () =>
        withSession(this.deps.dbClient, async (session) => {
          const profiles = await this.deps.resolver.findProfiles(
            session,
            request,
          );
          return { profiles: await this.toItems(session, profiles) };
        }),
    );
  }

  private async toItems(
    session: DbSession,
    profiles: readonly QualityProfile[],
  ): Promise<SearchProfileItem[]> {
    const keys = profiles.map((p) => p.key);
    const activeRuleCounts =
      await session.qualityProfiles.countActiveRulesByProfile(keys);
    const projectCounts = await session.qualityProfiles.countProjectsByProfile(
      profiles.filter((p) => !p.isDefault).map((p) => p.key),
    );
    const parentNames = await this.parentNames(session, profiles);

    return profiles.map((profile) => {
      const item: SearchProfileItem = {
        key: profile.key,
        name: profile.name,
        language: profile.language,
        languageName:
          this.deps.languages.get(profile.language)?.name ?? profile.language,
        isInherited: profile.parentKey !== null,
        isDefault: profile.isDefault,
        activeRuleCount: activeRuleCounts.get(profile.key) ?? 0,
        organization: profile.organizationKey,
      };
      if (profile.parentKey !== null) {
        item.parentKey = profile.parentKey;
        const parentName = parentNames.get(profile.parentKey);
        if (parentName !== undefined) item.parentName = parentName;
      }
      if (!profile.isDefault) {
        item.projectCount = projectCounts.get(profile.key) ?? 0;
      }
      if (profile.rulesUpdatedAt !== null) {
        item.rulesUpdatedAt = profile.rulesUpdatedAt;
      }
      return item;
    });
  }

  private async parentNames(
    session: DbSession,
    profiles: readonly QualityProfile[],
  ): Promise<Map<string, string>> {
    const organizationUuids = new Set(
      profiles
        .filter((p) => p.parentKey !== null)
        .map((p) => p.organizationUuid),
    );

    const names = new Map<string, string>();
    for (const organizationUuid of organizationUuids) {
      for (const record of await session.qualityProfiles.selectAll(
        organizationUuid,
      )) {
        names.set(record.key, record.name);
      }
    }
    return names;
  }
}
