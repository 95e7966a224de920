import type { ComponentFinder } from '../component/ComponentFinder';
import type { DbSession } from '../db/DbClient';
import type { OrganizationRecord } from '../db/records';
import type { Languages } from '../languages/Languages';
import { createLogger } from '../logging/Logger';
import type { OrganizationSupport } from '../organization/OrganizationSupport';
import { illegalState } from '../reliability/DomainError';
import { compareQualityProfiles, type QualityProfile } from './QualityProfile';
import type { QualityProfileFinder } from './QualityProfileFinder';

export type ProfileSearchRequest = {
  /** Return the profile each language would use by default. */
  defaults: boolean;
  /** Return the profile each language would use for this project or module. */
  projectKey: string | null;
  /** Restrict a plain listing to one language. */
  language: string | null;
  /** Preferred profile name, tried before any other lookup. */
  profileName: string | null;
  /** null selects the default organization. */
  organizationKey: string | null;
};

export type ResolutionSource = 'name' | 'project' | 'default';

/**
 * Per-language resolution state. A language leaves `pending` exactly once,
 * recording the stage that resolved it.
 */
class Resolution {
  private readonly profiles = new Map<string, QualityProfile>();
  private readonly sources = new Map<string, ResolutionSource>();
  private pendingKeys: string[];

  constructor(languageKeys: readonly string[]) {
    this.pendingKeys = [...languageKeys];
  }

  get pending(): readonly string[] {
    return this.pendingKeys;
  }

  accept(source: ResolutionSource, found: readonly QualityProfile[]) {
    for (const profile of found) {
      if (!this.pendingKeys.includes(profile.language)) continue;
      this.profiles.set(profile.language, profile);
      this.sources.set(profile.language, source);
    }
    this.pendingKeys = this.pendingKeys.filter((key) => !this.profiles.has(key));
  }

  resolved(): QualityProfile[] {
    return Array.from(this.profiles.values());
  }

  sourceCounts(): Record<ResolutionSource, number> {
    const counts: Record<ResolutionSource, number> = {
      name: 0,
      project: 0,
      default: 0,
    };
    for (const source of this.sources.values()) counts[source] += 1;
    return counts;
  }
}

const formatKeys = (keys: readonly string[]) => [...keys].sort().join(', ');

/**
 * Decides which profiles a search returns.
 *
 * - `defaults`: for every installed language, the profile named
 *   `profileName` if any, else the language's default.
 * - `projectKey`: the same, with the project's own profile tried between the
 *   two.
 * - otherwise: a plain listing, optionally restricted to `language`.
 *
 * The first two fail when some language ends up without a profile.
 */
export class QualityProfileResolver {
  private readonly log = createLogger('QualityProfileResolver');

  constructor(
    private readonly deps: {
      languages: Languages;
      organizations: OrganizationSupport;
      components: ComponentFinder;
      profiles: QualityProfileFinder;
    },
  ) {}

  async findProfiles(
    session: DbSession,
    request: ProfileSearchRequest,
  ): Promise<QualityProfile[]> {
    const organization = await this.deps.organizations.getOrganizationByKey(
      session,
      request.organizationKey,
    );

    let profiles: QualityProfile[];
    if (request.defaults) {
      profiles = await this.findDefaultProfiles(session, request, organization);
    } else if (request.projectKey !== null) {
      profiles = await this.findProjectProfiles(
        session,
        request.projectKey,
        request,
        organization,
      );
    } else {
      profiles = await this.findAllProfiles(session, request, organization);
    }

    return profiles.sort(compareQualityProfiles);
  }

  private async findDefaultProfiles(
    session: DbSession,
    request: ProfileSearchRequest,
    organization: OrganizationRecord,
  ): Promise<QualityProfile[]> {
    const resolution = new Resolution(this.deps.languages.keys());

    await this.lookupByProfileName(
      session,
      organization,
      resolution,
      request.profileName,
    );
    await this.lookupDefaults(session, organization, resolution);

    if (resolution.pending.length > 0) {
      throw illegalState(
        `No quality profile can be found on language(s) '${formatKeys(resolution.pending)}'`,
        { languages: [...resolution.pending].sort() },
      );
    }

    this.log.debug('resolved default profiles', {
      organization: organization.key,
      ...resolution.sourceCounts(),
    });
    return resolution.resolved();
  }

  private async findProjectProfiles(
    session: DbSession,
    projectKey: string,
    request: ProfileSearchRequest,
    organization: OrganizationRecord,
  ): Promise<QualityProfile[]> {
    const resolution = new Resolution(this.deps.languages.keys());

    await this.lookupByProfileName(
      session,
      organization,
      resolution,
      request.profileName,
    );
    await this.lookupByModuleKey(session, organization, resolution, projectKey);
    await this.lookupDefaults(session, organization, resolution);

    if (resolution.pending.length > 0) {
      throw illegalState(
        `No quality profile can be found on language(s) '${formatKeys(resolution.pending)}' for project '${projectKey}'`,
        { languages: [...resolution.pending].sort(), projectKey },
      );
    }

    this.log.debug('resolved project profiles', {
      organization: organization.key,
      projectKey,
      ...resolution.sourceCounts(),
    });
    return resolution.resolved();
  }

  private async findAllProfiles(
    session: DbSession,
    request: ProfileSearchRequest,
    organization: OrganizationRecord,
  ): Promise<QualityProfile[]> {
    if (request.language === null) {
      return this.deps.profiles.allProfiles(session, organization);
    }
    return this.deps.profiles.profilesByLanguage(
      session,
      organization,
      request.language,
    );
  }

  private async lookupByProfileName(
    session: DbSession,
    organization: OrganizationRecord,
    resolution: Resolution,
    profileName: string | null,
  ) {
    if (resolution.pending.length === 0 || profileName === null) return;
    const found = await this.deps.profiles.byNameAndLanguages(
      session,
      organization,
      profileName,
      resolution.pending,
    );
    resolution.accept('name', found);
  }

  private async lookupByModuleKey(
    session: DbSession,
    organization: OrganizationRecord,
    resolution: Resolution,
    moduleKey: string,
  ) {
    if (resolution.pending.length === 0) return;
    const project = await this.deps.components.getProject(session, moduleKey);
    const found = await this.deps.profiles.byProjectAndLanguages(
      session,
      organization,
      project.key,
      resolution.pending,
    );
    resolution.accept('project', found);
  }

  private async lookupDefaults(
    session: DbSession,
    organization: OrganizationRecord,
    resolution: Resolution,
  ) {
    if (resolution.pending.length === 0) return;
    const found = await this.deps.profiles.defaults(
      session,
      organization,
      resolution.pending,
    );
    resolution.accept('default', found);
  }
}
