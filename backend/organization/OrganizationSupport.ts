import type { DbSession } from '../db/DbClient';
import type { OrganizationRecord } from '../db/records';
import { illegalState, notFound } from '../reliability/DomainError';

export class OrganizationSupport {
  constructor(private readonly defaultOrganizationKey: string) {}

  /** A null key selects the default organization, which must exist. */
  async getOrganizationByKey(
    session: DbSession,
    key: string | null,
  ): Promise<OrganizationRecord> {
    if (key === null) {
      const organization = await session.organizations.selectByKey(
        this.defaultOrganizationKey,
      );
      if (!organization) {
        throw illegalState(
          `Default organization '${this.defaultOrganizationKey}' does not exist.`,
        );
      }
      return organization;
    }

    const organization = await session.organizations.selectByKey(key);
    if (!organization) {
      throw notFound(`No organization with key '${key}'.`, {
        organizationKey: key,
      });
    }
    return organization;
  }
}
