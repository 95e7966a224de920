import type {
  ComponentRecord,
  OrganizationRecord,
  QualityProfileRecord,
  RuleRecord,
} from '../../db/records';

export const DEFAULT_ORG: OrganizationRecord = {
  uuid: 'org-default',
  key: 'default-organization',
  name: 'Default Organization',
};

export const OTHER_ORG: OrganizationRecord = {
  uuid: 'org-other',
  key: 'other',
  name: 'Other',
};

export const LANGUAGES = [
  { key: 'java', name: 'Java' },
  { key: 'js', name: 'JavaScript' },
  { key: 'py', name: 'Python' },
];

export const makeProfile = (
  key: string,
  overrides?: Partial<QualityProfileRecord>,
): QualityProfileRecord => ({
  key,
  name: 'Team Way',
  language: 'java',
  organizationUuid: DEFAULT_ORG.uuid,
  parentKey: null,
  isDefault: false,
  rulesUpdatedAt: null,
  ...(overrides ?? {}),
});

export const makeProject = (
  uuid: string,
  key: string,
  overrides?: Partial<ComponentRecord>,
): ComponentRecord => ({
  uuid,
  key,
  name: key,
  scope: 'PRJ',
  qualifier: 'TRK',
  organizationUuid: DEFAULT_ORG.uuid,
  projectUuid: uuid,
  moduleUuid: null,
  ...(overrides ?? {}),
});

export const makeModule = (
  uuid: string,
  key: string,
  project: ComponentRecord,
): ComponentRecord => ({
  uuid,
  key,
  name: key,
  scope: 'PRJ',
  qualifier: 'BRC',
  organizationUuid: project.organizationUuid,
  projectUuid: project.uuid,
  moduleUuid: project.uuid,
});

export const makeRule = (
  key: string,
  overrides?: Partial<RuleRecord>,
): RuleRecord => {
  const [repositoryKey = 'java', ruleKey = key] = key.split(':');
  return {
    key,
    repositoryKey,
    ruleKey,
    name: `Rule ${key}`,
    language: repositoryKey,
    remediationFunction: null,
    remediationGapMultiplier: null,
    remediationBaseEffort: null,
    createdAt: 1_700_000_000_000,
    updatedAt: 1_700_000_000_000,
    ...(overrides ?? {}),
  };
};
