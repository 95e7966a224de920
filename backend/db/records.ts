/**
 * Row shapes shared by every DbClient implementation.
 *
 * Timestamps are epoch milliseconds, matching what the clock hands out.
 */

export type OrganizationRecord = {
  uuid: string;
  key: string;
  name: string;
};

export type ComponentScope = 'PRJ' | 'DIR' | 'FIL';

export type ComponentRecord = {
  uuid: string;
  key: string;
  name: string;
  scope: ComponentScope;
  /** TRK for projects, BRC for modules, DIR/FIL below. */
  qualifier: string;
  organizationUuid: string;
  /** Uuid of the root project this component belongs to (itself for a root project). */
  projectUuid: string;
  /** Uuid of the enclosing module; null for root projects. */
  moduleUuid: string | null;
};

export type QualityProfileRecord = {
  key: string;
  name: string;
  language: string;
  organizationUuid: string;
  parentKey: string | null;
  isDefault: boolean;
  rulesUpdatedAt: string | null;
};

/** Explicit association of a project with a non-default profile. */
export type ProjectProfileRecord = {
  projectUuid: string;
  profileKey: string;
};

export type ActiveRuleRecord = {
  profileKey: string;
  ruleKey: string;
};

export type RuleRecord = {
  /** `${repositoryKey}:${ruleKey}` */
  key: string;
  repositoryKey: string;
  ruleKey: string;
  name: string;
  language: string | null;
  remediationFunction: string | null;
  remediationGapMultiplier: string | null;
  remediationBaseEffort: string | null;
  createdAt: number;
  updatedAt: number;
};

export type PropertyRecord = {
  key: string;
  value: string | null;
  /** null for global properties. */
  componentUuid: string | null;
};

export const ONE_SHOT_TASK_TYPE = 'ONE_SHOT_TASK';

export type LoadedTemplateRecord = {
  key: string;
  type: string;
};
