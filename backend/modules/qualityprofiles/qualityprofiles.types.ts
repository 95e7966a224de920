export type SearchProfileItem = {
  key: string;
  name: string;
  language: string;
  languageName: string;
  isInherited: boolean;
  parentKey?: string;
  parentName?: string;
  isDefault: boolean;
  activeRuleCount: number;
  /** Only for non-default profiles; default ones apply to every unassigned project. */
  projectCount?: number;
  rulesUpdatedAt?: string;
  organization: string;
};

export type SearchProfilesResponse = {
  profiles: SearchProfileItem[];
};

/** Raw query string values as express hands them over. */
export type SearchQuery = Record<string, unknown>;
