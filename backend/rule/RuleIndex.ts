import type { RuleRecord } from '../db/records';

export type RuleDocument = {
  key: string;
  name: string;
  language: string | null;
  /** True while the rule carries its own remediation settings. */
  hasOverloadedDebt: boolean;
  updatedAt: number;
};

export type RuleIndexQuery = {
  language?: string;
  overloadedDebt?: boolean;
};

export const hasOverloadedDebt = (rule: RuleRecord): boolean =>
  rule.remediationFunction !== null ||
  rule.remediationGapMultiplier !== null ||
  rule.remediationBaseEffort !== null;

export const toRuleDocument = (rule: RuleRecord): RuleDocument => ({
  key: rule.key,
  name: rule.name,
  language: rule.language,
  hasOverloadedDebt: hasOverloadedDebt(rule),
  updatedAt: rule.updatedAt,
});

/**
 * Process-local rule search index. Replaced wholesale on every reindex, so
 * readers never observe a half-built index.
 */
export class RuleIndex {
  private documents = new Map<string, RuleDocument>();
  private indexedAt: number | null = null;

  replaceAll(documents: readonly RuleDocument[], atMs: number): void {
    this.documents = new Map(documents.map((doc) => [doc.key, doc]));
    this.indexedAt = atMs;
  }

  count(): number {
    return this.documents.size;
  }

  lastIndexedAt(): number | null {
    return this.indexedAt;
  }

  get(key: string): RuleDocument | null {
    return this.documents.get(key) ?? null;
  }

  /** Matching documents ordered by key. */
  search(query: RuleIndexQuery = {}): RuleDocument[] {
    return Array.from(this.documents.values())
      .filter(
        (doc) =>
          (query.language === undefined || doc.language === query.language) &&
          (query.overloadedDebt === undefined ||
            doc.hasOverloadedDebt === query.overloadedDebt),
      )
      .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  }
}
