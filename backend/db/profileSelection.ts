import type { QualityProfileRecord } from './records';

/**
 * Keeps the first profile seen for each language. Lookups that resolve "the"
 * profile of a language rely on this when the store holds duplicates.
 */
export const firstPerLanguage = (
  rows: readonly QualityProfileRecord[],
): QualityProfileRecord[] => {
  const seen = new Set<string>();
  return rows.filter((row) => {
    if (seen.has(row.language)) return false;
    seen.add(row.language);
    return true;
  });
};
