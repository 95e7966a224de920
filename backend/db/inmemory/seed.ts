import fs from 'node:fs';
import { z } from 'zod';

import {
  ActiveRuleRecordSchema,
  ComponentRecordSchema,
  LoadedTemplateRecordSchema,
  OrganizationRecordSchema,
  ProjectProfileRecordSchema,
  PropertyRecordSchema,
  QualityProfileRecordSchema,
  RuleRecordSchema,
} from '../schemas';
import type { InMemoryDatabaseState } from './InMemoryDbClient';

const SeedSchema = z.object({
  organizations: z.array(OrganizationRecordSchema).default([]),
  components: z.array(ComponentRecordSchema).default([]),
  qualityProfiles: z.array(QualityProfileRecordSchema).default([]),
  projectProfiles: z.array(ProjectProfileRecordSchema).default([]),
  activeRules: z.array(ActiveRuleRecordSchema).default([]),
  rules: z.array(RuleRecordSchema).default([]),
  properties: z.array(PropertyRecordSchema).default([]),
  loadedTemplates: z.array(LoadedTemplateRecordSchema).default([]),
});

export type SeedParseResult =
  | { ok: true; value: InMemoryDatabaseState }
  | { ok: false; errors: string[] };

export function parseSeed(payload: unknown): SeedParseResult {
  const parsed = SeedSchema.safeParse(payload);
  if (!parsed.success) {
    return {
      ok: false,
      errors: parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      ),
    };
  }
  return { ok: true, value: parsed.data };
}

/** Reads and validates a JSON seed; throws with every schema issue listed. */
export function loadSeedFile(filePath: string): InMemoryDatabaseState {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  const result = parseSeed(raw);
  if (!result.ok) {
    throw new Error(
      `Invalid seed file ${filePath}:\n  ${result.errors.join('\n  ')}`,
    );
  }
  return result.value;
}
