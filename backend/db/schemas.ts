import { z } from 'zod';

import type {
  ActiveRuleRecord,
  ComponentRecord,
  LoadedTemplateRecord,
  OrganizationRecord,
  ProjectProfileRecord,
  PropertyRecord,
  QualityProfileRecord,
  RuleRecord,
} from './records';

// Stored nodes and JSON seeds both omit absent values instead of writing null.
const nullableString = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

export const OrganizationRecordSchema: z.ZodType<
  OrganizationRecord,
  z.ZodTypeDef,
  unknown
> = z.object({
  uuid: z.string().min(1),
  key: z.string().min(1),
  name: z.string(),
});

export const ComponentRecordSchema: z.ZodType<
  ComponentRecord,
  z.ZodTypeDef,
  unknown
> = z.object({
  uuid: z.string().min(1),
  key: z.string().min(1),
  name: z.string(),
  scope: z.enum(['PRJ', 'DIR', 'FIL']),
  qualifier: z.string(),
  organizationUuid: z.string().min(1),
  projectUuid: z.string().min(1),
  moduleUuid: nullableString,
});

export const QualityProfileRecordSchema: z.ZodType<
  QualityProfileRecord,
  z.ZodTypeDef,
  unknown
> = z.object({
  key: z.string().min(1),
  name: z.string().min(1),
  language: z.string().min(1),
  organizationUuid: z.string().min(1),
  parentKey: nullableString,
  isDefault: z
    .boolean()
    .nullish()
    .transform((value) => value ?? false),
  rulesUpdatedAt: nullableString,
});

export const ProjectProfileRecordSchema: z.ZodType<
  ProjectProfileRecord,
  z.ZodTypeDef,
  unknown
> = z.object({
  projectUuid: z.string().min(1),
  profileKey: z.string().min(1),
});

export const ActiveRuleRecordSchema: z.ZodType<
  ActiveRuleRecord,
  z.ZodTypeDef,
  unknown
> = z.object({
  profileKey: z.string().min(1),
  ruleKey: z.string().min(1),
});

export const RuleRecordSchema: z.ZodType<RuleRecord, z.ZodTypeDef, unknown> =
  z.object({
    key: z.string().min(1),
    repositoryKey: z.string().min(1),
    ruleKey: z.string().min(1),
    name: z.string(),
    language: nullableString,
    remediationFunction: nullableString,
    remediationGapMultiplier: nullableString,
    remediationBaseEffort: nullableString,
    createdAt: z.number().int(),
    updatedAt: z.number().int(),
  });

export const PropertyRecordSchema: z.ZodType<
  PropertyRecord,
  z.ZodTypeDef,
  unknown
> = z.object({
  key: z.string().min(1),
  value: nullableString,
  componentUuid: nullableString,
});

export const LoadedTemplateRecordSchema: z.ZodType<
  LoadedTemplateRecord,
  z.ZodTypeDef,
  unknown
> = z.object({
  key: z.string().min(1),
  type: z.string().min(1),
});
