import { z } from 'zod';
import type { JsonValue } from '../types.js';

/** Serialization format written by this build. */
export const CURRENT_SCHEMA_VERSION = 2;

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

export const JsonObjectSchema = z.record(JsonValueSchema);

export const ParameterSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('continuous'),
    name: z.string(),
    lower: z.number(),
    upper: z.number(),
  }),
  z.object({
    kind: z.literal('discrete'),
    name: z.string(),
    values: z.array(z.number()),
  }),
  z.object({
    kind: z.literal('categorical'),
    name: z.string(),
    levels: z.array(z.string()),
  }),
  z.object({
    kind: z.literal('fixed'),
    name: z.string(),
    value: z.union([z.number(), z.string()]),
  }),
  z.object({
    kind: z.literal('chemistry'),
    name: z.string(),
    candidates: z.array(z.string()),
  }),
]);

export const ObjectiveSchema = z.object({
  name: z.string(),
  direction: z.enum(['maximize', 'minimize']),
  weight: z.number().default(1),
  bounds: z.object({ lower: z.number(), upper: z.number() }).optional(),
});

/** On-disk layout of campaigns/<id>/config.json at the current format. */
export const CampaignDocumentSchema = z.object({
  schema_version: z.literal(CURRENT_SCHEMA_VERSION),
  id: z.string().min(1),
  name: z.string(),
  version: z.number().int().positive(),
  parameters: z.array(ParameterSchema),
  objectives: z.array(ObjectiveSchema),
  settings: JsonObjectSchema,
  created_at: z.string(),
  updated_at: z.string(),
});

/** What a user hands to `createCampaign` (spec files for `bolab new`). */
export const CampaignSpecSchema = z.object({
  name: z.string(),
  parameters: z.array(ParameterSchema),
  objectives: z.array(ObjectiveSchema),
  settings: JsonObjectSchema.optional(),
});

export const CampaignEditSchema = CampaignSpecSchema.partial();

/** Turn zod issues into flat "path: message" strings. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}
