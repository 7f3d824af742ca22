import { z } from 'zod';
import { ValidationError } from '../errors.js';
import { formatIssues, JsonObjectSchema } from './schema.js';

/**
 * Config format migrations. Each entry is an array index:
 * migrations[0] upgrades a format-1 document to format 2, etc.
 * A document whose format has no entry here cannot be loaded.
 */

type Migration = (doc: unknown) => Record<string, unknown>;

// Format 1: the desktop application's layout — typed parameters and MAX/MIN targets.
const LegacyParameterSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('numerical_continuous'), name: z.string(), bounds: z.tuple([z.number(), z.number()]) }),
  z.object({ type: z.literal('numerical_discrete'), name: z.string(), values: z.array(z.number()) }),
  z.object({ type: z.literal('categorical'), name: z.string(), values: z.array(z.string()) }),
  z.object({ type: z.literal('fixed'), name: z.string(), value: z.union([z.number(), z.string()]) }),
  z.object({ type: z.literal('substance'), name: z.string(), data: z.record(z.string()) }),
]);

const LegacyCampaignSchema = z.object({
  id: z.string(),
  name: z.string(),
  version: z.number().int().positive().default(1),
  parameters: z.array(LegacyParameterSchema),
  targets: z.array(z.object({
    name: z.string(),
    mode: z.enum(['MAX', 'MIN']),
    weight: z.number().optional(),
    bounds: z.tuple([z.number(), z.number()]).optional(),
  })),
  settings: JsonObjectSchema.default({}),
  created_at: z.string(),
  updated_at: z.string(),
});

function migrateLegacyLayout(doc: unknown): Record<string, unknown> {
  const parsed = LegacyCampaignSchema.safeParse(doc);
  if (!parsed.success) {
    throw new ValidationError('Unreadable format-1 campaign', formatIssues(parsed.error));
  }
  const legacy = parsed.data;

  const parameters = legacy.parameters.map(p => {
    switch (p.type) {
      case 'numerical_continuous':
        return { kind: 'continuous', name: p.name, lower: p.bounds[0], upper: p.bounds[1] };
      case 'numerical_discrete':
        return { kind: 'discrete', name: p.name, values: p.values };
      case 'categorical':
        return { kind: 'categorical', name: p.name, levels: p.values };
      case 'fixed':
        return { kind: 'fixed', name: p.name, value: p.value };
      case 'substance':
        // Labels were display-only; the structures are the domain.
        return { kind: 'chemistry', name: p.name, candidates: Object.values(p.data) };
    }
  });

  const objectives = legacy.targets.map(t => ({
    name: t.name,
    direction: t.mode === 'MAX' ? 'maximize' : 'minimize',
    weight: t.weight ?? 1,
    ...(t.bounds ? { bounds: { lower: t.bounds[0], upper: t.bounds[1] } } : {}),
  }));

  return {
    schema_version: 2,
    id: legacy.id,
    name: legacy.name,
    version: legacy.version,
    parameters,
    objectives,
    settings: legacy.settings,
    created_at: legacy.created_at,
    updated_at: legacy.updated_at,
  };
}

export const migrations: Migration[] = [
  // 001: format 1 → 2
  migrateLegacyLayout,
];

/**
 * Run every migration from `fromVersion` up to the current format.
 * Returns null if any step is missing.
 */
export function migrateDocument(doc: unknown, fromVersion: number, toVersion: number): Record<string, unknown> | null {
  let current = doc;
  let result: Record<string, unknown> | null = null;
  for (let v = fromVersion; v < toVersion; v++) {
    const step = migrations[v - 1];
    if (!step) return null;
    result = step(current);
    current = result;
  }
  return result;
}
