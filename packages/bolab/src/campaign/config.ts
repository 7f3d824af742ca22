import { randomUUID } from 'node:crypto';
import type { CampaignConfig, CampaignEdit, CampaignSpec, JsonObject, Objective, Parameter } from '../types.js';
import { IncompatibleSchemaError, ValidationError } from '../errors.js';
import { validateSpace } from '../space/objectives.js';
import { sha256Hex, stableStringify, nowIso } from '../utils.js';
import { CampaignDocumentSchema, CURRENT_SCHEMA_VERSION, formatIssues } from './schema.js';
import { migrateDocument } from './migrations.js';

// ── Construction ─────────────────────────────────────────────

/**
 * Copy a parameter keeping only the fields of its kind.
 * Keeps serialized and in-memory configs equal after a round trip.
 */
function canonicalParameter(p: Parameter): Parameter {
  switch (p.kind) {
    case 'continuous': return { kind: p.kind, name: p.name, lower: p.lower, upper: p.upper };
    case 'discrete': return { kind: p.kind, name: p.name, values: [...p.values] };
    case 'categorical': return { kind: p.kind, name: p.name, levels: [...p.levels] };
    case 'fixed': return { kind: p.kind, name: p.name, value: p.value };
    case 'chemistry': return { kind: p.kind, name: p.name, candidates: [...p.candidates] };
  }
}

function canonicalObjective(o: Objective): Objective {
  const out: Objective = { name: o.name, direction: o.direction, weight: o.weight };
  if (o.bounds) out.bounds = { lower: o.bounds.lower, upper: o.bounds.upper };
  return out;
}

function cloneSettings(settings: JsonObject): JsonObject {
  return structuredClone(settings);
}

/**
 * Build a new campaign at version 1. Throws ValidationError from either sub-spec.
 */
export function createCampaignConfig(spec: CampaignSpec, now: Date = new Date(), id: string = randomUUID()): CampaignConfig {
  const parameters = spec.parameters.map(canonicalParameter);
  const objectives = spec.objectives.map(canonicalObjective);
  validateSpace(parameters, objectives);

  const timestamp = nowIso(now);
  return {
    schema_version: CURRENT_SCHEMA_VERSION,
    id,
    name: spec.name,
    version: 1,
    parameters,
    objectives,
    settings: cloneSettings(spec.settings ?? {}),
    created_at: timestamp,
    updated_at: timestamp,
  };
}

/**
 * Deterministic content hash over parameters, objectives and settings.
 * Name, id, version and timestamps are excluded.
 */
export function configHash(config: Pick<CampaignConfig, 'parameters' | 'objectives' | 'settings'>): string {
  return sha256Hex(stableStringify({
    parameters: config.parameters,
    objectives: config.objectives,
    settings: config.settings,
  }));
}

export interface EditResult {
  config: CampaignConfig;
  structural: boolean;
}

/**
 * Apply an edit. Structural edits (anything that changes the content hash)
 * bump `version`; a rename only touches `name` and `updated_at`.
 */
export function editCampaignConfig(config: CampaignConfig, edit: CampaignEdit, now: Date = new Date()): EditResult {
  const next: CampaignConfig = {
    ...config,
    name: edit.name ?? config.name,
    parameters: edit.parameters ? edit.parameters.map(canonicalParameter) : config.parameters,
    objectives: edit.objectives ? edit.objectives.map(canonicalObjective) : config.objectives,
    settings: edit.settings ? cloneSettings(edit.settings) : config.settings,
  };
  validateSpace(next.parameters, next.objectives);

  const structural = configHash(next) !== configHash(config);
  const renamed = next.name !== config.name;
  if (!structural && !renamed) {
    return { config, structural: false };
  }

  next.version = structural ? config.version + 1 : config.version;
  next.updated_at = nowIso(now);
  return { config: next, structural };
}

// ── Serialization ────────────────────────────────────────────

export function serializeCampaign(config: CampaignConfig): string {
  const doc = CampaignDocumentSchema.parse(config);
  return `${JSON.stringify(doc, null, 2)}\n`;
}

export interface CampaignDocument {
  config: CampaignConfig;
  /** Format the document was stored in, when it had to be migrated. */
  migratedFrom: number | null;
}

/**
 * Parse a stored config. Older formats run through the migration chain and
 * come back at the current format with `version` bumped once; newer formats,
 * or older ones with no migration, throw IncompatibleSchemaError.
 */
export function readCampaignDocument(text: string, now: Date = new Date()): CampaignDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ValidationError('Campaign config is not valid JSON', [err instanceof Error ? err.message : String(err)]);
  }
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ValidationError('Campaign config must be a JSON object');
  }

  const declared = 'schema_version' in raw ? raw.schema_version : 1;
  if (typeof declared !== 'number' || !Number.isInteger(declared) || declared < 1) {
    throw new ValidationError('Campaign config has an invalid schema_version');
  }
  if (declared > CURRENT_SCHEMA_VERSION) {
    throw new IncompatibleSchemaError(declared, CURRENT_SCHEMA_VERSION);
  }

  let doc: unknown = raw;
  let migratedFrom: number | null = null;
  if (declared < CURRENT_SCHEMA_VERSION) {
    const migrated = migrateDocument(raw, declared, CURRENT_SCHEMA_VERSION);
    if (!migrated) {
      throw new IncompatibleSchemaError(declared, CURRENT_SCHEMA_VERSION);
    }
    doc = migrated;
    migratedFrom = declared;
  }

  const parsed = CampaignDocumentSchema.safeParse(doc);
  if (!parsed.success) {
    throw new ValidationError('Campaign config does not match the expected layout', formatIssues(parsed.error));
  }

  let config: CampaignConfig = parsed.data;
  validateSpace(config.parameters, config.objectives);

  if (migratedFrom !== null) {
    config = { ...config, version: config.version + 1, updated_at: nowIso(now) };
  }
  return { config, migratedFrom };
}

export function deserializeCampaign(text: string, now?: Date): CampaignConfig {
  return readCampaignDocument(text, now).config;
}
