export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// ── Parameter space ──────────────────────────────────────────

export type ParameterKind = 'continuous' | 'discrete' | 'categorical' | 'fixed' | 'chemistry';

export interface ContinuousParameter {
  kind: 'continuous';
  name: string;
  lower: number;
  upper: number;
}

export interface DiscreteParameter {
  kind: 'discrete';
  name: string;
  values: number[];
}

export interface CategoricalParameter {
  kind: 'categorical';
  name: string;
  levels: string[];
}

export interface FixedParameter {
  kind: 'fixed';
  name: string;
  value: number | string;
}

export interface ChemistryParameter {
  kind: 'chemistry';
  name: string;
  candidates: string[];   // SMILES strings
}

export type Parameter =
  | ContinuousParameter
  | DiscreteParameter
  | CategoricalParameter
  | FixedParameter
  | ChemistryParameter;

export type ParameterValue = number | string;

/** One suggested experiment: parameter name → value. */
export type ParameterRow = Record<string, ParameterValue>;

// ── Objectives ───────────────────────────────────────────────

export type Direction = 'maximize' | 'minimize';

export interface Objective {
  name: string;
  direction: Direction;
  weight: number;
  bounds?: { lower: number; upper: number };
}

// ── Campaign ─────────────────────────────────────────────────

export interface CampaignConfig {
  schema_version: number;
  id: string;
  name: string;
  version: number;
  parameters: Parameter[];
  objectives: Objective[];
  settings: JsonObject;
  created_at: string;
  updated_at: string;
}

export interface CampaignSpec {
  name: string;
  parameters: Parameter[];
  objectives: Objective[];
  settings?: JsonObject;
}

export interface CampaignEdit {
  name?: string;
  parameters?: Parameter[];
  objectives?: Objective[];
  settings?: JsonObject;
}

// ── Run history ──────────────────────────────────────────────

export type BatchStatus = 'pending' | 'completed';
export type Provenance = 'optimizer' | 'fallback' | 'import';

export interface RunBatch {
  batch_id: string;
  sequence: number;
  generated_at: string;
  status: BatchStatus;
  provenance: Provenance;
  config_version: number;
  config_hash: string;
  fallback_reason: string | null;
  seed: number | null;
  completed_at: string | null;
  rows: ParameterRow[];
}

export interface RunResult {
  batch_id: string;
  row_index: number;
  values: Record<string, number>;
  ingested_at: string;
}

/** One submitted measurement for a batch row. */
export interface ResultRow {
  row_index: number;
  values: Record<string, number>;
}

/** A completed row joined with its parameters — what the engine trains on. */
export interface Measurement {
  batch_id: string;
  row_index: number;
  parameters: ParameterRow;
  objectives: Record<string, number>;
  ingested_at: string;
}

export interface CampaignHistory {
  campaign_id: string;
  config_version: number;
  batches: RunBatch[];
  results: RunResult[];
  best: (Measurement & { score: number }) | null;
}

export interface RecordOutcome {
  batch_id: string;
  status: 'completed' | 'already_completed';
  appended: number;
}

// ── Optimizer state ──────────────────────────────────────────

export interface OptimizerStateTag {
  format: number;
  engine: string;
  config_hash: string;
  config_version: number;
  measurements: number;
  built_at: string;
}
