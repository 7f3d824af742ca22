import type { Parameter, ParameterRow, ParameterValue } from '../types.js';
import { ValidationError } from '../errors.js';
import { parseSmiles } from './smiles.js';

/** Column names the run CSV reserves for itself. */
export const RESERVED_COLUMNS = ['batch_id', 'row_index', 'status'] as const;

// Discrete values read back from CSV text may differ in the last bits.
const DISCRETE_TOLERANCE = 1e-9;

/**
 * Collect every problem in a single parameter's domain.
 */
export function parameterIssues(param: Parameter): string[] {
  const issues: string[] = [];
  const label = param.name ? `parameter '${param.name}'` : 'unnamed parameter';

  if (!param.name || param.name.trim() !== param.name) {
    issues.push(`${label}: name must be non-empty without surrounding whitespace`);
  }

  switch (param.kind) {
    case 'continuous':
      if (!Number.isFinite(param.lower) || !Number.isFinite(param.upper)) {
        issues.push(`${label}: bounds must be finite numbers`);
      } else if (param.lower > param.upper) {
        issues.push(`${label}: lower bound ${param.lower} exceeds upper bound ${param.upper}`);
      }
      break;
    case 'discrete':
      if (param.values.length === 0) {
        issues.push(`${label}: no values`);
      }
      if (param.values.some(v => !Number.isFinite(v))) {
        issues.push(`${label}: values must be finite numbers`);
      }
      if (new Set(param.values).size !== param.values.length) {
        issues.push(`${label}: duplicate values`);
      }
      break;
    case 'categorical':
      if (param.levels.length === 0) {
        issues.push(`${label}: no levels`);
      }
      if (param.levels.some(l => l.length === 0)) {
        issues.push(`${label}: empty level`);
      }
      if (new Set(param.levels).size !== param.levels.length) {
        issues.push(`${label}: duplicate levels`);
      }
      break;
    case 'fixed':
      if (typeof param.value === 'number' && !Number.isFinite(param.value)) {
        issues.push(`${label}: fixed value must be finite`);
      }
      if (typeof param.value === 'string' && param.value.length === 0) {
        issues.push(`${label}: fixed value is empty`);
      }
      break;
    case 'chemistry':
      if (param.candidates.length === 0) {
        issues.push(`${label}: no candidate structures`);
      }
      if (new Set(param.candidates).size !== param.candidates.length) {
        issues.push(`${label}: duplicate candidate structures`);
      }
      for (const smiles of param.candidates) {
        if (smiles.trim() !== smiles) {
          issues.push(`${label}: '${smiles}' has surrounding whitespace`);
          continue;
        }
        const problems = parseSmiles(smiles);
        if (problems.length > 0) {
          issues.push(`${label}: '${smiles}' is not a valid structure (${problems.join(', ')})`);
        }
      }
      break;
  }

  return issues;
}

/**
 * Validate an ordered parameter list. Throws ValidationError listing every issue.
 */
export function validateParameters(parameters: Parameter[]): void {
  const issues: string[] = [];
  const seen = new Set<string>();

  for (const param of parameters) {
    issues.push(...parameterIssues(param));
    if (seen.has(param.name)) {
      issues.push(`duplicate parameter name '${param.name}'`);
    }
    seen.add(param.name);
    if (RESERVED_COLUMNS.some(column => column === param.name)) {
      issues.push(`parameter name '${param.name}' is reserved`);
    }
  }

  if (issues.length > 0) {
    throw new ValidationError('Invalid parameter space', issues);
  }
}

/**
 * Check a value against a parameter's declared domain.
 */
export function isInDomain(param: Parameter, value: ParameterValue | undefined): boolean {
  switch (param.kind) {
    case 'continuous':
      return typeof value === 'number' && Number.isFinite(value)
        && value >= param.lower && value <= param.upper;
    case 'discrete':
      return typeof value === 'number'
        && param.values.some(v => Math.abs(v - value) <= DISCRETE_TOLERANCE);
    case 'categorical':
      return typeof value === 'string' && param.levels.includes(value);
    case 'fixed':
      return value === param.value;
    case 'chemistry':
      return typeof value === 'string' && param.candidates.includes(value);
  }
}

/**
 * True when the row carries an in-domain value for every parameter.
 * Extra keys are ignored.
 */
export function rowSatisfiesSpace(parameters: Parameter[], row: ParameterRow): boolean {
  return parameters.every(p => isInDomain(p, row[p.name]));
}

/** Names of the parameters whose value in `row` is missing or out of domain. */
export function rowViolations(parameters: Parameter[], row: ParameterRow): string[] {
  return parameters.filter(p => !isInDomain(p, row[p.name])).map(p => p.name);
}

/**
 * Convert CSV text into the typed value a parameter expects.
 * Returns undefined when the text cannot represent a value of that kind.
 */
export function coerceValue(param: Parameter, raw: string): ParameterValue | undefined {
  const text = raw.trim();
  if (text === '') return undefined;

  switch (param.kind) {
    case 'continuous':
    case 'discrete': {
      const num = Number(text);
      return Number.isFinite(num) ? num : undefined;
    }
    case 'fixed': {
      if (typeof param.value === 'number') {
        const num = Number(text);
        return Number.isFinite(num) ? num : undefined;
      }
      return text;
    }
    case 'categorical':
    case 'chemistry':
      return text;
  }
}

/**
 * Project a row onto the parameter list, dropping unknown keys and
 * snapping discrete values to their declared representation.
 */
export function normalizeRow(parameters: Parameter[], row: ParameterRow): ParameterRow {
  const out: ParameterRow = {};
  for (const param of parameters) {
    const value = row[param.name];
    if (value === undefined) continue;
    if (param.kind === 'discrete' && typeof value === 'number') {
      out[param.name] = param.values.find(v => Math.abs(v - value) <= DISCRETE_TOLERANCE) ?? value;
    } else {
      out[param.name] = value;
    }
  }
  return out;
}
