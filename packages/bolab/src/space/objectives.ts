import type { Objective, Parameter } from '../types.js';
import { ValidationError } from '../errors.js';
import { RESERVED_COLUMNS, validateParameters } from './parameters.js';

export function objectiveIssues(objective: Objective): string[] {
  const issues: string[] = [];
  const label = objective.name ? `objective '${objective.name}'` : 'unnamed objective';

  if (!objective.name || objective.name.trim() !== objective.name) {
    issues.push(`${label}: name must be non-empty without surrounding whitespace`);
  }
  if (objective.direction !== 'maximize' && objective.direction !== 'minimize') {
    issues.push(`${label}: direction must be maximize or minimize`);
  }
  if (!Number.isFinite(objective.weight) || objective.weight < 0) {
    issues.push(`${label}: weight must be a finite number >= 0`);
  }
  if (objective.bounds) {
    const { lower, upper } = objective.bounds;
    if (!Number.isFinite(lower) || !Number.isFinite(upper) || lower >= upper) {
      issues.push(`${label}: bounds must be finite with lower < upper`);
    }
  }
  return issues;
}

/**
 * Validate the objective list. At least one objective, unique names, weights >= 0.
 */
export function validateObjectives(objectives: Objective[]): void {
  const issues: string[] = [];
  if (objectives.length === 0) {
    issues.push('at least one objective is required');
  }
  const seen = new Set<string>();
  for (const objective of objectives) {
    issues.push(...objectiveIssues(objective));
    if (seen.has(objective.name)) {
      issues.push(`duplicate objective name '${objective.name}'`);
    }
    seen.add(objective.name);
    if ((RESERVED_COLUMNS as readonly string[]).includes(objective.name)) {
      issues.push(`objective name '${objective.name}' is reserved`);
    }
  }
  if (issues.length > 0) {
    throw new ValidationError('Invalid objectives', issues);
  }
}

/**
 * Validate parameters and objectives together: each on its own, then the
 * shared column namespace they form in run files.
 */
export function validateSpace(parameters: Parameter[], objectives: Objective[]): void {
  validateParameters(parameters);
  validateObjectives(objectives);

  const paramNames = new Set(parameters.map(p => p.name));
  const clashes = objectives.filter(o => paramNames.has(o.name)).map(o => o.name);
  if (clashes.length > 0) {
    throw new ValidationError(
      'Invalid campaign',
      clashes.map(name => `'${name}' is both a parameter and an objective`),
    );
  }
}

/**
 * Objective coverage problems for one measured row: missing, unknown, or non-finite values.
 */
export function coverageIssues(objectives: Objective[], values: Record<string, number>): string[] {
  const issues: string[] = [];
  const names = new Set(objectives.map(o => o.name));
  for (const objective of objectives) {
    const value = values[objective.name];
    if (value === undefined) {
      issues.push(`missing value for '${objective.name}'`);
    } else if (typeof value !== 'number' || !Number.isFinite(value)) {
      issues.push(`value for '${objective.name}' is not a finite number`);
    }
  }
  for (const key of Object.keys(values)) {
    if (!names.has(key)) {
      issues.push(`unknown objective '${key}'`);
    }
  }
  return issues;
}

/**
 * Scalar desirability of a measured row.
 *
 * One objective: the raw value, negated when minimizing.
 * Several objectives: each is scaled onto [0, 1] through its bounds
 * (inverted for minimize, clamped) and combined as a weighted geometric mean.
 * Returns null when the blend is undefined (unbounded objective, zero total
 * weight, or a missing value).
 */
export function desirability(objectives: Objective[], values: Record<string, number>): number | null {
  if (objectives.length === 1) {
    const [only] = objectives;
    const value = values[only.name];
    if (value === undefined || !Number.isFinite(value)) return null;
    return only.direction === 'maximize' ? value : -value;
  }

  const totalWeight = objectives.reduce((sum, o) => sum + o.weight, 0);
  if (totalWeight <= 0) return null;

  let logSum = 0;
  for (const objective of objectives) {
    const value = values[objective.name];
    if (!objective.bounds || value === undefined || !Number.isFinite(value)) return null;
    if (objective.weight === 0) continue;

    const { lower, upper } = objective.bounds;
    let scaled = (value - lower) / (upper - lower);
    scaled = Math.min(1, Math.max(0, scaled));
    if (objective.direction === 'minimize') scaled = 1 - scaled;
    if (scaled === 0) return 0;
    logSum += objective.weight * Math.log(scaled);
  }
  return Math.exp(logSum / totalWeight);
}
