import type { Parameter, ParameterRow, ParameterValue } from '../types.js';
import { ValidationError } from '../errors.js';
import { isPositiveInteger } from '../utils.js';
import { createSeededRng, randomSeed, type SeededRng } from './prng.js';

/** Point `r` of the way from `lower` to `upper`, finite even when the span overflows. */
function interpolate(lower: number, upper: number, r: number): number {
  const span = upper - lower;
  const value = Number.isFinite(span) ? lower + span * r : lower * (1 - r) + upper * r;
  return Math.min(upper, Math.max(lower, value));
}

function drawValue(rng: SeededRng, param: Parameter): ParameterValue {
  switch (param.kind) {
    case 'continuous': return interpolate(param.lower, param.upper, rng.next());
    case 'discrete': return rng.pick(param.values);
    case 'categorical': return rng.pick(param.levels);
    case 'fixed': return param.value;
    case 'chemistry': return rng.pick(param.candidates);
  }
}

/**
 * Uniform random sampling over a validated parameter space.
 * Used whenever the optimizer cannot answer; has no engine dependency.
 */
export class FallbackSampler {
  /**
   * Draw `batchSize` rows, each value independent and uniform over its domain.
   * The same seed always yields the same rows.
   */
  sample(parameters: Parameter[], batchSize: number, seed: number = randomSeed()): ParameterRow[] {
    if (!isPositiveInteger(batchSize)) {
      throw new ValidationError(`Batch size must be a positive integer, got ${batchSize}`);
    }
    const rng = createSeededRng(seed);
    const rows: ParameterRow[] = [];
    for (let i = 0; i < batchSize; i++) {
      const row: ParameterRow = {};
      for (const param of parameters) {
        row[param.name] = drawValue(rng, param);
      }
      rows.push(row);
    }
    return rows;
  }
}
