import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import type { Parameter } from '../types.js';
import { ValidationError } from '../errors.js';
import { FallbackSampler } from '../sampling/fallback.js';
import { createSeededRng, seedFromString } from '../sampling/prng.js';
import { rowSatisfiesSpace } from '../space/parameters.js';
import { SIMPLE_PARAMETERS } from './helpers.js';

const MIXED: Parameter[] = [
  { kind: 'continuous', name: 'temperature', lower: 20, upper: 80 },
  { kind: 'discrete', name: 'loading', values: [0.1, 0.5, 1] },
  { kind: 'categorical', name: 'solvent', levels: ['water', 'ethanol', 'toluene'] },
  { kind: 'fixed', name: 'pressure', value: 1 },
  { kind: 'chemistry', name: 'ligand', candidates: ['CCO', 'c1ccccc1', 'CC(=O)O'] },
];

describe('SeededRng', () => {
  it('repeats its sequence for the same seed', () => {
    const a = createSeededRng(7);
    const b = createSeededRng(7);
    const drawsA = Array.from({ length: 5 }, () => a.next());
    const drawsB = Array.from({ length: 5 }, () => b.next());
    assert.deepEqual(drawsA, drawsB);
    assert.ok(drawsA.every(v => v >= 0 && v < 1));
  });

  it('keeps nextInt within inclusive bounds', () => {
    const rng = createSeededRng(99);
    const seen = new Set<number>();
    for (let i = 0; i < 200; i++) seen.add(rng.nextInt(1, 3));
    assert.deepEqual([...seen].sort(), [1, 2, 3]);
  });

  it('refuses to pick from an empty list', () => {
    assert.throws(() => createSeededRng(1).pick([]), RangeError);
  });

  it('derives stable seeds from strings', () => {
    assert.equal(seedFromString('42:3'), seedFromString('42:3'));
    assert.notEqual(seedFromString('42:3'), seedFromString('42:4'));
  });
});

describe('FallbackSampler', () => {
  const sampler = new FallbackSampler();

  it('draws every row inside the space', () => {
    const rows = sampler.sample(MIXED, 50, 1234);
    assert.equal(rows.length, 50);
    for (const row of rows) {
      assert.ok(rowSatisfiesSpace(MIXED, row), JSON.stringify(row));
      assert.deepEqual(Object.keys(row), MIXED.map(p => p.name));
      assert.equal(row.pressure, 1);
    }
  });

  it('stays finite and in bounds when the span overflows', () => {
    const wide: Parameter[] = [{ kind: 'continuous', name: 'x', lower: -1.7e308, upper: 1.7e308 }];
    const rows = sampler.sample(wide, 20, 7);
    for (const row of rows) {
      assert.equal(typeof row.x, 'number');
      assert.ok(Number.isFinite(row.x), String(row.x));
      assert.ok(rowSatisfiesSpace(wide, row));
    }
  });

  it('returns the single point of a zero-width range', () => {
    const point: Parameter[] = [{ kind: 'continuous', name: 'x', lower: 3, upper: 3 }];
    assert.deepEqual(sampler.sample(point, 2, 1), [{ x: 3 }, { x: 3 }]);
  });

  it('is deterministic for a seed', () => {
    assert.deepEqual(sampler.sample(SIMPLE_PARAMETERS, 4, 42), sampler.sample(SIMPLE_PARAMETERS, 4, 42));
    assert.notDeepEqual(sampler.sample(SIMPLE_PARAMETERS, 4, 42), sampler.sample(SIMPLE_PARAMETERS, 4, 43));
  });

  it('covers every chemistry candidate', () => {
    const seen = new Set(sampler.sample(MIXED, 200, 5).map(r => r.ligand));
    assert.equal(seen.size, 3);
  });

  it('rejects a non-positive batch size', () => {
    assert.throws(() => sampler.sample(SIMPLE_PARAMETERS, 0, 1), ValidationError);
    assert.throws(() => sampler.sample(SIMPLE_PARAMETERS, 2.5, 1), ValidationError);
  });
});
