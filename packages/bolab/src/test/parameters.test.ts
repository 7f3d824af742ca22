import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import type { Parameter } from '../types.js';
import { ValidationError } from '../errors.js';
import {
  coerceValue, isInDomain, normalizeRow, parameterIssues, rowSatisfiesSpace, rowViolations,
  validateParameters,
} from '../space/parameters.js';
import { SIMPLE_PARAMETERS } from './helpers.js';

const temperature: Parameter = { kind: 'continuous', name: 'temperature', lower: 20, upper: 80 };
const loading: Parameter = { kind: 'discrete', name: 'loading', values: [0.1, 0.5, 1] };
const solvent: Parameter = { kind: 'categorical', name: 'solvent', levels: ['water', 'ethanol'] };
const pressure: Parameter = { kind: 'fixed', name: 'pressure', value: 1 };
const ligand: Parameter = { kind: 'chemistry', name: 'ligand', candidates: ['CCO', 'c1ccccc1'] };

describe('isInDomain()', () => {
  it('accepts continuous values within inclusive bounds', () => {
    assert.equal(isInDomain(temperature, 20), true);
    assert.equal(isInDomain(temperature, 80), true);
    assert.equal(isInDomain(temperature, 80.01), false);
    assert.equal(isInDomain(temperature, '50'), false);
    assert.equal(isInDomain(temperature, Number.NaN), false);
  });

  it('matches discrete values within tolerance', () => {
    assert.equal(isInDomain(loading, 0.5), true);
    assert.equal(isInDomain(loading, 0.1 + 1e-12), true);
    assert.equal(isInDomain(loading, 0.3), false);
  });

  it('checks categorical levels, fixed values and chemistry candidates', () => {
    assert.equal(isInDomain(solvent, 'water'), true);
    assert.equal(isInDomain(solvent, 'Water'), false);
    assert.equal(isInDomain(pressure, 1), true);
    assert.equal(isInDomain(pressure, 2), false);
    assert.equal(isInDomain(ligand, 'CCO'), true);
    assert.equal(isInDomain(ligand, 'CCN'), false);
  });

  it('rejects a missing value', () => {
    assert.equal(isInDomain(solvent, undefined), false);
  });
});

describe('parameterIssues()', () => {
  it('reports inverted bounds', () => {
    assert.deepEqual(
      parameterIssues({ kind: 'continuous', name: 't', lower: 5, upper: 1 }),
      ["parameter 't': lower bound 5 exceeds upper bound 1"],
    );
  });

  it('reports empty and duplicate levels', () => {
    assert.deepEqual(
      parameterIssues({ kind: 'categorical', name: 'c', levels: ['a', 'a'] }),
      ["parameter 'c': duplicate levels"],
    );
    assert.deepEqual(
      parameterIssues({ kind: 'categorical', name: 'c', levels: [] }),
      ["parameter 'c': no levels"],
    );
  });

  it('reports malformed structures', () => {
    const issues = parameterIssues({ kind: 'chemistry', name: 'lig', candidates: ['C(C'] });
    assert.deepEqual(issues, ["parameter 'lig': 'C(C' is not a valid structure (1 unclosed branch(es))"]);
  });

  it('rejects structures with surrounding whitespace', () => {
    const issues = parameterIssues({ kind: 'chemistry', name: 'lig', candidates: [' CCO', 'CCN'] });
    assert.deepEqual(issues, ["parameter 'lig': ' CCO' has surrounding whitespace"]);
  });

  it('accepts a well-formed space', () => {
    for (const p of [temperature, loading, solvent, pressure, ligand]) {
      assert.deepEqual(parameterIssues(p), []);
    }
  });
});

describe('validateParameters()', () => {
  it('rejects duplicate and reserved names in one error', () => {
    assert.throws(
      () => validateParameters([
        temperature,
        { kind: 'continuous', name: 'temperature', lower: 0, upper: 1 },
        { kind: 'fixed', name: 'status', value: 'x' },
      ]),
      (err: unknown) => {
        assert.ok(err instanceof ValidationError);
        assert.deepEqual(err.issues, [
          "duplicate parameter name 'temperature'",
          "parameter name 'status' is reserved",
        ]);
        return true;
      },
    );
  });
});

describe('rows', () => {
  it('reports which parameters a row violates', () => {
    const row = { x: 11, y: 'B', extra: 'ignored' };
    assert.equal(rowSatisfiesSpace(SIMPLE_PARAMETERS, row), false);
    assert.deepEqual(rowViolations(SIMPLE_PARAMETERS, row), ['x']);
    assert.deepEqual(rowViolations(SIMPLE_PARAMETERS, { y: 'D' }), ['x', 'y']);
  });

  it('normalizes to the declared parameters and discrete values', () => {
    const row = normalizeRow([temperature, loading], { loading: 0.1 + 1e-12, temperature: 25, stale: 3 });
    assert.deepEqual(row, { temperature: 25, loading: 0.1 });
    assert.deepEqual(Object.keys(row), ['temperature', 'loading']);
  });
});

describe('coerceValue()', () => {
  it('parses numbers for numeric kinds', () => {
    assert.equal(coerceValue(temperature, ' 42.5 '), 42.5);
    assert.equal(coerceValue(loading, 'abc'), undefined);
    assert.equal(coerceValue(pressure, '1'), 1);
  });

  it('keeps text for categorical and chemistry', () => {
    assert.equal(coerceValue(solvent, 'ethanol'), 'ethanol');
    assert.equal(coerceValue(ligand, 'CCO'), 'CCO');
  });

  it('treats blank text as missing', () => {
    assert.equal(coerceValue(solvent, '   '), undefined);
  });
});
