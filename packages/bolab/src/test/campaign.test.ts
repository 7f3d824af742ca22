import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { IncompatibleSchemaError, ValidationError } from '../errors.js';
import {
  configHash, createCampaignConfig, deserializeCampaign, editCampaignConfig, readCampaignDocument,
  serializeCampaign,
} from '../campaign/config.js';
import { CURRENT_SCHEMA_VERSION } from '../campaign/schema.js';
import { FIXED_NOW, SIMPLE_SPEC } from './helpers.js';

const LATER = new Date('2026-03-02T08:30:00.000Z');

function makeConfig() {
  return createCampaignConfig({ ...SIMPLE_SPEC, settings: { acquisition: { function: 'qLogEI' } } }, FIXED_NOW, 'cmp-1');
}

describe('createCampaignConfig()', () => {
  it('starts at version 1 with both timestamps set', () => {
    const config = makeConfig();
    assert.equal(config.id, 'cmp-1');
    assert.equal(config.version, 1);
    assert.equal(config.schema_version, CURRENT_SCHEMA_VERSION);
    assert.equal(config.created_at, '2026-03-01T12:00:00.000Z');
    assert.equal(config.updated_at, '2026-03-01T12:00:00.000Z');
  });

  it('rejects an invalid space', () => {
    assert.throws(
      () => createCampaignConfig({ ...SIMPLE_SPEC, objectives: [] }, FIXED_NOW),
      ValidationError,
    );
  });

  it('generates an id when none is given', () => {
    const a = createCampaignConfig(SIMPLE_SPEC, FIXED_NOW);
    const b = createCampaignConfig(SIMPLE_SPEC, FIXED_NOW);
    assert.notEqual(a.id, b.id);
  });
});

describe('configHash()', () => {
  it('ignores key order, name and timestamps', () => {
    const config = makeConfig();
    const renamed = { ...config, name: 'Other', updated_at: '2030-01-01T00:00:00.000Z' };
    const reordered = {
      ...config,
      parameters: config.parameters.map(p => p.kind === 'continuous'
        ? { upper: p.upper, lower: p.lower, name: p.name, kind: p.kind }
        : p),
    };
    assert.equal(configHash(renamed), configHash(config));
    assert.equal(configHash(reordered), configHash(config));
  });

  it('changes with the space', () => {
    const config = makeConfig();
    const widened = { ...config, parameters: [{ kind: 'continuous' as const, name: 'x', lower: 0, upper: 20 }] };
    assert.notEqual(configHash(widened), configHash(config));
  });
});

describe('editCampaignConfig()', () => {
  it('bumps the version on a structural edit', () => {
    const config = makeConfig();
    const { config: next, structural } = editCampaignConfig(config, {
      parameters: [...config.parameters, { kind: 'fixed', name: 'pressure', value: 1 }],
    }, LATER);
    assert.equal(structural, true);
    assert.equal(next.version, 2);
    assert.equal(next.updated_at, '2026-03-02T08:30:00.000Z');
    assert.equal(next.created_at, config.created_at);
  });

  it('keeps the version on a rename', () => {
    const config = makeConfig();
    const { config: next, structural } = editCampaignConfig(config, { name: 'Yield screen v2' }, LATER);
    assert.equal(structural, false);
    assert.equal(next.version, 1);
    assert.equal(next.name, 'Yield screen v2');
  });

  it('returns the same config for a no-op edit', () => {
    const config = makeConfig();
    const result = editCampaignConfig(config, { name: config.name, objectives: config.objectives }, LATER);
    assert.equal(result.config, config);
    assert.equal(result.structural, false);
  });

  it('validates the edited space', () => {
    const config = makeConfig();
    assert.throws(
      () => editCampaignConfig(config, { parameters: [{ kind: 'categorical', name: 'y', levels: [] }] }, LATER),
      ValidationError,
    );
  });
});

describe('serialization', () => {
  it('round-trips a config unchanged', () => {
    const config = makeConfig();
    const back = deserializeCampaign(serializeCampaign(config), LATER);
    assert.deepEqual(back, config);
  });

  it('rejects a newer schema version', () => {
    const text = JSON.stringify({ ...makeConfig(), schema_version: CURRENT_SCHEMA_VERSION + 1 });
    assert.throws(() => readCampaignDocument(text), IncompatibleSchemaError);
  });

  it('rejects malformed JSON', () => {
    assert.throws(
      () => readCampaignDocument('{"name":'),
      (err: unknown) => err instanceof ValidationError && err.message.startsWith('Campaign config is not valid JSON'),
    );
  });

  it('migrates the legacy layout and bumps the version once', () => {
    const legacy = {
      id: 'legacy-1',
      name: 'Suzuki coupling',
      version: 3,
      parameters: [
        { type: 'numerical_continuous', name: 'temperature', bounds: [20, 80] },
        { type: 'numerical_discrete', name: 'equiv', values: [1, 1.5, 2] },
        { type: 'categorical', name: 'base', values: ['K2CO3', 'Cs2CO3'] },
        { type: 'substance', name: 'solvent', data: { Ethanol: 'CCO', Water: 'O' } },
      ],
      targets: [{ name: 'yield', mode: 'MAX' }],
      created_at: '2025-11-01T09:00:00.000Z',
      updated_at: '2025-11-02T09:00:00.000Z',
    };

    const { config, migratedFrom } = readCampaignDocument(JSON.stringify(legacy), LATER);
    assert.equal(migratedFrom, 1);
    assert.equal(config.schema_version, CURRENT_SCHEMA_VERSION);
    assert.equal(config.version, 4);
    assert.equal(config.updated_at, '2026-03-02T08:30:00.000Z');
    assert.deepEqual(config.parameters, [
      { kind: 'continuous', name: 'temperature', lower: 20, upper: 80 },
      { kind: 'discrete', name: 'equiv', values: [1, 1.5, 2] },
      { kind: 'categorical', name: 'base', levels: ['K2CO3', 'Cs2CO3'] },
      { kind: 'chemistry', name: 'solvent', candidates: ['CCO', 'O'] },
    ]);
    assert.deepEqual(config.objectives, [{ name: 'yield', direction: 'maximize', weight: 1 }]);
    assert.deepEqual(config.settings, {});
  });
});
