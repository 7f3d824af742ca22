import { describe, it, beforeEach, afterEach } from 'node:test';
import * as assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { CampaignConfig, Measurement } from '../types.js';
import { OptimizerUnavailable } from '../errors.js';
import { createCampaignConfig } from '../campaign/config.js';
import { createEmitter, MemoryEventSink } from '../events.js';
import { OptimizerAdapter } from '../optimizer/adapter.js';
import { loadState } from '../optimizer/state-store.js';
import { FakeEngine } from './fakes.js';
import { FIXED_NOW, SIMPLE_SPEC, makeTempDir, removeDir } from './helpers.js';

function measurement(row_index: number, x: number, y: string, z: number): Measurement {
  return {
    batch_id: 'batch-0001',
    row_index,
    parameters: { x, y },
    objectives: { z },
    ingested_at: '2026-03-01T12:00:00.000Z',
  };
}

function signal(): AbortSignal {
  return new AbortController().signal;
}

async function rejectsWith(promise: Promise<unknown>, message: string): Promise<void> {
  await assert.rejects(promise, (err: unknown) => {
    assert.ok(err instanceof OptimizerUnavailable);
    assert.equal(err.message, message);
    return true;
  });
}

describe('OptimizerAdapter', () => {
  let dir: string;
  let statePath: string;
  let engine: FakeEngine;
  let sink: MemoryEventSink;
  let config: CampaignConfig;

  function makeAdapter(): OptimizerAdapter {
    return new OptimizerAdapter({ engine, statePath, emit: createEmitter(sink, config.id), now: () => FIXED_NOW });
  }

  beforeEach(() => {
    dir = makeTempDir();
    statePath = path.join(dir, 'optimizer_state.bin');
    engine = new FakeEngine();
    sink = new MemoryEventSink();
    config = createCampaignConfig(SIMPLE_SPEC, FIXED_NOW, 'cmp-1');
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('builds and persists a state when none exists', async () => {
    const adapter = makeAdapter();
    const handle = await adapter.resolve(config, [], signal());

    assert.equal(engine.builds.length, 1);
    assert.equal(handle.tag.measurements, 0);
    assert.equal(handle.tag.config_version, 1);
    assert.equal(handle.tag.built_at, '2026-03-01T12:00:00.000Z');
    assert.deepEqual(sink.ofType('optimizer_state_rebuilt').map(e => e.data), [
      { reason: 'missing', measurements: 0, excluded: 0 },
    ]);
    assert.equal(loadState(statePath).status, 'ok');
  });

  it('reuses a fresh live handle', async () => {
    const adapter = makeAdapter();
    const first = await adapter.resolve(config, [], signal());
    const second = await adapter.resolve(config, [], signal());
    assert.equal(second.id, first.id);
    assert.equal(engine.builds.length, 1);
    assert.equal(adapter.size, 1);
  });

  it('loads a fresh state from disk without building', async () => {
    await makeAdapter().resolve(config, [], signal());
    engine.builds.length = 0;

    const handle = await makeAdapter().resolve(config, [], signal());
    assert.equal(engine.builds.length, 0);
    assert.equal(handle.tag.measurements, 0);
    assert.deepEqual(sink.ofType('optimizer_state_loaded').map(e => e.data), [
      { config_version: 1, measurements: 0 },
    ]);
  });

  it('rebuilds when new measurements arrive', async () => {
    const adapter = makeAdapter();
    const first = await adapter.resolve(config, [], signal());
    const second = await adapter.resolve(config, [measurement(0, 2, 'A', 0.5)], signal());

    assert.notEqual(second.id, first.id);
    assert.equal(engine.builds.length, 2);
    assert.equal(engine.builds[1].measurements.length, 1);
    assert.equal(adapter.size, 1);
    assert.deepEqual(sink.ofType('optimizer_state_rebuilt').map(e => e.data.reason), ['missing', 'stale']);
  });

  it('rebuilds a state written by another engine', async () => {
    await makeAdapter().resolve(config, [], signal());
    engine = new FakeEngine('other');

    const handle = await makeAdapter().resolve(config, [], signal());
    assert.equal(engine.builds.length, 1);
    assert.equal(handle.tag.engine, 'other');
    assert.deepEqual(sink.ofType('optimizer_state_rebuilt').map(e => e.data.reason), ['missing', 'stale']);
    assert.deepEqual(sink.ofType('optimizer_state_loaded'), []);
  });

  it('drops a state the engine fails to recommend from', async () => {
    const adapter = makeAdapter();
    const handle = await adapter.resolve(config, [], signal());
    engine.mode = 'fail';
    await rejectsWith(adapter.suggestBatch(handle, 1, signal()), 'Optimizer recommendation failed: engine crashed');

    assert.equal(adapter.size, 0);
    assert.deepEqual(loadState(statePath), { status: 'missing' });

    engine.mode = 'ok';
    await adapter.resolve(config, [], signal());
    assert.equal(engine.builds.length, 2);
  });

  it('rebuilds over a corrupt state file', async () => {
    fs.writeFileSync(statePath, 'not a state file');
    await makeAdapter().resolve(config, [], signal());
    assert.equal(engine.builds.length, 1);
    assert.equal(sink.ofType('optimizer_state_rebuilt')[0].data.reason, 'corrupt');
  });

  it('leaves measurements outside the current space out of the build', async () => {
    const measurements = [measurement(0, 2, 'A', 0.5), measurement(1, 25, 'B', 0.9)];
    const handle = await makeAdapter().resolve(config, measurements, signal());

    assert.deepEqual(engine.builds[0].measurements, [{ parameters: { x: 2, y: 'A' }, objectives: { z: 0.5 } }]);
    assert.equal(handle.tag.measurements, 2);
    assert.deepEqual(sink.ofType('measurements_excluded').map(e => e.data), [{ count: 1, config_version: 1 }]);
  });

  it('returns exactly the requested in-domain rows', async () => {
    const adapter = makeAdapter();
    const handle = await adapter.resolve(config, [], signal());
    const rows = await adapter.suggestBatch(handle, 3, signal());
    assert.deepEqual(rows, [{ x: 0, y: 'A' }, { x: 0, y: 'A' }, { x: 0, y: 'A' }]);
  });

  it('rejects a short batch', async () => {
    const adapter = makeAdapter();
    const handle = await adapter.resolve(config, [], signal());
    engine.mode = 'short';
    await rejectsWith(adapter.suggestBatch(handle, 2, signal()), 'Optimizer returned 1 row(s), expected 2');
  });

  it('rejects rows outside the space', async () => {
    const adapter = makeAdapter();
    const handle = await adapter.resolve(config, [], signal());
    engine.mode = 'outside';
    await rejectsWith(
      adapter.suggestBatch(handle, 2, signal()),
      'Optimizer row 0 is outside the parameter space (x)',
    );
  });

  it('reports engine failures as unavailable', async () => {
    engine.mode = 'fail';
    await rejectsWith(makeAdapter().resolve(config, [], signal()), 'Optimizer build failed: engine crashed');
  });

  it('stops waiting when the signal fires', async () => {
    engine.mode = 'hang';
    const controller = new AbortController();
    const pending = makeAdapter().resolve(config, [], controller.signal);
    controller.abort();
    await rejectsWith(pending, 'Optimizer build aborted');
  });

  it('refuses a released handle', async () => {
    const adapter = makeAdapter();
    const handle = await adapter.resolve(config, [], signal());
    adapter.invalidate();
    assert.equal(adapter.size, 0);
    await rejectsWith(adapter.suggestBatch(handle, 1, signal()), 'Unknown or released optimizer handle');
  });

  it('persists a state the engine updates while recommending', async () => {
    engine.returnsState = true;
    const adapter = makeAdapter();
    const handle = await adapter.resolve(config, [], signal());
    await adapter.suggestBatch(handle, 1, signal());

    const loaded = loadState(statePath);
    assert.equal(loaded.status, 'ok');
    if (loaded.status !== 'ok') return;
    assert.equal(JSON.parse(loaded.state.blob.toString('utf-8')).rounds, 1);
  });
});
