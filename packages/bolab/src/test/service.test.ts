import { describe, it, beforeEach, afterEach } from 'node:test';
import * as assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  CampaignLockedError,
  CampaignNotFound,
  CampaignService,
  CURRENT_SCHEMA_VERSION,
  MemoryEventSink,
  OperationCancelled,
  OrchestratorState,
  SettingsService,
  UnconfiguredEngine,
  type BolabConfig,
  type OptimizationEngine,
} from '../index.js';
import { campaignPaths } from '../workspace/paths.js';
import { FakeEngine } from './fakes.js';
import { SIMPLE_SPEC, fixedClock, makeTempDir, removeDir } from './helpers.js';

function workspaceConfig(seed: number | null = 7): BolabConfig {
  return {
    engine: { command: null, args: [], timeout_ms: 5000 },
    sampling: { default_batch_size: 4, seed },
    storage: { campaigns_dir: 'campaigns' },
  };
}

describe('CampaignService', () => {
  let root: string;
  const services: CampaignService[] = [];

  function makeService(options: { engine?: OptimizationEngine; pid?: number; sink?: MemoryEventSink; settings?: SettingsService } = {}) {
    const service = new CampaignService({
      root,
      config: workspaceConfig(),
      engine: options.engine ?? new FakeEngine(),
      sink: options.sink,
      settings: options.settings,
      pid: options.pid,
      now: fixedClock(),
    });
    services.push(service);
    return service;
  }

  beforeEach(() => {
    root = makeTempDir('bolab-service-test-');
    fs.mkdirSync(path.join(root, '.bolab'));
  });

  afterEach(async () => {
    for (const service of services.splice(0)) await service.close();
    removeDir(root);
  });

  it('creates a campaign directory with its config and runs folder', () => {
    const service = makeService();
    const config = service.createCampaign(SIMPLE_SPEC);
    const paths = campaignPaths(service.campaignsDir, config.id);

    assert.equal(service.campaignsDir, path.join(root, 'campaigns'));
    assert.ok(fs.statSync(paths.runsDir).isDirectory());
    const stored = JSON.parse(fs.readFileSync(paths.config, 'utf-8'));
    assert.equal(stored.id, config.id);
    assert.equal(stored.name, 'Yield screen');
    assert.equal(stored.version, 1);
  });

  it('lists campaigns, most recently updated first, and reports unreadable ones', () => {
    const service = makeService();
    const first = service.createCampaign({ ...SIMPLE_SPEC, name: 'First' });
    const second = service.createCampaign({ ...SIMPLE_SPEC, name: 'Second' });
    fs.mkdirSync(path.join(service.campaignsDir, 'broken'));
    fs.writeFileSync(path.join(service.campaignsDir, 'broken', 'config.json'), '{"name":');

    const list = service.listCampaigns();
    assert.deepEqual(list.slice(0, 2).map(c => [c.id, c.name]), [[second.id, 'Second'], [first.id, 'First']]);
    assert.equal(list[2].id, 'broken');
    assert.equal(list[2].name, null);
    assert.match(list[2].error ?? '', /^Campaign config is not valid JSON/);
  });

  it('returns an empty list before any campaign exists', () => {
    assert.deepEqual(makeService().listCampaigns(), []);
  });

  it('throws CampaignNotFound for unknown or unsafe ids', () => {
    const service = makeService();
    assert.throws(() => service.openCampaign('missing'), CampaignNotFound);
    assert.throws(() => service.openCampaign('../outside'), CampaignNotFound);
  });

  it('keeps one orchestrator per campaign and records it as recently opened', () => {
    const settings = new SettingsService(root);
    const service = makeService({ settings });
    const config = service.createCampaign(SIMPLE_SPEC);

    const orchestrator = service.openCampaign(config.id);
    assert.equal(service.openCampaign(config.id), orchestrator);
    assert.equal(settings.lastOpened, config.id);
    assert.ok(fs.existsSync(campaignPaths(service.campaignsDir, config.id).lock));
  });

  it('refuses a campaign another live process owns until it is closed', async () => {
    const owner = makeService();
    const config = owner.createCampaign(SIMPLE_SPEC);
    owner.openCampaign(config.id);

    const other = makeService({ pid: process.pid + 1 });
    assert.throws(() => other.openCampaign(config.id), (err: unknown) => {
      assert.ok(err instanceof CampaignLockedError);
      assert.equal(err.context?.ownerPid, process.pid);
      return true;
    });

    await owner.closeCampaign(config.id);
    assert.equal(fs.existsSync(campaignPaths(owner.campaignsDir, config.id).lock), false);
    assert.ok(other.openCampaign(config.id));
  });

  it('allows one owner per campaign within a process', async () => {
    const first = makeService();
    const config = first.createCampaign(SIMPLE_SPEC);
    first.openCampaign(config.id);

    const second = makeService();
    assert.throws(() => second.openCampaign(config.id), CampaignLockedError);

    await first.editCampaign(config.id, {
      parameters: [{ kind: 'continuous', name: 'x', lower: 0, upper: 1 }, SIMPLE_SPEC.parameters[1]],
    });
    await first.close();

    const reopened = second.openCampaign(config.id);
    assert.deepEqual(reopened.config.parameters[0], { kind: 'continuous', name: 'x', lower: 0, upper: 1 });
    assert.equal(fs.readFileSync(campaignPaths(second.campaignsDir, config.id).lock, 'utf-8'), `${process.pid}\n`);
  });

  it('keeps fallback batches readable with extreme bounds', async () => {
    const service = makeService({ engine: new UnconfiguredEngine() });
    const config = service.createCampaign({
      ...SIMPLE_SPEC,
      parameters: [{ kind: 'continuous', name: 'x', lower: -1.7e308, upper: 1.7e308 }],
    });

    const batch = await service.generateNextBatch(config.id, 2).result;
    const [stored] = service.getHistory(config.id).batches;
    assert.deepEqual(stored.rows, batch.rows);
    for (const row of stored.rows) {
      assert.ok(typeof row.x === 'number' && Number.isFinite(row.x));
    }
  });

  it('reclaims a lock left behind by a dead process', () => {
    const service = makeService();
    const config = service.createCampaign(SIMPLE_SPEC);
    const lockPath = campaignPaths(service.campaignsDir, config.id).lock;
    fs.writeFileSync(lockPath, '2147483000\n');

    service.openCampaign(config.id);
    assert.equal(fs.readFileSync(lockPath, 'utf-8'), `${process.pid}\n`);
  });

  it('writes a migrated config back on open', () => {
    const service = makeService();
    const dir = path.join(service.campaignsDir, 'legacy-1');
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, 'config.json'), JSON.stringify({
      id: 'legacy-1',
      name: 'Old screen',
      version: 2,
      parameters: [{ type: 'numerical_continuous', name: 'x', bounds: [0, 1] }],
      targets: [{ name: 'z', mode: 'MAX' }],
      created_at: '2025-11-01T09:00:00.000Z',
      updated_at: '2025-11-02T09:00:00.000Z',
    }));

    const orchestrator = service.openCampaign('legacy-1');
    assert.equal(orchestrator.config.version, 3);

    const stored = JSON.parse(fs.readFileSync(path.join(dir, 'config.json'), 'utf-8'));
    assert.equal(stored.schema_version, CURRENT_SCHEMA_VERSION);
    assert.equal(stored.version, 3);
  });

  it('falls back to seeded sampling and reports progress', async () => {
    const sink = new MemoryEventSink();
    const service = makeService({ engine: new UnconfiguredEngine(), sink });
    const config = service.createCampaign(SIMPLE_SPEC);
    const states: OrchestratorState[] = [];

    const task = service.generateNextBatch(config.id, 3, { onProgress: s => states.push(s) });
    const batch = await task.result;

    assert.equal(batch.provenance, 'fallback');
    assert.equal(batch.rows.length, 3);
    assert.equal(task.cancelled, false);
    assert.deepEqual(states, ['resolving_optimizer', 'falling_back', 'batch_persisted', 'idle']);

    const paths = campaignPaths(service.campaignsDir, config.id);
    assert.ok(fs.existsSync(path.join(paths.runsDir, 'batch-0001.csv')));
    const logged = fs.readFileSync(paths.events, 'utf-8').trim().split('\n').map(line => JSON.parse(line).event);
    assert.deepEqual(logged, sink.events.map(e => e.event));
    assert.equal(logged.at(-1), 'batch_persisted');
  });

  it('cancels a batch in flight without persisting it', async () => {
    const engine = new FakeEngine();
    engine.mode = 'hang';
    const service = makeService({ engine });
    const config = service.createCampaign(SIMPLE_SPEC);

    const task = service.generateNextBatch(config.id, 2);
    setTimeout(() => task.cancel(), 20);

    await assert.rejects(task.result, OperationCancelled);
    assert.equal(task.cancelled, true);
    assert.deepEqual(service.getHistory(config.id).batches, []);
  });

  it('records results and reports the best measurement', async () => {
    const service = makeService();
    const config = service.createCampaign(SIMPLE_SPEC);
    const batch = await service.generateNextBatch(config.id, 2).result;

    const outcome = await service.recordResults(config.id, batch.batch_id, [
      { row_index: 0, values: { z: 12 } },
      { row_index: 1, values: { z: 30 } },
    ]);
    assert.deepEqual(outcome, { batch_id: 'batch-0001', status: 'completed', appended: 2 });

    const again = await service.recordResults(config.id, batch.batch_id, [{ row_index: 0, values: { z: 1 } }]);
    assert.equal(again.status, 'already_completed');

    const history = service.getHistory(config.id);
    assert.equal(history.batches[0].status, 'completed');
    assert.equal(history.results.length, 2);
    assert.equal(history.best?.row_index, 1);
    assert.equal(history.best?.score, 30);
  });

  it('imports measured rows as a completed batch', async () => {
    const service = makeService();
    const config = service.createCampaign(SIMPLE_SPEC);

    const batch = await service.importResults(config.id, [
      { parameters: { x: 4, y: 'B' }, values: { z: 50 } },
    ]);
    assert.equal(batch.provenance, 'import');
    assert.equal(batch.status, 'completed');
    assert.equal(service.getHistory(config.id).best?.objectives.z, 50);
  });

  it('applies edits through the campaign owner', async () => {
    const service = makeService();
    const config = service.createCampaign(SIMPLE_SPEC);

    const result = await service.editCampaign(config.id, { name: 'Renamed' });
    assert.equal(result.structural, false);
    const stored = JSON.parse(fs.readFileSync(campaignPaths(service.campaignsDir, config.id).config, 'utf-8'));
    assert.equal(stored.name, 'Renamed');
    assert.equal(service.listCampaigns()[0].name, 'Renamed');
  });
});
