import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { validateWorkspace, formatValidation } from '../validation.js';
import { configTemplate, DEFAULT_CONFIG } from '../config.js';
import { isWritableDir } from '../utils.js';

const ready = {
  hasConfig: true,
  hasCampaignsDir: true,
  campaignsDirWritable: true,
  engineCommand: 'engine-bridge',
  engineCommandFound: true,
  timeoutMs: 60_000,
  campaignCount: 2,
};

describe('validateWorkspace()', () => {
  it('passes every check for a ready workspace', () => {
    const checks = validateWorkspace(ready);
    assert.equal(checks.length, 4);
    assert.ok(checks.every(c => c.status === 'pass'));
    assert.equal(checks[1].detail, '2 campaign(s)');
  });

  it('warns when no engine is configured', () => {
    const checks = validateWorkspace({ ...ready, engineCommand: null, engineCommandFound: false });
    const engine = checks.find(c => c.label === 'Optimization engine');
    assert.equal(engine?.status, 'warn');
  });

  it('fails when the campaigns directory is missing', () => {
    const checks = validateWorkspace({ ...ready, hasCampaignsDir: false });
    const dir = checks.find(c => c.label === 'Campaigns directory');
    assert.equal(dir?.status, 'fail');
    assert.equal(dir?.detail, 'Missing — run `bolab init`');
  });

  it('fails on a non-positive timeout', () => {
    const checks = validateWorkspace({ ...ready, timeoutMs: 0 });
    assert.equal(checks[3].status, 'fail');
  });
});

describe('formatValidation()', () => {
  it('renders one line per check', () => {
    const out = formatValidation(validateWorkspace(ready));
    assert.equal(out.split('\n').length, 4);
    assert.ok(out.includes('Workspace config: Found .bolab/config.json'));
  });
});

describe('configTemplate()', () => {
  it('fills defaults', () => {
    const parsed = JSON.parse(configTemplate());
    assert.equal(parsed.engine.command, null);
    assert.equal(parsed.engine.timeout_ms, DEFAULT_CONFIG.engine.timeout_ms);
    assert.equal(parsed.sampling.default_batch_size, 4);
  });

  it('applies answers', () => {
    const parsed = JSON.parse(configTemplate({ engineCommand: 'python3', engineArgs: ['bridge.py'], batchSize: 8 }));
    assert.equal(parsed.engine.command, 'python3');
    assert.deepEqual(parsed.engine.args, ['bridge.py']);
    assert.equal(parsed.sampling.default_batch_size, 8);
  });
});

describe('isWritableDir()', () => {
  it('is true for a temp dir and false for a missing path', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bolab-shared-'));
    try {
      assert.equal(isWritableDir(dir), true);
      assert.equal(isWritableDir(path.join(dir, 'missing')), false);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
