import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { CampaignSpec, Parameter } from '../types.js';

/** x in [0, 10], y in {A, B, C}, maximize z. */
export const SIMPLE_PARAMETERS: Parameter[] = [
  { kind: 'continuous', name: 'x', lower: 0, upper: 10 },
  { kind: 'categorical', name: 'y', levels: ['A', 'B', 'C'] },
];

export const SIMPLE_SPEC: CampaignSpec = {
  name: 'Yield screen',
  parameters: SIMPLE_PARAMETERS,
  objectives: [{ name: 'z', direction: 'maximize', weight: 1 }],
};

export const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

export function fixedClock(start: Date = FIXED_NOW): () => Date {
  let tick = 0;
  return () => new Date(start.getTime() + 1000 * tick++);
}

export function makeTempDir(prefix = 'bolab-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
