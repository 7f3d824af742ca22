import * as fs from 'node:fs';
import { z } from 'zod';
import type { OptimizerStateTag } from '../types.js';
import { StaleStateError, StorageError } from '../errors.js';
import { writeFileAtomic } from '../workspace/atomic.js';

/**
 * optimizer_state.bin layout: one JSON header line (the tag), then the
 * engine's blob byte for byte.
 */
export const STATE_FORMAT = 1;

const TagSchema = z.object({
  format: z.literal(STATE_FORMAT),
  engine: z.string(),
  config_hash: z.string().min(1),
  config_version: z.number().int().positive(),
  measurements: z.number().int().nonnegative(),
  built_at: z.string(),
});

export interface StoredState {
  tag: OptimizerStateTag;
  blob: Buffer;
}

export type LoadedState =
  | { status: 'ok'; state: StoredState }
  | { status: 'missing' }
  | { status: 'corrupt'; reason: string };

const NEWLINE = 0x0a;

export function encodeState(tag: OptimizerStateTag, blob: Buffer): Buffer {
  return Buffer.concat([Buffer.from(`${JSON.stringify(tag)}\n`, 'utf-8'), blob]);
}

export function decodeState(data: Buffer): LoadedState {
  const split = data.indexOf(NEWLINE);
  if (split < 0) return { status: 'corrupt', reason: 'no header line' };

  let header: unknown;
  try {
    header = JSON.parse(data.subarray(0, split).toString('utf-8'));
  } catch {
    return { status: 'corrupt', reason: 'header is not JSON' };
  }
  const parsed = TagSchema.safeParse(header);
  if (!parsed.success) return { status: 'corrupt', reason: 'unrecognized header' };

  return { status: 'ok', state: { tag: parsed.data, blob: Buffer.from(data.subarray(split + 1)) } };
}

export function loadState(file: string): LoadedState {
  let data: Buffer;
  try {
    data = fs.readFileSync(file);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return { status: 'missing' };
    throw new StorageError('Could not read optimizer state', file, { cause: err });
  }
  return decodeState(data);
}

export function saveState(file: string, tag: OptimizerStateTag, blob: Buffer): void {
  writeFileAtomic(file, encodeState(tag, blob));
}

/**
 * Throw StaleStateError unless the tag was built by this engine, for this
 * config and this number of completed measurements.
 */
export function assertFresh(tag: OptimizerStateTag, engine: string, configHash: string, measurements: number): void {
  if (tag.engine !== engine) {
    throw new StaleStateError(
      `Optimizer state was built by engine '${tag.engine}', current is '${engine}'`,
      { expected: engine, found: tag.engine },
    );
  }
  if (tag.config_hash !== configHash) {
    throw new StaleStateError(
      `Optimizer state was built for config ${tag.config_hash.slice(0, 12)}, current is ${configHash.slice(0, 12)}`,
      { expected: configHash, found: tag.config_hash },
    );
  }
  if (tag.measurements !== measurements) {
    throw new StaleStateError(
      `Optimizer state covers ${tag.measurements} measurement(s), history has ${measurements}`,
      { expected: measurements, found: tag.measurements },
    );
  }
}

export function removeState(file: string): void {
  try {
    fs.rmSync(file, { force: true });
  } catch (err) {
    throw new StorageError('Could not remove optimizer state', file, { cause: err });
  }
}
