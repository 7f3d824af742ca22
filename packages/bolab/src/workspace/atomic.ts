import * as fs from 'node:fs';
import * as path from 'node:path';
import { StorageError } from '../errors.js';

/** The filesystem calls an atomic write needs; swapped out in tests. */
export interface WriteOps {
  writeFile(file: string, data: string | Buffer): void;
  rename(from: string, to: string): void;
  remove(file: string): void;
}

export const nodeWriteOps: WriteOps = {
  writeFile: (file, data) => fs.writeFileSync(file, data),
  rename: (from, to) => fs.renameSync(from, to),
  remove: (file) => fs.rmSync(file, { force: true }),
};

let tmpCounter = 0;

function attempt(filePath: string, data: string | Buffer, ops: WriteOps): void {
  const tmp = `${filePath}.${process.pid}.${++tmpCounter}.tmp`;
  try {
    ops.writeFile(tmp, data);
    ops.rename(tmp, filePath);
  } catch (err) {
    ops.remove(tmp);
    throw err;
  }
}

/**
 * Replace `filePath` via write-temp-then-rename, so readers see either the
 * old or the new content. One retry, then StorageError.
 */
export function writeFileAtomic(filePath: string, data: string | Buffer, ops: WriteOps = nodeWriteOps): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  try {
    attempt(filePath, data, ops);
  } catch {
    try {
      attempt(filePath, data, ops);
    } catch (retryErr) {
      throw new StorageError(`Could not write ${path.basename(filePath)}`, filePath, { cause: retryErr });
    }
  }
}
