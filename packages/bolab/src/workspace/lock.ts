import * as fs from 'node:fs';
import * as path from 'node:path';
import { CampaignLockedError, StorageError } from '../errors.js';

export interface OwnerLock {
  readonly path: string;
  readonly pid: number;
  release(): void;
}

// Locks taken by this process, so a second owner here is refused even though the pid matches.
const held = new Set<string>();

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else.
    return errnoCode(err) === 'EPERM';
  }
}

function readOwner(lockPath: string): number | null {
  try {
    const pid = Number.parseInt(fs.readFileSync(lockPath, 'utf-8').trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return null;
    throw new StorageError('Could not read campaign lock', lockPath, { cause: err });
  }
}

/**
 * Take the owner lock of a campaign directory.
 * A lock held elsewhere in this process, or by another live process, raises
 * CampaignLockedError; a lock left behind by a dead process (or unreadable)
 * is reclaimed.
 */
export function acquireOwnerLock(lockPath: string, campaignId: string, pid: number = process.pid): OwnerLock {
  const key = path.resolve(lockPath);
  if (held.has(key)) {
    throw new CampaignLockedError(campaignId, readOwner(lockPath) ?? pid);
  }

  try {
    fs.writeFileSync(lockPath, `${pid}\n`, { flag: 'wx' });
  } catch (err) {
    if (errnoCode(err) !== 'EEXIST') {
      throw new StorageError('Could not create campaign lock', lockPath, { cause: err });
    }
    const owner = readOwner(lockPath);
    if (owner !== null && owner !== pid && isProcessAlive(owner)) {
      throw new CampaignLockedError(campaignId, owner);
    }
    fs.writeFileSync(lockPath, `${pid}\n`);
  }
  held.add(key);

  let released = false;
  return {
    path: lockPath,
    pid,
    release() {
      if (released) return;
      released = true;
      held.delete(key);
      if (readOwner(lockPath) === pid) {
        fs.rmSync(lockPath, { force: true });
      }
    },
  };
}
