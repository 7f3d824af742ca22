import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { DEFAULT_CONFIG, type WorkspaceConfig } from '@bolab/shared';
import { ValidationError } from './errors.js';
import { formatIssues } from './campaign/schema.js';
import { WORKSPACE_DIR, workspaceConfigPath } from './workspace/paths.js';

export type BolabConfig = WorkspaceConfig;

// Every key optional: the file only overrides what it names.
const WorkspaceConfigSchema = z.object({
  engine: z.object({
    command: z.string().min(1).nullable(),
    args: z.array(z.string()),
    timeout_ms: z.number().int().positive(),
  }).partial().default({}),
  sampling: z.object({
    default_batch_size: z.number().int().positive(),
    seed: z.number().int().nullable(),
  }).partial().default({}),
  storage: z.object({
    campaigns_dir: z.string().min(1),
  }).partial().default({}),
});

let _cachedConfig: BolabConfig | null = null;
let _cachedRoot: string | null = null;

/**
 * Load .bolab/config.json with full defaults. Cached per workspace root.
 */
export function loadConfig(workspaceRoot: string): BolabConfig {
  if (_cachedConfig && _cachedRoot === workspaceRoot) return _cachedConfig;
  const configPath = workspaceConfigPath(workspaceRoot);
  if (!fs.existsSync(configPath)) {
    _cachedConfig = structuredClone(DEFAULT_CONFIG);
    _cachedRoot = workspaceRoot;
    return _cachedConfig;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ValidationError(`Unreadable ${WORKSPACE_DIR}/config.json`, [err instanceof Error ? err.message : String(err)]);
  }
  const parsed = WorkspaceConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid ${WORKSPACE_DIR}/config.json`, formatIssues(parsed.error));
  }
  const loaded = parsed.data;

  _cachedConfig = {
    engine: { ...DEFAULT_CONFIG.engine, ...loaded.engine },
    sampling: { ...DEFAULT_CONFIG.sampling, ...loaded.sampling },
    storage: { ...DEFAULT_CONFIG.storage, ...loaded.storage },
  };
  _cachedRoot = workspaceRoot;
  return _cachedConfig;
}

/** Clear cached config (for testing). */
export function resetConfigCache(): void {
  _cachedConfig = null;
  _cachedRoot = null;
}

/** Absolute campaigns directory for a workspace. */
export function campaignsDirFor(workspaceRoot: string, config: BolabConfig): string {
  return path.resolve(workspaceRoot, config.storage.campaigns_dir);
}

/**
 * Walk up from `start` to the nearest directory holding .bolab/.
 */
export function findWorkspaceRoot(start: string = process.cwd()): string | null {
  let dir = path.resolve(start);
  for (;;) {
    if (fs.existsSync(path.join(dir, WORKSPACE_DIR))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/** Extract a flag's value from args array with bounds checking. */
export function getFlagValue(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx < 0 || idx + 1 >= args.length) return undefined;
  return args[idx + 1];
}

/** Positional arguments: everything that is neither a flag nor a flag's value. */
export function positionalArgs(args: string[], valueFlags: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (valueFlags.includes(arg)) {
      i++;
      continue;
    }
    if (arg.startsWith('--')) continue;
    out.push(arg);
  }
  return out;
}
