import * as fs from 'node:fs';
import * as path from 'node:path';
import { findWorkspaceRoot, loadConfig, type BolabConfig } from '../config.js';
import { ValidationError } from '../errors.js';
import { ConsoleEventSink } from '../events.js';
import { CampaignService } from '../service.js';
import { initSettings, teardownSettings } from '../workspace/settings.js';

export interface CommandContext {
  /** Directory the command was started from. */
  cwd: string;
  isJson: boolean;
}

export function requireWorkspace(cwd: string): string {
  const root = findWorkspaceRoot(cwd);
  if (!root) throw new Error('Not in a bolab workspace. Run `bolab init` first.');
  return root;
}

/**
 * Run `fn` against a service for the enclosing workspace, then close every
 * campaign it opened. Events go to the console unless output is JSON.
 */
export async function withService<T>(
  ctx: CommandContext,
  fn: (service: CampaignService, root: string) => Promise<T> | T,
  overrides: (config: BolabConfig) => BolabConfig = c => c,
): Promise<T> {
  const root = requireWorkspace(ctx.cwd);
  const settings = initSettings(root);
  const service = new CampaignService({
    root,
    config: overrides(loadConfig(root)),
    sink: ctx.isJson ? undefined : new ConsoleEventSink(),
    settings,
  });
  try {
    return await fn(service, root);
  } finally {
    await service.close();
    teardownSettings();
  }
}

/** Read a file named on the command line, relative to where the command ran. */
export function readInputFile(cwd: string, file: string): string {
  const full = path.resolve(cwd, file);
  if (!fs.existsSync(full)) {
    throw new Error(`File not found: ${file}`);
  }
  return fs.readFileSync(full, 'utf-8');
}

export function readJsonFile(cwd: string, file: string): unknown {
  const text = readInputFile(cwd, file);
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ValidationError(`${file} is not valid JSON`, [err instanceof Error ? err.message : String(err)]);
  }
}

export function parsePositiveInt(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ValidationError(`${flag} must be a positive integer, got '${value}'`);
  }
  return n;
}
