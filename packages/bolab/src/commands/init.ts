import * as fs from 'node:fs';
import * as path from 'node:path';
import { configTemplate, mkdirSafe } from '@bolab/shared';
import { getFlagValue, loadConfig, campaignsDirFor, resetConfigCache } from '../config.js';
import { WORKSPACE_DIR, workspaceConfigPath } from '../workspace/paths.js';
import * as fmt from '../output/format.js';
import { parsePositiveInt, type CommandContext } from './context.js';

/**
 * Create .bolab/config.json and the campaigns directory in the current directory.
 * An existing config is kept unless --force is given.
 */
export async function init(args: string[], ctx: CommandContext): Promise<void> {
  const root = ctx.cwd;
  const configPath = workspaceConfigPath(root);
  const force = args.includes('--force');

  mkdirSafe(path.join(root, WORKSPACE_DIR));

  const existed = fs.existsSync(configPath);
  if (!existed || force) {
    const engineArgs = getFlagValue(args, '--engine-args');
    fs.writeFileSync(configPath, `${configTemplate({
      engineCommand: getFlagValue(args, '--engine') ?? null,
      engineArgs: engineArgs ? engineArgs.split(/\s+/).filter(a => a.length > 0) : [],
      timeoutMs: parsePositiveInt(getFlagValue(args, '--timeout'), '--timeout'),
      batchSize: parsePositiveInt(getFlagValue(args, '--size'), '--size'),
    })}\n`);
  }

  resetConfigCache();
  const config = loadConfig(root);
  const campaignsDir = campaignsDirFor(root, config);
  mkdirSafe(campaignsDir);

  if (ctx.isJson) {
    console.log(JSON.stringify({ root, config: configPath, campaigns_dir: campaignsDir, created: !existed || force }, null, 2));
    return;
  }

  if (existed && !force) {
    fmt.info(`Workspace already initialized at ${root} (use --force to rewrite the config).`);
  } else {
    fmt.success(`Initialized workspace at ${root}`);
  }
  console.log(`  Config:    ${path.relative(root, configPath)}`);
  console.log(`  Campaigns: ${path.relative(root, campaignsDir) || '.'}`);
  if (!config.engine.command) {
    fmt.warn('No optimization engine configured — batches will come from random sampling.');
  }
}
