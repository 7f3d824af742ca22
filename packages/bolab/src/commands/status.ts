import * as fs from 'node:fs';
import * as path from 'node:path';
import { isWritableDir, validateWorkspace, formatValidation } from '@bolab/shared';
import { campaignsDirFor, findWorkspaceRoot, loadConfig } from '../config.js';
import { CampaignService } from '../service.js';
import { workspaceConfigPath } from '../workspace/paths.js';
import { SettingsService } from '../workspace/settings.js';
import * as fmt from '../output/format.js';
import type { CommandContext } from './context.js';

/** True when `command` is a path to a file, or a file on PATH. */
export function commandExists(command: string, cwd: string, envPath = process.env.PATH ?? ''): boolean {
  if (command.includes('/') || command.includes(path.sep)) {
    return fs.existsSync(path.resolve(cwd, command));
  }
  return envPath
    .split(path.delimiter)
    .filter(dir => dir.length > 0)
    .some(dir => fs.existsSync(path.join(dir, command)));
}

/**
 * bolab status: workspace readiness, campaigns and recently opened ones.
 * Reads only; no campaign is opened or locked.
 */
export async function status(_args: string[], ctx: CommandContext): Promise<void> {
  const root = findWorkspaceRoot(ctx.cwd);
  if (!root) throw new Error('Not in a bolab workspace. Run `bolab init` first.');

  const config = loadConfig(root);
  const campaignsDir = campaignsDirFor(root, config);
  const service = new CampaignService({ root, config });
  const campaigns = service.listCampaigns();
  const recent = new SettingsService(root).settings.recent;

  const checks = validateWorkspace({
    hasConfig: fs.existsSync(workspaceConfigPath(root)),
    hasCampaignsDir: fs.existsSync(campaignsDir),
    campaignsDirWritable: isWritableDir(campaignsDir),
    engineCommand: config.engine.command,
    engineCommandFound: config.engine.command !== null && commandExists(config.engine.command, root),
    timeoutMs: config.engine.timeout_ms,
    campaignCount: campaigns.length,
  });

  if (ctx.isJson) {
    console.log(JSON.stringify({ root, checks, campaigns, recent }, null, 2));
    return;
  }

  fmt.header('Workspace Status');
  console.log(formatValidation(checks));
  console.log();

  if (campaigns.length === 0) {
    console.log('  No campaigns yet. Run: bolab new --spec <file>');
    return;
  }
  const rows = campaigns.map(c => [
    c.id,
    c.name ?? fmt.red(c.error ?? 'unreadable'),
    c.version === null ? '—' : `v${c.version}`,
    c.updated_at ?? '—',
  ]);
  console.log(fmt.table(['ID', 'Name', 'Config', 'Updated'], rows));

  if (recent.length > 0) {
    console.log(`\n  ${fmt.dim('Last opened:')} ${recent[0].name} (${recent[0].id}, ${recent[0].opened_at})`);
  }
}
