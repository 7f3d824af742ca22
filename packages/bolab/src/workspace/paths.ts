import * as path from 'node:path';
import { CampaignNotFound } from '../errors.js';

export const WORKSPACE_DIR = '.bolab';

export interface CampaignPaths {
  dir: string;
  config: string;
  runsDir: string;
  state: string;
  history: string;
  events: string;
  lock: string;
}

const CAMPAIGN_ID = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

export function isCampaignId(id: string): boolean {
  return CAMPAIGN_ID.test(id);
}

export function workspaceConfigPath(root: string): string {
  return path.join(root, WORKSPACE_DIR, 'config.json');
}

export function workspaceSettingsPath(root: string): string {
  return path.join(root, WORKSPACE_DIR, 'settings.json');
}

/**
 * Files owned by one campaign. Ids are path segments, so anything that
 * could escape the campaigns directory is treated as unknown.
 */
export function campaignPaths(campaignsDir: string, id: string): CampaignPaths {
  if (!isCampaignId(id)) {
    throw new CampaignNotFound(id);
  }
  const dir = path.join(campaignsDir, id);
  return {
    dir,
    config: path.join(dir, 'config.json'),
    runsDir: path.join(dir, 'runs'),
    state: path.join(dir, 'optimizer_state.bin'),
    history: path.join(dir, 'history.db'),
    events: path.join(dir, 'events.jsonl'),
    lock: path.join(dir, '.owner.lock'),
  };
}

export function runCsvPath(paths: CampaignPaths, batchId: string): string {
  return path.join(paths.runsDir, `${batchId}.csv`);
}
