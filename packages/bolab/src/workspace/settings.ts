import * as fs from 'node:fs';
import { z } from 'zod';
import { nowIso } from '../utils.js';
import { writeFileAtomic } from './atomic.js';
import { workspaceSettingsPath } from './paths.js';

const MAX_RECENT = 10;

const SettingsSchema = z.object({
  recent: z.array(z.object({
    id: z.string(),
    name: z.string(),
    opened_at: z.string(),
  })).default([]),
});

export type WorkspaceSettings = z.infer<typeof SettingsSchema>;

/**
 * Per-workspace user settings (most recently opened campaigns), kept in
 * .bolab/settings.json. An unreadable file starts over from empty.
 */
export class SettingsService {
  private data: WorkspaceSettings;

  constructor(private readonly root: string) {
    this.data = SettingsService.read(workspaceSettingsPath(root));
  }

  private static read(file: string): WorkspaceSettings {
    if (!fs.existsSync(file)) return { recent: [] };
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
    } catch {
      return { recent: [] };
    }
    const parsed = SettingsSchema.safeParse(raw);
    return parsed.success ? parsed.data : { recent: [] };
  }

  get settings(): WorkspaceSettings {
    return { recent: this.data.recent.map(r => ({ ...r })) };
  }

  get lastOpened(): string | null {
    return this.data.recent[0]?.id ?? null;
  }

  /** Move a campaign to the front of the recent list and save. */
  recordOpened(id: string, name: string, now: Date = new Date()): void {
    const recent = [
      { id, name, opened_at: nowIso(now) },
      ...this.data.recent.filter(r => r.id !== id),
    ].slice(0, MAX_RECENT);
    this.data = { recent };
    this.save();
  }

  forget(id: string): void {
    this.data = { recent: this.data.recent.filter(r => r.id !== id) };
    this.save();
  }

  private save(): void {
    writeFileAtomic(workspaceSettingsPath(this.root), `${JSON.stringify(this.data, null, 2)}\n`);
  }
}

// ── Process-wide instance ────────────────────────────────────

let _service: SettingsService | null = null;

/** Load settings for a workspace. Must run before getSettings(). */
export function initSettings(root: string): SettingsService {
  _service = new SettingsService(root);
  return _service;
}

export function getSettings(): SettingsService {
  if (!_service) {
    throw new Error('Settings accessed before initSettings()');
  }
  return _service;
}

export function teardownSettings(): void {
  _service = null;
}
