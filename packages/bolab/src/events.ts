import * as fs from 'node:fs';
import * as path from 'node:path';
import type { JsonValue } from './types.js';
import { nowIso } from './utils.js';
import * as fmt from './output/format.js';

export type CampaignEventType =
  | 'optimizer_attempted'
  | 'optimizer_unavailable'
  | 'optimizer_state_loaded'
  | 'optimizer_state_rebuilt'
  | 'measurements_excluded'
  | 'fallback_used'
  | 'batch_persisted'
  | 'result_ingested'
  | 'run_file_failed'
  | 'config_edited';

export interface CampaignEvent {
  event: CampaignEventType;
  campaign_id: string;
  at: string;
  data: Record<string, JsonValue>;
}

export interface EventSink {
  emit(event: CampaignEvent): void;
}

export type Emit = (event: CampaignEventType, data?: Record<string, JsonValue>) => void;

/** Bind a sink to one campaign. */
export function createEmitter(sink: EventSink, campaignId: string, now: () => Date = () => new Date()): Emit {
  return (event, data = {}) => {
    sink.emit({ event, campaign_id: campaignId, at: nowIso(now()), data });
  };
}

/** Appends one JSON object per line to campaigns/<id>/events.jsonl. */
export class JsonlEventSink implements EventSink {
  constructor(private readonly file: string) {}

  emit(event: CampaignEvent): void {
    fs.mkdirSync(path.dirname(this.file), { recursive: true });
    fs.appendFileSync(this.file, `${JSON.stringify(event)}\n`, 'utf-8');
  }
}

/** Keeps events in memory. */
export class MemoryEventSink implements EventSink {
  readonly events: CampaignEvent[] = [];

  emit(event: CampaignEvent): void {
    this.events.push(event);
  }

  ofType(type: CampaignEventType): CampaignEvent[] {
    return this.events.filter(e => e.event === type);
  }
}

export class FanoutEventSink implements EventSink {
  constructor(private readonly sinks: EventSink[]) {}

  emit(event: CampaignEvent): void {
    for (const sink of this.sinks) sink.emit(event);
  }
}

/** One console line per event that matters to someone at a terminal. */
export function describeEvent(event: CampaignEvent): string | null {
  const d = event.data;
  switch (event.event) {
    case 'optimizer_unavailable':
      return `Optimizer unavailable: ${String(d.reason)}`;
    case 'fallback_used':
      return `Using random sampling (${String(d.reason)})`;
    case 'optimizer_state_rebuilt':
      return `Optimizer state rebuilt from ${String(d.measurements)} measurement(s) (${String(d.reason)})`;
    case 'measurements_excluded':
      return `${String(d.count)} measurement(s) no longer fit the parameter space and were left out`;
    case 'batch_persisted':
      return `Batch ${String(d.batch_id)} saved (${String(d.provenance)})`;
    case 'result_ingested':
      return `Recorded ${String(d.rows)} result row(s) for ${String(d.batch_id)}`;
    case 'run_file_failed':
      return `Could not write the run file for ${String(d.batch_id)} (${String(d.reason)}); run bolab export to retry`;
    case 'config_edited':
      return `Campaign config now at version ${String(d.version)}`;
    default:
      return null;
  }
}

export class ConsoleEventSink implements EventSink {
  emit(event: CampaignEvent): void {
    const line = describeEvent(event);
    if (line === null) return;
    if (event.event === 'optimizer_unavailable' || event.event === 'fallback_used' || event.event === 'measurements_excluded'
      || event.event === 'run_file_failed') {
      fmt.warn(line);
    } else {
      fmt.info(line);
    }
  }
}
