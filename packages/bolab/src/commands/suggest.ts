import type { CampaignConfig, RunBatch } from '../types.js';
import { getFlagValue, positionalArgs } from '../config.js';
import { runCsvPath, campaignPaths } from '../workspace/paths.js';
import * as fmt from '../output/format.js';
import { OrchestratorState } from '../orchestrator/states.js';
import { parsePositiveInt, withService, type CommandContext } from './context.js';

export function printBatch(config: CampaignConfig, batch: RunBatch): void {
  const names = config.parameters.map(p => p.name);
  const rows = batch.rows.map((row, index) => [
    String(index),
    ...names.map(name => fmt.formatValue(row[name])),
  ]);
  console.log(fmt.table(['row', ...names], rows));
}

/**
 * bolab suggest <campaign> [--size N] [--timeout MS] [--seed S]
 * Ctrl+C before the batch is saved cancels it; nothing is written.
 */
export async function suggest(args: string[], ctx: CommandContext): Promise<void> {
  const [id] = positionalArgs(args, ['--size', '--timeout', '--seed']);
  if (!id) throw new Error('Usage: bolab suggest <campaign> [--size N] [--timeout MS] [--seed S]');

  const size = parsePositiveInt(getFlagValue(args, '--size'), '--size');
  const timeoutMs = parsePositiveInt(getFlagValue(args, '--timeout'), '--timeout');
  const seed = parsePositiveInt(getFlagValue(args, '--seed'), '--seed');

  await withService(ctx, async (service) => {
    const config = service.openCampaign(id).config;
    const batchSize = size ?? service.workspaceConfig.sampling.default_batch_size;

    const task = service.generateNextBatch(id, batchSize, { timeoutMs });
    if (!ctx.isJson) {
      task.onProgress(state => {
        if (state === OrchestratorState.RESOLVING_OPTIMIZER) fmt.info(`Requesting ${batchSize} suggestion(s)...`);
      });
    }
    const onInterrupt = () => {
      fmt.warn('Interrupt received. Cancelling batch generation...');
      task.cancel();
    };
    process.once('SIGINT', onInterrupt);

    let batch: RunBatch;
    try {
      batch = await task.result;
    } finally {
      process.removeListener('SIGINT', onInterrupt);
    }

    const csv = runCsvPath(campaignPaths(service.campaignsDir, id), batch.batch_id);
    if (ctx.isJson) {
      console.log(JSON.stringify({ ...batch, csv }, null, 2));
      return;
    }

    fmt.header(`${batch.batch_id} — ${config.name}`);
    printBatch(config, batch);
    console.log();
    console.log(`  Source: ${fmt.provenanceColor(batch.provenance)}${batch.fallback_reason ? fmt.dim(` (${batch.fallback_reason})`) : ''}`);
    console.log(`  CSV:    ${csv}`);
    console.log(`\n  Fill in the objective columns, then run: bolab record ${id} ${batch.batch_id} --csv <file>`);
  }, config => seed === undefined ? config : { ...config, sampling: { ...config.sampling, seed } });
}
