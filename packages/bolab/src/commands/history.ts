import { positionalArgs } from '../config.js';
import * as fmt from '../output/format.js';
import { withService, type CommandContext } from './context.js';

/** bolab history <campaign> */
export async function history(args: string[], ctx: CommandContext): Promise<void> {
  const [id] = positionalArgs(args, []);
  if (!id) throw new Error('Usage: bolab history <campaign>');

  await withService(ctx, (service) => {
    const orchestrator = service.openCampaign(id);
    const result = service.getHistory(id);

    if (ctx.isJson) {
      console.log(JSON.stringify(result, null, 2));
      return;
    }

    const config = orchestrator.config;
    fmt.header(`${config.name} (${id}, config v${config.version})`);
    if (result.batches.length === 0) {
      console.log(`  No batches yet. Run: bolab suggest ${id}`);
      return;
    }

    const resultCounts = new Map<string, number>();
    for (const r of result.results) {
      resultCounts.set(r.batch_id, (resultCounts.get(r.batch_id) ?? 0) + 1);
    }
    const rows = result.batches.map(b => [
      b.batch_id,
      fmt.statusColor(b.status),
      fmt.provenanceColor(b.provenance),
      String(b.rows.length),
      String(resultCounts.get(b.batch_id) ?? 0),
      `v${b.config_version}`,
      b.generated_at,
    ]);
    console.log(fmt.table(['Batch', 'Status', 'Source', 'Rows', 'Results', 'Config', 'Generated'], rows));

    const best = result.best;
    if (best) {
      console.log();
      console.log(fmt.bold('  Best so far') + fmt.dim(` (${best.batch_id} row ${best.row_index}, score ${fmt.formatValue(best.score)})`));
      const params = Object.entries(best.parameters).map(([k, v]) => `${k}=${fmt.formatValue(v)}`);
      const objectives = Object.entries(best.objectives).map(([k, v]) => `${k}=${fmt.formatValue(v)}`);
      console.log(`  ${params.join('  ')}`);
      console.log(`  ${fmt.cyan(objectives.join('  '))}`);
    }
  });
}
