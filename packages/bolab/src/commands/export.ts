import { positionalArgs } from '../config.js';
import * as fmt from '../output/format.js';
import { withService, type CommandContext } from './context.js';

/** bolab export <campaign>: rewrite every runs/<batch_id>.csv from the ledger. */
export async function exportCmd(args: string[], ctx: CommandContext): Promise<void> {
  const [id] = positionalArgs(args, []);
  if (!id) throw new Error('Usage: bolab export <campaign>');

  await withService(ctx, (service) => {
    const orchestrator = service.openCampaign(id);
    const files = service.getHistory(id).batches.map(batch => orchestrator.exportBatch(batch));

    if (ctx.isJson) {
      console.log(JSON.stringify({ campaign_id: id, files }, null, 2));
      return;
    }
    fmt.success(`Wrote ${files.length} run file(s)`);
    for (const file of files) console.log(`  ${file}`);
  });
}
