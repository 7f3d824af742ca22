import { getFlagValue, positionalArgs } from '../config.js';
import { parseImportCsv } from '../history/csv.js';
import * as fmt from '../output/format.js';
import { readInputFile, withService, type CommandContext } from './context.js';

/** bolab import <campaign> --csv FILE */
export async function importCmd(args: string[], ctx: CommandContext): Promise<void> {
  const [id] = positionalArgs(args, ['--csv']);
  const file = getFlagValue(args, '--csv');
  if (!id || !file) throw new Error('Usage: bolab import <campaign> --csv FILE');

  await withService(ctx, async (service) => {
    const { parameters, objectives } = service.openCampaign(id).config;
    const rows = parseImportCsv(readInputFile(ctx.cwd, file), parameters, objectives);
    const batch = await service.importResults(id, rows);

    if (ctx.isJson) {
      console.log(JSON.stringify(batch, null, 2));
      return;
    }
    fmt.success(`Imported ${batch.rows.length} measurement(s) as ${batch.batch_id}`);
  });
}
