import { z } from 'zod';
import type { ResultRow } from '../types.js';
import { ValidationError } from '../errors.js';
import { formatIssues } from '../campaign/schema.js';
import { getFlagValue, positionalArgs } from '../config.js';
import { parseResultsCsv } from '../history/csv.js';
import * as fmt from '../output/format.js';
import { readInputFile, readJsonFile, withService, type CommandContext } from './context.js';

const ResultRowsSchema = z.array(z.object({
  row_index: z.number().int(),
  values: z.record(z.number()),
}));

function readJsonResults(cwd: string, file: string): ResultRow[] {
  const parsed = ResultRowsSchema.safeParse(readJsonFile(cwd, file));
  if (!parsed.success) {
    throw new ValidationError(`Invalid results file ${file}`, formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * bolab record <campaign> <batch> --csv FILE | --json FILE
 * Submitting an already completed batch again changes nothing.
 */
export async function record(args: string[], ctx: CommandContext): Promise<void> {
  const [id, batchId] = positionalArgs(args, ['--csv', '--json']);
  const csvFile = getFlagValue(args, '--csv');
  const jsonFile = getFlagValue(args, '--json');
  if (!id || !batchId || (!csvFile && !jsonFile)) {
    throw new Error('Usage: bolab record <campaign> <batch> --csv FILE | --json FILE');
  }
  if (csvFile && jsonFile) {
    throw new Error('Give either --csv or --json, not both.');
  }

  await withService(ctx, async (service) => {
    const { objectives } = service.openCampaign(id).config;
    const rows = csvFile
      ? parseResultsCsv(readInputFile(ctx.cwd, csvFile), objectives)
      : readJsonResults(ctx.cwd, jsonFile ?? '');

    const outcome = await service.recordResults(id, batchId, rows);
    if (ctx.isJson) {
      console.log(JSON.stringify(outcome, null, 2));
      return;
    }
    if (outcome.status === 'already_completed') {
      fmt.info(`${batchId} already has results; nothing recorded.`);
    } else {
      fmt.success(`Recorded ${outcome.appended} result row(s) for ${batchId}`);
    }
  });
}
