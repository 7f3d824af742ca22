import { DEFAULT_CAMPAIGN_SETTINGS } from '@bolab/shared';
import type { CampaignConfig, CampaignEdit } from '../types.js';
import { ValidationError } from '../errors.js';
import { getFlagValue, positionalArgs } from '../config.js';
import { CampaignEditSchema, CampaignSpecSchema, formatIssues } from '../campaign/schema.js';
import * as fmt from '../output/format.js';
import { readJsonFile, withService, type CommandContext } from './context.js';

function describeCampaign(config: CampaignConfig): void {
  console.log(`  ${fmt.bold('Id:')}       ${config.id}`);
  console.log(`  ${fmt.bold('Name:')}     ${config.name}`);
  console.log(`  ${fmt.bold('Version:')}  ${config.version}`);
  console.log();
  const rows = config.parameters.map(p => {
    switch (p.kind) {
      case 'continuous': return [p.name, p.kind, `[${p.lower}, ${p.upper}]`];
      case 'discrete': return [p.name, p.kind, p.values.join(', ')];
      case 'categorical': return [p.name, p.kind, p.levels.join(', ')];
      case 'fixed': return [p.name, p.kind, String(p.value)];
      case 'chemistry': return [p.name, p.kind, `${p.candidates.length} structure(s)`];
    }
  });
  console.log(fmt.table(['Parameter', 'Kind', 'Domain'], rows));
  console.log();
  console.log(fmt.table(
    ['Objective', 'Direction', 'Weight', 'Bounds'],
    config.objectives.map(o => [
      o.name,
      o.direction,
      fmt.formatValue(o.weight),
      o.bounds ? `[${o.bounds.lower}, ${o.bounds.upper}]` : '—',
    ]),
  ));
}

/**
 * bolab new --spec FILE
 * The spec file holds name, parameters, objectives and optional settings.
 */
export async function newCampaign(args: string[], ctx: CommandContext): Promise<void> {
  const specFile = getFlagValue(args, '--spec');
  if (!specFile) throw new Error('Usage: bolab new --spec FILE');

  const parsed = CampaignSpecSchema.safeParse(readJsonFile(ctx.cwd, specFile));
  if (!parsed.success) {
    throw new ValidationError(`Invalid campaign spec in ${specFile}`, formatIssues(parsed.error));
  }
  const spec = parsed.data;

  await withService(ctx, (service) => {
    const config = service.createCampaign({
      ...spec,
      settings: spec.settings ?? DEFAULT_CAMPAIGN_SETTINGS,
    });

    if (ctx.isJson) {
      console.log(JSON.stringify(config, null, 2));
      return;
    }
    fmt.success(`Created campaign '${config.name}'`);
    describeCampaign(config);
  });
}

/**
 * bolab edit <id> [--spec FILE] [--name NAME]
 * The spec file may name any subset of name, parameters, objectives, settings.
 */
export async function editCampaign(args: string[], ctx: CommandContext): Promise<void> {
  const [id] = positionalArgs(args, ['--spec', '--name']);
  const specFile = getFlagValue(args, '--spec');
  const name = getFlagValue(args, '--name');
  if (!id || (!specFile && name === undefined)) {
    throw new Error('Usage: bolab edit <campaign> --spec FILE | --name NAME');
  }

  let edit: CampaignEdit = {};
  if (specFile) {
    const parsed = CampaignEditSchema.safeParse(readJsonFile(ctx.cwd, specFile));
    if (!parsed.success) {
      throw new ValidationError(`Invalid campaign edit in ${specFile}`, formatIssues(parsed.error));
    }
    edit = parsed.data;
  }
  if (name !== undefined) edit = { ...edit, name };

  await withService(ctx, async (service) => {
    const before = service.openCampaign(id).config.version;
    const { config, structural } = await service.editCampaign(id, edit);

    if (ctx.isJson) {
      console.log(JSON.stringify({ structural, config }, null, 2));
      return;
    }
    if (structural) {
      fmt.success(`Campaign updated: version ${before} → ${config.version}. Optimizer state will be rebuilt.`);
    } else {
      fmt.success('Campaign updated (no structural change).');
    }
    describeCampaign(config);
  });
}
