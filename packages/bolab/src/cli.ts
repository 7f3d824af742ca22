#!/usr/bin/env node

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { BolabError, errorMessage } from './errors.js';
import * as fmt from './output/format.js';
import type { CommandContext } from './commands/context.js';

const PACKAGE_JSON = path.join(path.dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
const VERSION = z.object({ version: z.string() })
  .parse(JSON.parse(fs.readFileSync(PACKAGE_JSON, 'utf-8')))
  .version;

async function main(): Promise<void> {
  // A second Ctrl+C, or one with no command listening, exits at once.
  let sigintCount = 0;
  process.on('SIGINT', () => {
    sigintCount++;
    if (sigintCount >= 2 || process.listenerCount('SIGINT') === 1) process.exit(130);
  });

  const args = process.argv.slice(2);

  if (args.includes('--version') || args.includes('-v')) {
    console.log(VERSION);
    return;
  }

  if (args.includes('--help') || args.includes('-h') || args.length === 0) {
    printHelp();
    return;
  }

  const ctx: CommandContext = { cwd: process.cwd(), isJson: args.includes('--json') };
  const command = args[0];
  const rest = args.slice(1).filter(a => a !== '--json');

  try {
    switch (command) {
      case 'init': {
        const { init } = await import('./commands/init.js');
        await init(rest, ctx);
        break;
      }
      case 'status': {
        const { status } = await import('./commands/status.js');
        await status(rest, ctx);
        break;
      }
      case 'new': {
        const { newCampaign } = await import('./commands/campaign.js');
        await newCampaign(rest, ctx);
        break;
      }
      case 'edit': {
        const { editCampaign } = await import('./commands/campaign.js');
        await editCampaign(rest, ctx);
        break;
      }
      case 'suggest': {
        const { suggest } = await import('./commands/suggest.js');
        await suggest(rest, ctx);
        break;
      }
      case 'record': {
        const { record } = await import('./commands/record.js');
        await record(rest, ctx);
        break;
      }
      case 'import': {
        const { importCmd } = await import('./commands/import.js');
        await importCmd(rest, ctx);
        break;
      }
      case 'history': {
        const { history } = await import('./commands/history.js');
        await history(rest, ctx);
        break;
      }
      case 'export': {
        const { exportCmd } = await import('./commands/export.js');
        await exportCmd(rest, ctx);
        break;
      }
      default:
        console.error(`Unknown command: ${command}`);
        printHelp();
        process.exit(1);
    }
  } catch (err: unknown) {
    if (ctx.isJson && err instanceof BolabError) {
      console.error(JSON.stringify({ error: err.toJSON() }, null, 2));
    } else {
      fmt.error(`Error: ${errorMessage(err)}`);
    }
    process.exit(1);
  }
}

function printHelp(): void {
  console.log(`
bolab v${VERSION} — Batch Bayesian optimization campaigns for the lab

Usage: bolab <command> [options]

Workspace:
  init                       Create .bolab/config.json and the campaigns directory
    --engine CMD             Optimization engine command
    --engine-args "ARGS"     Arguments passed to the engine command
    --timeout MS             Deadline for one optimizer attempt
    --size N                 Default batch size
    --force                  Rewrite an existing config
  status [--json]            Workspace readiness and campaigns

Campaigns:
  new --spec FILE            Create a campaign from a JSON spec
  edit <id> --spec FILE      Change parameters, objectives or settings
  edit <id> --name NAME      Rename a campaign

Runs:
  suggest <id>               Generate and save the next batch
    --size N                 Rows in the batch
    --timeout MS             Deadline before falling back to random sampling
    --seed S                 Seed for fallback sampling
  record <id> <batch>        Record measured results for a pending batch
    --csv FILE | --json FILE
  import <id> --csv FILE     Import previously measured experiments
  history <id>               Batches, results and the best measurement so far
  export <id>                Rewrite every run CSV from the ledger

Flags:
  --json                     Output as JSON
  --version, -v              Print version
  --help, -h                 Print this help
`);
}

void main();
