#!/usr/bin/env node
import './env.js';

import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';

import { ActionReport, type LogMode } from './ActionReport.js';
import { SLACK_WEBHOOK_URL } from './constants.js';
import { getGateway } from './octokit.js';
import { loadManifest } from './reconcile/manifest.js';
import { reconcileOrganization, type Entity } from './reconcile/run.js';

interface GlobalOptions {
  plain: boolean;
  timeout?: number;
}

const program = new Command();

const parseSeconds = (value: string) => {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError('Expected a positive number of seconds.');
  }
  return seconds;
};

program
  .name('steward')
  .description('Reconcile a GitHub organization against a declarative manifest')
  .version('0.1.0')
  .option('--plain', 'disable colored output', false)
  .option('--timeout <seconds>', 'abort the run after this many seconds', parseSeconds);

async function run(manifestPath: string, dryRun: boolean, only?: Entity[]) {
  const opts = program.opts<GlobalOptions>();
  const mode: LogMode = opts.plain ? 'plain' : 'color';

  console.warn(
    'Dry Run?:',
    mode === 'plain' ? `${dryRun}` : chalk[dryRun ? 'green' : 'red'](`${dryRun}`),
  );

  const org = await loadManifest(manifestPath);
  const gateway = await getGateway(org.name, dryRun);
  const report = ActionReport.create({ mode });
  const signal = opts.timeout ? AbortSignal.timeout(opts.timeout * 1000) : undefined;

  await reconcileOrganization(gateway, report, org, { dryRun, only, signal });

  if (report.changes() === 0) {
    console.info(' - No changes');
  }
  if (!dryRun && SLACK_WEBHOOK_URL) {
    await report.send(SLACK_WEBHOOK_URL);
  }
}

const apply = program
  .command('apply')
  .description('Apply an org manifest: members, then teams, then repos')
  .argument('<manifest>', 'path to the organization manifest')
  .action((manifest: string) => run(manifest, false));

apply
  .command('teams')
  .description('Apply only the teams in an org manifest')
  .argument('<manifest>', 'path to the organization manifest')
  .action((manifest: string) => run(manifest, false, ['teams']));

const check = program
  .command('check')
  .description('Report what apply would change, without changing anything');

for (const entity of ['members', 'teams', 'repos'] as const) {
  check
    .command(entity)
    .description(`Check ${entity} in a manifest against what exists in github`)
    .argument('<manifest>', 'path to the organization manifest')
    .action((manifest: string) => run(manifest, true, [entity]));
}

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(chalk.red('ERROR'), err instanceof Error ? err.message : err);
  process.exit(1);
});
