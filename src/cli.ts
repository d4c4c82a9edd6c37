#!/usr/bin/env node

import 'dotenv/config';
import { createReadStream, existsSync } from 'node:fs';
import { createInterface } from 'node:readline';

import chalk from 'chalk';
import { Command, Option } from 'commander';

import { createBillingContext } from './bootstrap.js';
import { formatPlan } from './cli/formatter.js';
import { replay } from './cli/runner.js';
import type { AppConfig } from './config/index.js';
import { loadConfig } from './config/index.js';
import type { AccountTier, BillingError } from './types/index.js';

interface ReplayCommandOptions {
  plans?: string;
  tier?: AccountTier;
  keepGoing?: boolean;
  summary?: boolean;
  verbose?: boolean;
}

interface PlansCommandOptions {
  plans?: string;
}

function fail(error: BillingError): void {
  console.error(chalk.red(`${error.code}: ${error.message}`));
  if (error.details !== undefined) {
    console.error(chalk.dim(JSON.stringify(error.details)));
  }
  process.exitCode = 1;
}

function resolveConfig(): AppConfig | null {
  const config = loadConfig(process.env);
  if (!config.success) {
    fail(config.error);
    return null;
  }
  return config.data;
}

const program = new Command();

program
  .name('storage-fees')
  .description(
    'Replay storage-unit file operations and report monthly fees.\n\n' +
      'Each input line is:\n' +
      '  <timestamp> UPLOAD <unitId> <fileId> <sizeMB>\n' +
      '  <timestamp> UPDATE <unitId> <fileId> <sizeMB>\n' +
      '  <timestamp> DELETE <unitId> <fileId>\n' +
      '  <timestamp> CALC <unitId>'
  )
  .version('0.1.0');

program
  .command('replay')
  .description(
    'Apply an operation stream in order and print one line per operation.\n' +
      'Stops at the first failing line unless --keep-going is given.'
  )
  .argument('[file]', 'operation stream (defaults to stdin)')
  .option('-p, --plans <path>', 'plan catalog file (overrides PLANS_FILE)')
  .addOption(
    new Option('-t, --tier <tier>', 'account tier (overrides ACCOUNT_TIER)').choices([
      'free',
      'paid',
    ])
  )
  .option('-k, --keep-going', 'report every failing line instead of stopping')
  .option('-s, --summary', 'print the monthly billing summary at the end')
  .option('-v, --verbose', 'echo each parsed operation to stderr')
  .action(async (file: string | undefined, options: ReplayCommandOptions) => {
    const config = resolveConfig();
    if (config === null) {
      return;
    }

    const context = createBillingContext({
      plansFile: options.plans ?? config.plansFile,
      accountTier: options.tier ?? config.accountTier,
    });
    if (!context.success) {
      fail(context.error);
      return;
    }

    if (file !== undefined && !existsSync(file)) {
      fail({ code: 'VALIDATION_ERROR', message: `No such file: ${file}` });
      return;
    }

    const lines = createInterface({
      input: file !== undefined ? createReadStream(file) : process.stdin,
      crlfDelay: Infinity,
    });

    const report = await replay(
      context.data.engine,
      lines,
      {
        write: (line) => console.log(line),
        error: (line) => console.error(chalk.red(line)),
      },
      {
        keepGoing: options.keepGoing === true,
        verbose: options.verbose === true,
        summary: options.summary === true,
      }
    );
    lines.close();

    if (options.verbose === true) {
      console.error(
        chalk.dim(`${report.applied} applied, ${report.failed} failed`)
      );
    }
    process.exitCode = report.exitCode;
  });

program
  .command('plans')
  .description('List the plan catalog and the units provisioned with it')
  .option('-p, --plans <path>', 'plan catalog file (overrides PLANS_FILE)')
  .action((options: PlansCommandOptions) => {
    const config = resolveConfig();
    if (config === null) {
      return;
    }

    const context = createBillingContext({
      plansFile: options.plans ?? config.plansFile,
      accountTier: config.accountTier,
    });
    if (!context.success) {
      fail(context.error);
      return;
    }

    const { catalog } = context.data;
    catalog.listPlans().forEach((plan) => console.log(formatPlan(plan)));
    catalog
      .listProvisioning()
      .forEach((unit) => console.log(`unit ${unit.unitId} -> ${unit.planId}`));
  });

await program.parseAsync(process.argv);
