#!/usr/bin/env node
/**
 * seedsweep CLI
 * Runs, checks and dry-runs torrent retention rules
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { createLogger, formatDuration } from '@seedsweep/shared';
import { loadConfig, loadRules, validateConfig } from './config.js';
import { createRetention } from './index.js';
import { describeEndpoint, describePolicy } from './rules.js';
import type { RetentionConfig, TickReport } from './types.js';

const logger = createLogger('retention:cli');
const program = new Command();

interface ActionOptions {
  takeAction?: boolean;
  metricsAddr?: string;
}

program
  .name('seedsweep')
  .description('A maintenance + old-data deletion tool for Transmission')
  .version('0.1.0');

function resolveConfig(rulesPath: string | undefined, options: ActionOptions): RetentionConfig {
  const config = loadConfig({
    rules_path: rulesPath,
    take_action: options.takeAction,
    metrics_addr: options.metricsAddr,
  });
  if (!validateConfig(config)) {
    console.error(chalk.red('Invalid configuration'));
    process.exit(1);
  }
  return config;
}

function printReport(report: TickReport): void {
  const status = report.ok ? chalk.green('ok') : chalk.red('failed');
  console.log(`${chalk.bold(report.instance)} ${status} ${chalk.gray(`${report.durationMs}ms`)}`);
  console.log(`   Torrents: ${report.fetched}`);
  console.log(`   Matched: ${report.matched}`);
  if (report.dryRun) {
    console.log(chalk.yellow('   Dry run, nothing removed'));
  } else {
    console.log(`   Removed with data: ${report.removedWithData}`);
    console.log(`   Removed without data: ${report.removedWithoutData}`);
  }
  if (report.error) {
    console.log(chalk.red(`   Error: ${report.error}`));
  }
}

// ============================================================================
// Run Command
// ============================================================================

program
  .command('run', { isDefault: true })
  .description('Poll every configured instance forever and apply its policies')
  .argument('[config]', 'Rules file (defaults to SEEDSWEEP_CONFIG)')
  .option('-f, --take-action', 'Actually perform policy actions')
  .option('--metrics-addr <address>', 'Serve prometheus metrics on this host:port')
  .action(async (rulesPath: string | undefined, options: ActionOptions) => {
    const config = resolveConfig(rulesPath, options);
    let shuttingDown = false;

    try {
      const instances = await loadRules(config.rules_path);
      const { supervisor } = createRetention(instances, config);

      const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down`);
        shuttingDown = true;
        supervisor.stop();
      };
      process.on('SIGTERM', () => shutdown('SIGTERM'));
      process.on('SIGINT', () => shutdown('SIGINT'));

      await supervisor.run();
    } catch (error: unknown) {
      if (shuttingDown) {
        process.exit(0);
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Exiting', { error: message });
      process.exit(1);
    }
  });

// ============================================================================
// Check Command
// ============================================================================

program
  .command('check')
  .description('Load and validate the rules file, then print what it configures')
  .argument('[config]', 'Rules file (defaults to SEEDSWEEP_CONFIG)')
  .action(async (rulesPath: string | undefined) => {
    const config = resolveConfig(rulesPath, {});
    const spinner = ora('Loading rules').start();

    try {
      const instances = await loadRules(config.rules_path);
      spinner.succeed(`Loaded ${instances.length} instance(s)`);

      instances.forEach((instance, index) => {
        console.log(`\n${index + 1}. ${chalk.bold(describeEndpoint(instance.transmission))}`);
        console.log(`   Poll interval: ${formatDuration(instance.transmission.pollIntervalMs)}`);
        if (instance.policies.length === 0) {
          console.log(chalk.yellow('   No policies'));
        }
        instance.policies.forEach((policy, policyIndex) => {
          console.log(`   - ${describePolicy(policy, policyIndex)}`);
        });
      });
    } catch (error: unknown) {
      spinner.fail('Invalid rules');
      const message = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(message));
      process.exit(1);
    }
  });

// ============================================================================
// Once Command
// ============================================================================

program
  .command('once')
  .description('Run a single tick against every instance and print the results')
  .argument('[config]', 'Rules file (defaults to SEEDSWEEP_CONFIG)')
  .option('-f, --take-action', 'Actually perform policy actions')
  .action(async (rulesPath: string | undefined, options: ActionOptions) => {
    const config = resolveConfig(rulesPath, { takeAction: options.takeAction });
    const spinner = ora('Loading rules').start();

    try {
      const instances = await loadRules(config.rules_path);
      spinner.text = `Polling ${instances.length} instance(s)`;

      const { pollers } = createRetention(instances, { ...config, metrics_addr: undefined });
      const reports = await Promise.all(pollers.map((poller) => poller.tick()));
      spinner.stop();

      reports.forEach(printReport);
      if (reports.some((report) => !report.ok)) {
        process.exit(1);
      }
    } catch (error: unknown) {
      spinner.fail('Tick failed');
      const message = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(message));
      process.exit(1);
    }
  });

await program.parseAsync();
