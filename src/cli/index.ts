#!/usr/bin/env node

/**
 * latency-heatmap CLI
 *
 * Uses console.log/error for terminal output; diagnostics go through the
 * pino logger (LATENCY_HEATMAP_LOG_LEVEL, LATENCY_HEATMAP_LOG_FORMAT).
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { config as loadEnv } from 'dotenv';
import { ConfigurationError } from '../errors.js';
import { LatencyHeatmap } from '../latency-heatmap.class.js';
import {
  DEFAULT_INTERVAL_SECONDS,
  DEFAULT_PACKET_SIZE,
  DEFAULT_SAMPLES,
  DEFAULT_TIMEOUT_SECONDS,
} from '../config.js';
import { buildParams, parsePositiveInteger, parsePositiveNumber, type CliOptions } from './options.js';
import { renderStatisticsTable, renderSummary } from './render.js';

loadEnv({ quiet: true });

const program = new Command();

program
  .name('latency-heatmap')
  .description('Sample round-trip latency to several hosts concurrently and report per-target statistics and a heatmap grid')
  .version('0.1.0')
  .argument('<targets...>', 'hosts to probe (space or comma separated)')
  .option('-i, --interval <seconds>', `seconds between rounds (default: ${DEFAULT_INTERVAL_SECONDS})`, parsePositiveNumber)
  .option('-n, --samples <count>', `rounds per target (default: ${DEFAULT_SAMPLES})`, parsePositiveInteger)
  .option('-t, --timeout <seconds>', `seconds before a round counts as failed (default: ${DEFAULT_TIMEOUT_SECONDS})`, parsePositiveNumber)
  .option('-s, --packet-size <bytes>', `echo payload size (default: ${DEFAULT_PACKET_SIZE})`, parsePositiveInteger)
  .option('-d, --deadline <seconds>', 'stop sampling after this many seconds and report what was collected', parsePositiveNumber)
  .option('--no-graph', 'set showGraph to false in the report')
  .option('--json', 'print the full report as JSON', false)
  .action(async (targets: string[], options: CliOptions) => {
    const controller = new AbortController();
    const onSigint = (): void => {
      console.error(chalk.yellow('\nInterrupted, reporting partial results...'));
      controller.abort(new Error('interrupted'));
    };
    process.once('SIGINT', onSigint);

    try {
      const report = await new LatencyHeatmap().run(buildParams(targets, options), {
        signal: controller.signal,
        deadlineMs: options.deadline !== undefined ? options.deadline * 1000 : undefined,
      });

      if (options.json) {
        console.log(JSON.stringify(report, null, 2));
      } else {
        console.log(renderStatisticsTable(report));
        console.log(renderSummary(report));
      }
    } catch (error) {
      if (error instanceof ConfigurationError) {
        console.error(chalk.red(error.message));
        process.exitCode = 1;
        return;
      }
      throw error;
    } finally {
      process.off('SIGINT', onSigint);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
});
