import { Command } from 'commander';
import chalk from 'chalk';
import { main, type CacheStats } from '@regverify/server';
import { withRuntime } from '../runtime.js';
import {
  batchSummary,
  error,
  field,
  formatDate,
  formatDuration,
  heading,
  json,
  statusColor,
  success,
  warn,
} from '../format.js';

function printCacheStats(stats: CacheStats): void {
  heading('ERP Cache');
  field('Records', stats.cachedRecordCount);
  field('Last refreshed', formatDate(stats.lastRefreshedAt));
  field('Age', formatDuration(stats.cacheAgeMs));
  field('Last refresh', stats.lastRefreshSucceeded ? chalk.green('succeeded') : chalk.red('failed'));
  if (stats.lastError) field('Last error', stats.lastError);
}

export function registerPipelineCommands(program: Command): void {
  program
    .command('start')
    .description('Run the verification daemon until SIGINT/SIGTERM')
    .action(async () => {
      try {
        await main();
      } catch (err) {
        error(err instanceof Error ? err.message : String(err));
        process.exitCode = 1;
      }
    });

  program
    .command('run-batch')
    .description('Process due registrations once (refreshes the ERP cache first when enabled)')
    .option('--json', 'Print the batch result as JSON')
    .action((opts: { json?: boolean }) =>
      withRuntime(async ({ config, pipeline }) => {
        if (config.erp.cacheEnabled) {
          const stats = await pipeline.triggerImmediateRefresh();
          if (!stats.lastRefreshSucceeded) {
            warn(`ERP cache refresh failed: ${stats.lastError ?? 'unknown error'}`);
          }
        }

        const result = await pipeline.runBatchNow();
        if (opts.json) {
          json(result);
          return;
        }
        success(batchSummary(result));
        field('Duration', formatDuration(result.durationMs));
      })
    );

  program
    .command('refresh-cache')
    .description('Reload the ERP employee cache and show its statistics')
    .option('--json', 'Print cache statistics as JSON')
    .action((opts: { json?: boolean }) =>
      withRuntime(async ({ pipeline }) => {
        const stats = await pipeline.triggerImmediateRefresh();
        if (opts.json) {
          json(stats);
        } else {
          printCacheStats(stats);
          console.log();
        }
        if (!stats.lastRefreshSucceeded) {
          process.exitCode = 1;
        }
      })
    );

  program
    .command('status')
    .description('Show pipeline configuration, cadence and ERP circuit state')
    .action(() =>
      withRuntime(async ({ pipeline }) => {
        const status = pipeline.getStatus();

        heading('Pipeline');
        field('Mock ERP', status.mockMode);
        field('Cache enabled', status.cache.enabled);
        field('Cache only', status.cache.cacheOnly);
        field('Refresh interval', `${status.cacheRefresh.intervalMinutes}m`);
        field('Current cadence', status.batches.currentCadence);

        heading('ERP Circuit');
        field('State', statusColor(status.erpCircuit.state));
        field('Failures', status.erpCircuit.failures);
        field('Next reset', formatDate(status.erpCircuit.nextResetAt));

        printCacheStats(pipeline.getCacheStats());
        console.log();
      })
    );
}
