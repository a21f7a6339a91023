/**
 * Drift Commands
 */

import { Command } from 'commander';
import { commandContext, exitWithError, startSpinner } from '../lib/context.js';
import { formatDriftReport } from '../lib/OutputFormatter.js';

export function registerDriftCommands(program: Command): void {
  const driftCmd = program
    .command('drift')
    .description('Local changes made outside git');

  driftCmd
    .command('show', { isDefault: true })
    .description('Show the last drift report')
    .action(async (_opts: unknown, cmd: Command) => {
      const ctx = commandContext(cmd);
      try {
        const drift = await ctx.client.getDrift();
        ctx.formatter.output(formatDriftReport(drift), drift);
      } catch (error) {
        exitWithError(ctx, 'Failed to get drift report', error);
      }
    });

  driftCmd
    .command('check')
    .description('Run a drift check now')
    .action(async (_opts: unknown, cmd: Command) => {
      const ctx = commandContext(cmd);
      const spinner = startSpinner(ctx, 'Checking working tree...');
      try {
        const report = await ctx.client.checkDrift();
        const { enabled } = await ctx.client.getDrift();
        spinner.stop();
        ctx.formatter.output(formatDriftReport({ enabled, report }), report);
      } catch (error) {
        exitWithError(ctx, 'Drift check failed', error, spinner);
      }
    });
}
