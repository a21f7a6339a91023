/**
 * Repair Commands
 *
 * Lists issues that need operator attention and acknowledges them.
 */

import { Command } from 'commander';
import { commandContext, exitWithError } from '../lib/context.js';
import { formatRepairTable } from '../lib/OutputFormatter.js';

export function registerRepairCommands(program: Command): void {
  const repairsCmd = program
    .command('repairs')
    .description('Issues raised by deployments, drift checks and recovery');

  repairsCmd
    .command('list', { isDefault: true })
    .description('List active repairs')
    .action(async (_opts: unknown, cmd: Command) => {
      const ctx = commandContext(cmd);
      try {
        const repairs = await ctx.client.getRepairs();
        ctx.formatter.output(formatRepairTable(repairs), repairs);
      } catch (error) {
        exitWithError(ctx, 'Failed to list repairs', error);
      }
    });

  repairsCmd
    .command('ack <kind>')
    .description('Acknowledge (dismiss) a repair')
    .action(async (kind: string, _opts: unknown, cmd: Command) => {
      const ctx = commandContext(cmd);
      try {
        await ctx.client.acknowledgeRepair(kind);
        ctx.formatter.success(`Acknowledged ${kind}`);
      } catch (error) {
        exitWithError(ctx, `Failed to acknowledge ${kind}`, error);
      }
    });
}
