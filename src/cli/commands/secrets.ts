/**
 * Secrets Commands
 */

import { Command } from 'commander';
import { commandContext, exitWithError, startSpinner } from '../lib/context.js';

export function registerSecretsCommands(program: Command): void {
  const secretsCmd = program.command('secrets').description('Secret store synchronisation');

  secretsCmd
    .command('refresh')
    .description('Re-sync secrets from the configured store')
    .action(async (_opts: unknown, cmd: Command) => {
      const ctx = commandContext(cmd);
      const spinner = startSpinner(ctx, 'Syncing secrets...');
      try {
        const result = await ctx.client.refreshSecrets();
        spinner.stop();
        if (result.skipped) {
          ctx.formatter.warn('No secret store configured; nothing synced');
        } else {
          ctx.formatter.success(`Synced ${result.secretCount} secret(s) to ${result.outputPath ?? 'secrets file'}`);
        }
      } catch (error) {
        exitWithError(ctx, 'Secret sync failed', error, spinner);
      }
    });
}
