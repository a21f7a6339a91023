/**
 * Deployment Commands
 *
 * status, check and deploy: the everyday view of the coordinator.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { commandContext, exitWithError, startSpinner } from '../lib/context.js';
import { formatDeploymentStatus, formatUpdateCheck } from '../lib/OutputFormatter.js';

interface DeployOptions {
  wait: boolean;
  detail?: string;
}

/**
 * Register deployment commands
 */
export function registerDeploymentCommands(program: Command): void {
  // ==========================================================================
  // status
  // ==========================================================================
  program
    .command('status')
    .description('Show the current deployment state')
    .action(async (_opts: unknown, cmd: Command) => {
      const ctx = commandContext(cmd);
      try {
        const state = await ctx.client.getStatus();
        ctx.formatter.output(formatDeploymentStatus(state), state);
      } catch (error) {
        exitWithError(ctx, 'Failed to get status', error);
      }
    });

  // ==========================================================================
  // check
  // ==========================================================================
  program
    .command('check')
    .description('Fetch the remote and list commits waiting to be deployed')
    .action(async (_opts: unknown, cmd: Command) => {
      const ctx = commandContext(cmd);
      const spinner = startSpinner(ctx, 'Checking for updates...');
      try {
        const check = await ctx.client.checkForUpdates();
        spinner.stop();
        ctx.formatter.output(formatUpdateCheck(check), check);
      } catch (error) {
        exitWithError(ctx, 'Update check failed', error, spinner);
      }
    });

  // ==========================================================================
  // deploy
  // ==========================================================================
  program
    .command('deploy')
    .description('Pull, validate and reload the latest configuration')
    .option('--no-wait', 'Return as soon as the daemon accepts the request')
    .option('--detail <text>', 'Note recorded with the trigger')
    .action(async (opts: DeployOptions, cmd: Command) => {
      const ctx = commandContext(cmd);

      if (!opts.wait) {
        try {
          const accepted = await ctx.client.deployInBackground(opts.detail);
          ctx.formatter.output(
            `${chalk.green('✔')} Deployment accepted (${accepted.state.status})`,
            accepted
          );
        } catch (error) {
          exitWithError(ctx, 'Deployment request failed', error);
        }
        return;
      }

      const spinner = startSpinner(ctx, 'Deploying...');
      try {
        const state = await ctx.client.deploy(opts.detail);
        spinner.stop();
        ctx.formatter.output(formatDeploymentStatus(state), state);
        if (state.status === 'failed') {
          process.exit(1);
        }
      } catch (error) {
        exitWithError(ctx, 'Deployment failed', error, spinner);
      }
    });
}
