#!/usr/bin/env node
/**
 * config-gitops CLI
 *
 * Talks to a running daemon over its REST API.
 *
 * Usage: config-gitops [options] <command> [subcommand] [arguments]
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_URL } from './lib/ApiClient.js';
import { registerDeploymentCommands } from './commands/deployment.js';
import { registerRepairCommands } from './commands/repairs.js';
import { registerDriftCommands } from './commands/drift.js';
import { registerSecretsCommands } from './commands/secrets.js';

const VERSION = '1.0.0';

/**
 * Create and configure the CLI program
 */
export function createProgram(env: NodeJS.ProcessEnv = process.env): Command {
  const program = new Command();

  program
    .name('config-gitops')
    .description('Inspect and drive a config-gitops daemon')
    .version(VERSION, '-V, --version', 'Output the version number')
    .option('--url <url>', 'Daemon URL (env: GITOPS_URL)', env['GITOPS_URL'] || DEFAULT_URL)
    .option('--token <token>', 'API bearer token (env: GITOPS_API_TOKEN)', env['GITOPS_API_TOKEN'])
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output');

  registerDeploymentCommands(program);
  registerRepairCommands(program);
  registerDriftCommands(program);
  registerSecretsCommands(program);

  program.addHelpText(
    'after',
    `
${chalk.bold('Examples:')}
  ${chalk.gray('# What is deployed right now')}
  $ config-gitops status

  ${chalk.gray('# Commits waiting on the remote')}
  $ config-gitops check

  ${chalk.gray('# Deploy and wait for the result')}
  $ config-gitops deploy --detail "new automations"

  ${chalk.gray('# Dismiss a handled repair')}
  $ config-gitops repairs ack persistent_drift
`
  );

  program.on('command:*', () => {
    console.error(chalk.red('Unknown command:'), program.args.join(' '));
    console.log();
    console.log('Run', chalk.cyan('config-gitops --help'), 'for usage information.');
    process.exit(1);
  });

  return program;
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(chalk.red('Fatal error:'), error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
