/**
 * Per-command plumbing shared by every command group.
 */

import { Command } from 'commander';
import ora, { Ora } from 'ora';
import { ApiClient, ApiError } from './ApiClient.js';
import { OutputFormatter } from './OutputFormatter.js';
import type { GlobalOptions } from '../types/index.js';

export interface CommandContext {
  options: GlobalOptions;
  client: ApiClient;
  formatter: OutputFormatter;
}

export function commandContext(cmd: Command): CommandContext {
  const options = cmd.optsWithGlobals<GlobalOptions>();
  return {
    options,
    client: new ApiClient({ baseUrl: options.url, token: options.token, verbose: options.verbose }),
    formatter: new OutputFormatter(options.json),
  };
}

/**
 * Spinner that stays silent in JSON mode so stdout remains parseable.
 */
export function startSpinner(ctx: CommandContext, text: string): Ora {
  return ora({ text, isEnabled: !ctx.options.json }).start();
}

/**
 * Report a failed command and exit non-zero.
 */
export function exitWithError(ctx: CommandContext, action: string, error: unknown, spinner?: Ora): never {
  spinner?.stop();
  if (error instanceof ApiError) {
    ctx.formatter.error(`${action}: ${error.message}`, { statusCode: error.statusCode });
  } else {
    ctx.formatter.error(action, error instanceof Error ? error.message : String(error));
  }
  process.exit(1);
}
