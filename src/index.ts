/**
 * config-gitops daemon
 *
 * Deploys a Git-tracked configuration tree to a running host: pulls new
 * commits, syncs secrets, validates, then reloads only what changed.
 */

import 'dotenv/config';
import { GitOpsServer } from './server/GitOpsServer.js';
import { getLogger, initializeLogging, registerComponent, shutdownLogging } from './logging/index.js';

initializeLogging();
registerComponent('main', 'Process lifecycle');
const logger = getLogger('main');

let gitops: GitOpsServer | null = null;

/**
 * Attempt graceful shutdown with a safety timeout.
 * An in-flight deployment gets 60 seconds to finish.
 */
async function gracefulShutdown(): Promise<void> {
  if (!gitops) return;
  const timeout = setTimeout(() => {
    process.exit(1);
  }, 60_000);
  try {
    await gitops.stop();
  } finally {
    clearTimeout(timeout);
  }
}

async function exitAfterShutdown(code: number): Promise<void> {
  try {
    await gracefulShutdown();
  } catch (err) {
    logger.error('Error during shutdown', err instanceof Error ? err : new Error(String(err)));
    code = 1;
  }
  await shutdownLogging();
  process.exit(code);
}

process.on('SIGINT', () => {
  logger.warn('Received SIGINT, shutting down...');
  void exitAfterShutdown(0);
});

process.on('SIGTERM', () => {
  logger.warn('Received SIGTERM, shutting down...');
  void exitAfterShutdown(0);
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled promise rejection', reason instanceof Error ? reason : new Error(String(reason)));
  void exitAfterShutdown(1);
});

process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught exception', error);
  void exitAfterShutdown(1);
});

async function main(): Promise<void> {
  gitops = new GitOpsServer();

  try {
    await gitops.start();
  } catch (error) {
    logger.error('Failed to start config-gitops', error instanceof Error ? error : new Error(String(error)));
    await shutdownLogging();
    process.exit(1);
  }
}

void main();
