/**
 * CLI-specific type definitions
 *
 * Response shapes are the server's JSON projections; the CLI only ever
 * reads them.
 */

import type { DeploymentStatusResponse } from '../../api/models/DeploymentStatus.js';

export type {
  DeploymentStatusResponse,
  RepairResponse,
  DriftReportResponse,
} from '../../api/models/DeploymentStatus.js';
export type { DeploymentStatus } from '../../deploy/types.js';
export type { GitLogEntry } from '../../git/GitClient.js';

/**
 * Global CLI options available on all commands
 */
export type GlobalOptions = {
  url: string;
  token?: string;
  json?: boolean;
  verbose?: boolean;
};

export interface UpdateCheckResponse {
  availableCommit: string;
  commitsBehind: number;
  commits: Array<{ hash: string; shortHash: string; author: string; date: string; message: string }>;
}

export interface SecretSyncResponse {
  skipped: boolean;
  secretCount: number;
  outputPath?: string;
}

export interface DriftResponse {
  enabled: boolean;
  report: { dirtyPaths: string[]; checkedAt: string } | null;
}

export interface DeployAccepted {
  accepted: true;
  state: DeploymentStatusResponse;
}
