/**
 * Output Formatter
 *
 * Provides consistent output formatting for CLI commands.
 * Supports both table and JSON output formats.
 */

import chalk from 'chalk';
import type {
  DeploymentStatus,
  DeploymentStatusResponse,
  DriftResponse,
  GitLogEntry,
  RepairResponse,
  UpdateCheckResponse,
} from '../types/index.js';

// =============================================================================
// Color Helpers
// =============================================================================

type ChalkFn = chalk.Chalk;

/**
 * Get color for deployment status
 */
export function getStatusColor(status: DeploymentStatus): ChalkFn {
  switch (status) {
    case 'succeeded':
      return chalk.green;
    case 'failed':
      return chalk.red;
    case 'idle':
      return chalk.gray;
    default:
      // any in-flight phase
      return chalk.cyan;
  }
}

export function getSeverityColor(severity: RepairResponse['severity']): ChalkFn {
  return severity === 'error' ? chalk.red : chalk.yellow;
}

// =============================================================================
// Format Helpers
// =============================================================================

/**
 * Format date to local string
 */
export function formatDate(date: string | Date | null | undefined): string {
  if (!date) return '-';
  const d = typeof date === 'string' ? new Date(date) : date;
  return d.toLocaleString();
}

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Truncate string to max length
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}

/**
 * Pad string to fixed width
 */
export function pad(str: string, width: number, align: 'left' | 'right' = 'left'): string {
  if (str.length >= width) return str.slice(0, width);
  const padding = ' '.repeat(width - str.length);
  return align === 'left' ? str + padding : padding + str;
}

function shortCommit(commit: string | null): string {
  return commit ? commit.slice(0, 7) : '-';
}

// =============================================================================
// Table Formatting
// =============================================================================

interface TableColumn {
  header: string;
  width: number;
  align?: 'left' | 'right';
}

interface TableOptions {
  columns: TableColumn[];
  border?: boolean;
}

/**
 * Create a simple ASCII table
 */
export function createTable(data: string[][], options: TableOptions): string {
  const { columns, border = true } = options;
  const lines: string[] = [];

  // Header, column width or widest cell, whichever is larger
  const widths = columns.map((col, i) => {
    const maxDataWidth = Math.max(0, ...data.map((row) => (row[i] || '').length));
    return Math.max(col.width, col.header.length, maxDataWidth);
  });

  const h = border ? '─' : '';
  const v = border ? '│' : '';

  const renderRow = (cells: string[]): string => {
    const row = columns
      .map((col, i) => pad(cells[i] || '', widths[i] ?? col.width, col.align))
      .map((cell) => (border ? ` ${cell} ` : cell))
      .join(border ? v : ' ');
    return border ? v + row + v : row;
  };

  if (border) {
    lines.push('┌' + widths.map((w) => h.repeat(w + 2)).join('┬') + '┐');
  }

  lines.push(renderRow(columns.map((col) => col.header)));

  if (border) {
    lines.push('├' + widths.map((w) => h.repeat(w + 2)).join('┼') + '┤');
  } else {
    lines.push(widths.map((w) => '-'.repeat(w)).join(' '));
  }

  for (const row of data) {
    lines.push(renderRow(row));
  }

  if (border) {
    lines.push('└' + widths.map((w) => h.repeat(w + 2)).join('┴') + '┘');
  }

  return lines.join('\n');
}

// =============================================================================
// Domain Formatting
// =============================================================================

export function formatCommitTable(commits: GitLogEntry[]): string {
  if (commits.length === 0) {
    return chalk.gray('No commits');
  }
  const rows = commits.map((c) => [c.shortHash, truncate(c.author, 20), truncate(c.message, 60)]);
  return createTable(rows, {
    columns: [
      { header: 'COMMIT', width: 7 },
      { header: 'AUTHOR', width: 10 },
      { header: 'MESSAGE', width: 20 },
    ],
  });
}

/**
 * Multi-line summary of the coordinator state
 */
export function formatDeploymentStatus(state: DeploymentStatusResponse): string {
  const lines: string[] = [];
  const color = getStatusColor(state.status);

  lines.push(`${chalk.gray('Status:')}      ${color(state.status)}`);
  lines.push(`${chalk.gray('Current:')}     ${shortCommit(state.currentCommit)}`);
  if (state.availableCommit && state.availableCommit !== state.currentCommit) {
    lines.push(
      `${chalk.gray('Available:')}   ${shortCommit(state.availableCommit)} (${state.commitsBehind} behind)`
    );
  }
  if (state.trigger) {
    const detail = state.trigger.detail ? ` - ${state.trigger.detail}` : '';
    lines.push(`${chalk.gray('Trigger:')}     ${state.trigger.reason}${detail}`);
  }
  if (state.startedAt) {
    lines.push(`${chalk.gray('Started:')}     ${formatDate(state.startedAt)}`);
  }
  if (state.startedAt && state.finishedAt) {
    const elapsed = new Date(state.finishedAt).getTime() - new Date(state.startedAt).getTime();
    lines.push(`${chalk.gray('Duration:')}    ${formatDuration(elapsed)}`);
  }
  if (state.lastCheckedAt) {
    lines.push(`${chalk.gray('Checked:')}     ${formatDate(state.lastCheckedAt)}`);
  }
  if (state.restartRequired) {
    lines.push(chalk.yellow('Restart required to apply the latest changes'));
  }
  if (state.reloadPlan && state.reloadPlan.domains.length > 0) {
    lines.push(`${chalk.gray('Reloaded:')}    ${state.reloadPlan.domains.join(', ')}`);
  }
  if (state.error) {
    lines.push('');
    const reason = state.error.reason ? ` (${state.error.reason})` : '';
    lines.push(chalk.red(`${state.error.kind}${reason}: ${state.error.message}`));
  }
  if (state.changedFiles.length > 0) {
    lines.push('');
    lines.push(chalk.bold('Changed files'));
    for (const file of state.changedFiles) {
      lines.push(`  ${file}`);
    }
  }
  return lines.join('\n');
}

export function formatUpdateCheck(check: UpdateCheckResponse): string {
  if (check.commitsBehind === 0) {
    return chalk.green(`Up to date at ${shortCommit(check.availableCommit)}`);
  }
  const heading = chalk.yellow(
    `${check.commitsBehind} commit(s) available, remote at ${shortCommit(check.availableCommit)}`
  );
  return `${heading}\n\n${formatCommitTable(check.commits)}`;
}

export function formatRepairTable(repairs: RepairResponse[]): string {
  if (repairs.length === 0) {
    return chalk.green('No active repairs');
  }
  const rows = repairs.map((r) => [
    getSeverityColor(r.severity)(r.severity),
    r.kind,
    truncate(r.message, 60),
    formatDate(r.raisedAt),
  ]);
  return createTable(rows, {
    columns: [
      { header: 'SEVERITY', width: 8 },
      { header: 'KIND', width: 20 },
      { header: 'MESSAGE', width: 30 },
      { header: 'RAISED', width: 20 },
    ],
  });
}

export function formatDriftReport(drift: DriftResponse): string {
  const lines: string[] = [];
  lines.push(`${chalk.gray('Detector:')}    ${drift.enabled ? chalk.green('running') : chalk.gray('disabled')}`);
  if (!drift.report) {
    lines.push(chalk.gray('No check has run yet'));
    return lines.join('\n');
  }
  lines.push(`${chalk.gray('Checked:')}     ${formatDate(drift.report.checkedAt)}`);
  if (drift.report.dirtyPaths.length === 0) {
    lines.push(chalk.green('Working tree clean'));
  } else {
    lines.push(chalk.yellow(`${drift.report.dirtyPaths.length} path(s) changed outside git`));
    for (const p of drift.report.dirtyPaths) {
      lines.push(`  ${p}`);
    }
  }
  return lines.join('\n');
}

// =============================================================================
// JSON Formatting
// =============================================================================

/**
 * Format any data as pretty JSON
 */
export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

// =============================================================================
// Output Helper
// =============================================================================

/**
 * OutputFormatter class for consistent output handling
 */
export class OutputFormatter {
  private jsonMode: boolean;

  constructor(jsonMode: boolean = false) {
    this.jsonMode = jsonMode;
  }

  /**
   * Output data (table or JSON based on mode)
   */
  output(tableOutput: string, jsonData: unknown): void {
    if (this.jsonMode) {
      console.log(formatJson(jsonData));
    } else {
      console.log(tableOutput);
    }
  }

  success(message: string): void {
    if (this.jsonMode) {
      console.log(formatJson({ success: true, message }));
    } else {
      console.log(chalk.green('✔') + ' ' + message);
    }
  }

  error(message: string, details?: unknown): void {
    if (this.jsonMode) {
      console.log(formatJson({ success: false, error: message, details }));
    } else {
      console.error(chalk.red('✖') + ' ' + message);
      if (details) {
        console.error(chalk.gray(JSON.stringify(details, null, 2)));
      }
    }
  }

  warn(message: string): void {
    if (this.jsonMode) {
      console.log(formatJson({ warning: message }));
    } else {
      console.log(chalk.yellow('⚠') + ' ' + message);
    }
  }

  info(message: string): void {
    if (!this.jsonMode) {
      console.log(chalk.blue('ℹ') + ' ' + message);
    }
  }
}

export default OutputFormatter;
