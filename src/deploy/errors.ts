/**
 * Deployment error taxonomy.
 *
 * Every pipeline phase fails with one of these; the coordinator copies
 * kind/reason/message onto DeploymentState.error verbatim.
 */

import type { ReloadDomain } from './ReloadPlanner.js';

export type DeploymentErrorKind =
  | 'repository'
  | 'secret_sync'
  | 'validation'
  | 'reload'
  | 'interrupted'
  | 'timeout'
  | 'internal';

export type RepositoryErrorReason = 'network' | 'authentication' | 'merge_conflict' | 'lock_held' | 'unknown';

export type SecretSyncErrorReason = 'authentication' | 'network' | 'malformed_response' | 'unknown';

export interface DeploymentFailure {
  kind: DeploymentErrorKind;
  reason?: string;
  message: string;
}

export abstract class DeploymentError extends Error {
  abstract readonly kind: DeploymentErrorKind;

  get reason(): string | undefined {
    return undefined;
  }

  toFailure(): DeploymentFailure {
    const failure: DeploymentFailure = { kind: this.kind, message: this.message };
    if (this.reason !== undefined) failure.reason = this.reason;
    return failure;
  }
}

export class RepositoryError extends DeploymentError {
  readonly kind = 'repository' as const;

  constructor(
    private readonly failureReason: RepositoryErrorReason,
    message: string
  ) {
    super(message);
    this.name = 'RepositoryError';
  }

  override get reason(): RepositoryErrorReason {
    return this.failureReason;
  }
}

export class SecretSyncError extends DeploymentError {
  readonly kind = 'secret_sync' as const;

  constructor(
    private readonly failureReason: SecretSyncErrorReason,
    message: string
  ) {
    super(message);
    this.name = 'SecretSyncError';
  }

  override get reason(): SecretSyncErrorReason {
    return this.failureReason;
  }
}

/**
 * The host rejected the configuration. `diagnostics` is the host's output.
 */
export class ValidationError extends DeploymentError {
  readonly kind = 'validation' as const;

  constructor(
    message: string,
    public readonly diagnostics: string
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ReloadError extends DeploymentError {
  readonly kind = 'reload' as const;

  constructor(
    public readonly domain: ReloadDomain,
    message: string
  ) {
    super(message);
    this.name = 'ReloadError';
  }

  override get reason(): string {
    return this.domain;
  }
}

export class InterruptedDeploymentError extends DeploymentError {
  readonly kind = 'interrupted' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InterruptedDeploymentError';
  }
}

export class PhaseTimeoutError extends DeploymentError {
  readonly kind = 'timeout' as const;

  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'PhaseTimeoutError';
  }

  override get reason(): string {
    return this.operation;
  }
}

export function toDeploymentFailure(err: unknown): DeploymentFailure {
  if (err instanceof DeploymentError) {
    return err.toFailure();
  }
  return {
    kind: 'internal',
    message: err instanceof Error ? err.message : String(err),
  };
}

/**
 * Race an operation against a timer. The timer is always cleared.
 */
export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new PhaseTimeoutError(label, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([operation, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
