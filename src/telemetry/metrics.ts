/**
 * Deployment metrics for OpenTelemetry.
 *
 * No-ops until instrumentation.ts has started the SDK.
 *
 * Usage:
 *   import { deploymentsTotal, deploymentDuration } from '../telemetry/metrics.js';
 *   deploymentsTotal.add(1, { 'deployment.status': 'succeeded', 'deployment.trigger': 'webhook' });
 */

import { metrics } from '@opentelemetry/api';

const meter = metrics.getMeter('config-gitops', '1.0.0');

// --- Counters ---

/** Deployment attempts that reached a terminal state */
export const deploymentsTotal = meter.createCounter('gitops.deployments', {
  description: 'Deployment attempts by terminal status and trigger',
  unit: '{deployment}',
});

/** Requests folded into an already running attempt */
export const deploymentsCoalesced = meter.createCounter('gitops.deployments.coalesced', {
  description: 'Deployment requests answered by the in-flight attempt',
  unit: '{request}',
});

/** Domain reloads issued to the host */
export const domainReloads = meter.createCounter('gitops.reloads', {
  description: 'Host domain reloads by domain',
  unit: '{reload}',
});

/** Drift checks skipped because the working tree was busy */
export const driftChecksSkipped = meter.createCounter('gitops.drift.skipped', {
  description: 'Drift checks skipped while the working tree mutex was held',
  unit: '{check}',
});

// --- Histograms ---

/** Wall time of one deployment attempt */
export const deploymentDuration = meter.createHistogram('gitops.deployment.duration', {
  description: 'Time from request to terminal state',
  unit: 'ms',
  advice: {
    explicitBucketBoundaries: [100, 500, 1000, 5000, 10000, 30000, 60000, 120000, 300000],
  },
});

// --- Observable Gauges ---

/**
 * Register observable gauges that read from runtime state.
 * Call once during server startup, passing accessor functions.
 */
export function registerObservableGauges(accessors: {
  getCommitsBehind: () => number;
  getActiveRepairCount: () => number;
  getDirtyPathCount: () => number;
}): void {
  meter
    .createObservableGauge('gitops.commits_behind', {
      description: 'Remote commits not yet applied to the host',
      unit: '{commit}',
    })
    .addCallback((result) => {
      result.observe(accessors.getCommitsBehind());
    });

  meter
    .createObservableGauge('gitops.repairs.active', {
      description: 'Repair signals awaiting manual action',
      unit: '{issue}',
    })
    .addCallback((result) => {
      result.observe(accessors.getActiveRepairCount());
    });

  meter
    .createObservableGauge('gitops.drift.dirty_paths', {
      description: 'Uncommitted paths seen by the last drift check',
      unit: '{path}',
    })
    .addCallback((result) => {
      result.observe(accessors.getDirtyPathCount());
    });
}
