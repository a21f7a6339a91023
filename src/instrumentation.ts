/**
 * OpenTelemetry bootstrap.
 *
 * MUST be loaded before all other imports via:
 *   node --require ./dist/src/instrumentation.js dist/src/index.js
 *
 * Auto-instruments http and express, and exports the deployment metrics
 * from telemetry/metrics.ts.
 */

import { NodeSDK } from '@opentelemetry/sdk-node';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-proto';
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-proto';
import { PrometheusExporter } from '@opentelemetry/exporter-prometheus';
import { PeriodicExportingMetricReader, type MetricReader } from '@opentelemetry/sdk-metrics';
import { resourceFromAttributes } from '@opentelemetry/resources';
import {
  ATTR_SERVICE_NAME,
  ATTR_SERVICE_VERSION,
} from '@opentelemetry/semantic-conventions';

const resource = resourceFromAttributes({
  [ATTR_SERVICE_NAME]: process.env['OTEL_SERVICE_NAME'] ?? 'config-gitops',
  [ATTR_SERVICE_VERSION]: '1.0.0',
  'deployment.environment': process.env['NODE_ENV'] ?? 'development',
});

// Prometheus scrape endpoint when a port is given, OTLP push otherwise
const promPort = process.env['GITOPS_OTEL_PROMETHEUS_PORT'];
const metricReader: MetricReader = promPort
  ? new PrometheusExporter({ port: parseInt(promPort, 10) })
  : new PeriodicExportingMetricReader({
      exporter: new OTLPMetricExporter(),
      exportIntervalMillis: 60_000,
    });

const sdk = new NodeSDK({
  resource,
  traceExporter: new OTLPTraceExporter(),
  metricReader,
  instrumentations: [
    getNodeAutoInstrumentations({
      // Every git call touches dozens of files
      '@opentelemetry/instrumentation-fs': { enabled: false },
    }),
  ],
});

sdk.start();

process.on('SIGTERM', () => {
  void sdk.shutdown();
});
