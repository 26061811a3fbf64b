/**
 * Prometheus Metrics Service
 *
 * Counters and timings for the tax engine. The host process decides whether
 * and where to expose the registry.
 */

import { Registry, Counter, Histogram } from 'prom-client';

export const metricsRegistry = new Registry();

export const payrollComputationsTotal = new Counter({
  name: 'payroll_computations_total',
  help: 'Payroll ledger row computations',
  labelNames: ['status'],
  registers: [metricsRegistry]
});

export const payrollComputationDuration = new Histogram({
  name: 'payroll_computation_duration_seconds',
  help: 'Duration of a single ledger row computation in seconds',
  buckets: [0.0005, 0.001, 0.005, 0.01, 0.05, 0.1],
  registers: [metricsRegistry]
});

export const taxConfigResolutionsTotal = new Counter({
  name: 'tax_config_resolutions_total',
  help: 'Tax-year configuration resolutions',
  labelNames: ['result'],
  registers: [metricsRegistry]
});

export const taxConfigValidationFailuresTotal = new Counter({
  name: 'tax_config_validation_failures_total',
  help: 'Tax-year validations that ended in FAIL',
  labelNames: ['year'],
  registers: [metricsRegistry]
});

export const reportAggregationsTotal = new Counter({
  name: 'report_aggregations_total',
  help: 'Report rollups produced from ledger rows',
  labelNames: ['report', 'status'],
  registers: [metricsRegistry]
});

export function recordPayrollComputation(status: 'success' | 'failure', durationSeconds?: number): void {
  payrollComputationsTotal.inc({ status });
  if (durationSeconds !== undefined) {
    payrollComputationDuration.observe(durationSeconds);
  }
}

export function recordReportAggregation(report: string, status: 'success' | 'failure'): void {
  reportAggregationsTotal.inc({ report, status });
}

/**
 * Get metrics in Prometheus text format
 */
export async function getMetrics(): Promise<string> {
  return metricsRegistry.metrics();
}

export function getMetricsContentType(): string {
  return metricsRegistry.contentType;
}
