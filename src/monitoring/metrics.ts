/**
 * Prometheus Metrics for the Procurement Engine
 * Exposes metrics for monitoring scenario evaluation and data quality
 */

import { Registry, Counter, Histogram } from 'prom-client';
import { ScenarioResult } from '../types/core';

// Create a registry for procurement metrics
export const procurementMetricsRegistry = new Registry();

// Scenario evaluation duration histogram
export const scenarioEvaluationDuration = new Histogram({
  name: 'procurement_scenario_evaluation_seconds',
  help: 'Duration of a single strategy evaluation in seconds',
  labelNames: ['strategy', 'phase'],
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
  registers: [procurementMetricsRegistry]
});

// Degraded selections counter
export const degradedSelectionsTotal = new Counter({
  name: 'procurement_degraded_selections_total',
  help: 'Total item assignments that relaxed compliance, expiry or currency constraints',
  labelNames: ['strategy'],
  registers: [procurementMetricsRegistry]
});

// Unconvertible quotes counter
export const unconvertibleQuotesTotal = new Counter({
  name: 'procurement_unconvertible_quotes_total',
  help: 'Total quotes excluded from totals for lack of an exchange rate',
  registers: [procurementMetricsRegistry]
});

// Analysis requests counter
export const analysisRequestsTotal = new Counter({
  name: 'procurement_analysis_requests_total',
  help: 'Total engine operations by name and outcome',
  labelNames: ['operation', 'outcome'],
  registers: [procurementMetricsRegistry]
});

/**
 * Update metrics from a scored scenario
 */
export function updateScenarioMetrics(result: ScenarioResult, durationSeconds: number): void {
  scenarioEvaluationDuration.observe({ strategy: result.name, phase: result.phase }, durationSeconds);

  const degraded = result.perItemAssignment.filter(assignment => assignment.degraded).length;
  if (degraded > 0) {
    degradedSelectionsTotal.inc({ strategy: result.name }, degraded);
  }
}

export function recordUnconvertibleQuotes(count: number): void {
  if (count > 0) {
    unconvertibleQuotesTotal.inc(count);
  }
}

export function recordAnalysisRequest(operation: string, outcome: 'success' | 'error'): void {
  analysisRequestsTotal.inc({ operation, outcome });
}
