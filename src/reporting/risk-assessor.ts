/**
 * Risk Assessor
 * Derives risk findings from the current strategy's scenario
 */

import {
  EngineConfig,
  ItemRiskLevel,
  MitigationAction,
  Project,
  QuoteComparison,
  RiskFinding,
  RiskKind,
  RiskSeverity,
  RiskSummary,
  ScenarioResult
} from '../types/core';
import { EvaluationItem } from '../scenarios/evaluator';
import { addDays } from '../utils/dates';

export interface RiskContext {
  project: Project;
  scenario: ScenarioResult;
  items: EvaluationItem[];
  config: Pick<EngineConfig, 'expiryWarningDays' | 'concentrationThreshold'>;
  asOf: Date;
}

const SEVERITY_RANK: Record<RiskSeverity, number> = { low: 0, medium: 1, high: 2 };

const MITIGATIONS: Record<RiskKind, string> = {
  'quote-expiring': 'Renew expiring quotes before placing orders',
  'no-quotes': 'Request quotes from vendors for uncovered items',
  'no-compliant-quotes': 'Source products that meet the required specification attributes',
  'vendor-concentration': 'Qualify alternative vendors to reduce dependence on a single supplier',
  'budget-overrun': 'Secure additional budget or negotiate better pricing',
  'single-source': 'Identify backup vendors for single-source items',
  'unconvertible-quote': 'Add exchange rates for the currencies of unconvertible quotes',
  'degraded-selection': 'Review items whose selected quote relaxes compliance, expiry or currency requirements',
  'constraint-unsatisfiable': 'Relax vendor constraints or qualify vendors that meet them',
  'below-minimum-order': 'Raise the order quantity or negotiate the vendor minimum'
};

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function percent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

export function assessProjectRisks(context: RiskContext): RiskFinding[] {
  return [
    ...expiryFindings(context),
    ...coverageFindings(context),
    ...concentrationFindings(context),
    ...budgetFindings(context),
    ...singleSourceFindings(context),
    ...caveatFindings(context.scenario)
  ];
}

function expiryFindings({ project, scenario, config, asOf }: RiskContext): RiskFinding[] {
  const reference = project.deadline ?? asOf;
  const referenceLabel = project.deadline ? 'the project deadline' : 'the analysis date';
  const warnUntil = addDays(reference, config.expiryWarningDays).getTime();
  const findings: RiskFinding[] = [];

  for (const assignment of scenario.perItemAssignment) {
    const { validUntil, quoteId } = assignment;
    if (!validUntil || validUntil.getTime() > warnUntil) {
      continue;
    }

    let severity: RiskSeverity;
    let message: string;
    if (validUntil.getTime() < asOf.getTime()) {
      severity = 'high';
      message = `Selected quote ${quoteId} for ${assignment.specificationName} expired on ${formatDate(validUntil)}`;
    } else if (validUntil.getTime() <= reference.getTime()) {
      severity = 'medium';
      message = `Selected quote ${quoteId} for ${assignment.specificationName} expires on ${formatDate(validUntil)}, on or before ${referenceLabel}`;
    } else {
      severity = 'low';
      message = `Selected quote ${quoteId} for ${assignment.specificationName} expires on ${formatDate(validUntil)}, within ${config.expiryWarningDays} days of ${referenceLabel}`;
    }

    findings.push({
      kind: 'quote-expiring',
      severity,
      message,
      bomItemIds: [assignment.bomItemId],
      vendorId: assignment.vendorId,
      quoteId
    });
  }

  return findings;
}

function coverageFindings({ scenario, items }: RiskContext): RiskFinding[] {
  const findings: RiskFinding[] = [];

  scenario.perItemAssignment.forEach((assignment, index) => {
    if (assignment.status === 'no-quotes') {
      findings.push({
        kind: 'no-quotes',
        severity: 'high',
        message: `No quotes available for ${assignment.specificationName}`,
        bomItemIds: [assignment.bomItemId]
      });
      return;
    }

    const comparisons = items[index]?.comparisons ?? [];
    if (comparisons.length > 0 && comparisons.every(quote => !quote.compliant)) {
      findings.push({
        kind: 'no-compliant-quotes',
        severity: 'medium',
        message: `None of the ${comparisons.length} quotes for ${assignment.specificationName} meet the required attributes`,
        bomItemIds: [assignment.bomItemId]
      });
    }
  });

  return findings;
}

function concentrationFindings({ scenario, config }: RiskContext): RiskFinding[] {
  if (scenario.totalCost <= 0) {
    return [];
  }

  type VendorSpend = { name: string; cost: number; bomItemIds: number[] };
  const spend = new Map<number, VendorSpend>();
  for (const assignment of scenario.perItemAssignment) {
    if (assignment.vendorId === undefined) {
      continue;
    }
    const entry: VendorSpend = spend.get(assignment.vendorId) ?? {
      name: assignment.vendorName ?? `Vendor ${assignment.vendorId}`,
      cost: 0,
      bomItemIds: []
    };
    entry.cost += assignment.lineCost ?? 0;
    entry.bomItemIds.push(assignment.bomItemId);
    spend.set(assignment.vendorId, entry);
  }

  const findings: RiskFinding[] = [];
  for (const vendorId of [...spend.keys()].sort((a, b) => a - b)) {
    const entry = spend.get(vendorId);
    if (!entry) {
      continue;
    }
    const share = entry.cost / scenario.totalCost;
    if (share > config.concentrationThreshold) {
      findings.push({
        kind: 'vendor-concentration',
        severity: share > 0.8 ? 'high' : 'medium',
        message: `${entry.name} carries ${percent(share)} of the total cost`,
        bomItemIds: entry.bomItemIds,
        vendorId
      });
    }
  }

  return findings;
}

function budgetFindings({ project, scenario }: RiskContext): RiskFinding[] {
  if (project.budget <= 0 || scenario.totalCost <= project.budget) {
    return [];
  }

  const overrun = (scenario.totalCost - project.budget) / project.budget;
  const severity: RiskSeverity = overrun > 0.2 ? 'high' : overrun > 0.1 ? 'medium' : 'low';

  return [{
    kind: 'budget-overrun',
    severity,
    message: `Total cost ${scenario.totalCost.toFixed(2)} exceeds the budget of ${project.budget.toFixed(2)} by ${percent(overrun)}`,
    bomItemIds: []
  }];
}

function singleSourceFindings({ items }: RiskContext): RiskFinding[] {
  return items
    .filter(item => new Set(item.comparisons.map(quote => quote.vendorId)).size === 1)
    .map((item): RiskFinding => ({
      kind: 'single-source',
      severity: 'low',
      message: `${item.bomItem.specification.name} is quoted by ${item.comparisons[0].vendorName} only`,
      bomItemIds: [item.bomItem.id],
      vendorId: item.comparisons[0].vendorId
    }));
}

function caveatFindings(scenario: ScenarioResult): RiskFinding[] {
  const findings: RiskFinding[] = [];

  for (const caveat of scenario.caveats) {
    const bomItemIds = caveat.bomItemId !== undefined ? [caveat.bomItemId] : [];
    const base = { message: caveat.message, bomItemIds, vendorId: caveat.vendorId, quoteId: caveat.quoteId };

    switch (caveat.kind) {
      case 'unconvertible':
        findings.push({ ...base, kind: 'unconvertible-quote', severity: 'low' });
        break;
      case 'degraded-selection':
        findings.push({ ...base, kind: 'degraded-selection', severity: 'medium' });
        break;
      case 'constraint-unsatisfiable':
        findings.push({ ...base, kind: 'constraint-unsatisfiable', severity: 'medium' });
        break;
      case 'below-minimum-order':
        findings.push({ ...base, kind: 'below-minimum-order', severity: 'low' });
        break;
      case 'infeasible':
        // reported as no-quotes
        break;
    }
  }

  return findings;
}

/**
 * Overall level plus one mitigation per finding kind, most severe first
 */
export function summarizeRisk(findings: RiskFinding[]): RiskSummary {
  const counts: Record<RiskSeverity, number> = { low: 0, medium: 0, high: 0 };
  const worstByKind = new Map<RiskKind, RiskSeverity>();

  for (const finding of findings) {
    counts[finding.severity] += 1;
    const current = worstByKind.get(finding.kind);
    if (!current || SEVERITY_RANK[finding.severity] > SEVERITY_RANK[current]) {
      worstByKind.set(finding.kind, finding.severity);
    }
  }

  const overallRisk: RiskSeverity = counts.high > 0 ? 'high' : counts.medium > 0 ? 'medium' : 'low';

  const mitigationActions: MitigationAction[] = [...worstByKind.entries()]
    .map(([kind, priority]) => ({ priority, kind, action: MITIGATIONS[kind] }))
    .sort((a, b) => SEVERITY_RANK[b.priority] - SEVERITY_RANK[a.priority]);

  return { overallRisk, counts, mitigationActions };
}

/**
 * Item-level risk from quote availability, compliance and freshness
 */
export function assessItemRisk(comparisons: QuoteComparison[]): ItemRiskLevel {
  let score = 0;

  if (comparisons.length === 0) {
    score += 3;
  } else if (comparisons.length === 1) {
    score += 2;
  }

  if (comparisons.length > 0 && comparisons.every(quote => !quote.compliant)) {
    score += 2;
  }

  if (comparisons.length > 0) {
    const staleCount = comparisons.filter(quote => quote.stale).length;
    if (staleCount === comparisons.length) {
      score += 2;
    } else if (staleCount > comparisons.length / 2) {
      score += 1;
    }
  }

  if (score >= 5) {return 'critical';}
  if (score >= 3) {return 'high';}
  if (score >= 1) {return 'medium';}
  return 'low';
}
