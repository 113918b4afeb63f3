/**
 * Savings report
 * Compares the lowest-cost scenario with a first-quote-received baseline
 */

import { EngineConfig, SavingsLine, SavingsReport, ScenarioResult } from '../types/core';
import { EvaluationItem } from '../scenarios/evaluator';

export function calculateSavings(
  projectId: number,
  items: EvaluationItem[],
  lowestCost: ScenarioResult,
  config: Pick<EngineConfig, 'adminCostPerVendor'>
): SavingsReport {
  const assignments = new Map(lowestCost.perItemAssignment.map(a => [a.bomItemId, a]));
  const suppliers = new Set<number>();
  let baselineTotal = 0;

  const lines: SavingsLine[] = items.map(({ bomItem, comparisons }) => {
    // listing order, not price order
    const baseline = comparisons.find(quote => quote.convertedPrice !== null);
    const baselineUnitPrice = baseline?.convertedPrice ?? null;
    const bestUnitPrice = assignments.get(bomItem.id)?.unitPrice ?? null;

    for (const quote of comparisons) {
      if (quote.convertible) {
        suppliers.add(quote.vendorId);
      }
    }

    if (baselineUnitPrice !== null) {
      baselineTotal += baselineUnitPrice * bomItem.quantity;
    }

    return {
      bomItemId: bomItem.id,
      specificationName: bomItem.specification.name,
      quantity: bomItem.quantity,
      baselineUnitPrice,
      bestUnitPrice,
      savings: baselineUnitPrice !== null && bestUnitPrice !== null
        ? (baselineUnitPrice - bestUnitPrice) * bomItem.quantity
        : 0
    };
  });

  const bestTotal = lowestCost.totalCost;
  const savings = baselineTotal - bestTotal;
  const vendorsAvoided = Math.max(0, suppliers.size - lowestCost.vendorCount);

  return {
    projectId,
    bestTotal,
    baselineTotal,
    savings,
    savingsPercent: baselineTotal > 0 ? (savings / baselineTotal) * 100 : 0,
    consolidationSavings: vendorsAvoided * config.adminCostPerVendor,
    lines
  };
}
