/**
 * Vendor Recommendations
 * Groups a scenario's assignments by vendor and explains each pick
 */

import { ScenarioResult, VendorRatingSummary, VendorRecommendation } from '../types/core';

type VendorTotals = Omit<VendorRecommendation, 'rationale' | 'priority'>;

function itemPhrase(count: number): string {
  return `${count} item${count === 1 ? '' : 's'}`;
}

function rationaleFor(
  scenario: ScenarioResult,
  itemCount: number,
  rating: VendorRatingSummary | undefined
): string {
  const items = itemPhrase(itemCount);

  switch (scenario.name) {
    case 'lowest_cost':
      return `Lowest total cost across ${items}`;
    case 'fewest_vendors':
      return `Consolidates ${items} to reduce vendor count`;
    case 'balanced':
      switch (scenario.selection?.chosen) {
        case 'fewest_vendors':
          return `Balanced: consolidates ${items} at an acceptable cost premium`;
        case 'constrained':
          return `Balanced: covers ${items} within the vendor constraints`;
        default:
          return `Balanced: lowest cost across ${items}`;
      }
    case 'quality_focused': {
      const score = rating?.overallAvg !== undefined ? `${rating.overallAvg.toFixed(1)}/5.0` : 'unrated';
      return `Highest-rated option for ${items} (rating: ${score})`;
    }
  }
}

/**
 * One recommendation per vendor, largest spend first
 */
export function generateVendorRecommendations(
  scenario: ScenarioResult,
  ratings: Map<number, VendorRatingSummary> = new Map()
): VendorRecommendation[] {
  const byVendor = new Map<number, VendorTotals>();

  for (const assignment of scenario.perItemAssignment) {
    if (assignment.vendorId === undefined) {
      continue;
    }

    const entry: VendorTotals = byVendor.get(assignment.vendorId) ?? {
      vendorId: assignment.vendorId,
      vendorName: assignment.vendorName ?? `Vendor ${assignment.vendorId}`,
      bomItemIds: [],
      totalCost: 0,
      itemCount: 0,
      degradedItemCount: 0
    };

    entry.bomItemIds.push(assignment.bomItemId);
    entry.totalCost += assignment.lineCost ?? 0;
    entry.itemCount += 1;
    if (assignment.degraded) {
      entry.degradedItemCount += 1;
    }
    byVendor.set(assignment.vendorId, entry);
  }

  return [...byVendor.values()]
    .sort((a, b) => (b.totalCost !== a.totalCost ? b.totalCost - a.totalCost : a.vendorId - b.vendorId))
    .map((entry, index) => ({
      ...entry,
      rationale: rationaleFor(scenario, entry.itemCount, ratings.get(entry.vendorId)),
      priority: index + 1
    }));
}
