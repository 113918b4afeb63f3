/**
 * Vendor consolidation analysis and quote freshness statistics
 */

import {
  ConsolidationReport,
  QuoteComparison,
  QuoteFreshnessStats,
  VendorConsolidation,
  VendorRatingSummary
} from '../types/core';
import { EvaluationItem } from '../scenarios/evaluator';
import { MS_PER_DAY } from '../utils/dates';

interface VendorCoverage {
  vendorName: string;
  // bomItemId -> best converted unit price
  bestPrices: Map<number, number>;
}

function usable(quote: QuoteComparison): quote is QuoteComparison & { convertedPrice: number } {
  return !quote.expired && quote.convertedPrice !== null;
}

/**
 * 1-based position of the price among every usable price for the item
 */
function priceRank(price: number, itemQuotes: QuoteComparison[]): number {
  return 1 + itemQuotes.filter(quote => usable(quote) && quote.convertedPrice < price).length;
}

export function analyzeVendorConsolidation(
  projectId: number,
  items: EvaluationItem[],
  ratings: Map<number, VendorRatingSummary> = new Map()
): ConsolidationReport {
  const coverage = new Map<number, VendorCoverage>();

  for (const { bomItem, comparisons } of items) {
    for (const quote of comparisons.filter(usable)) {
      const entry: VendorCoverage = coverage.get(quote.vendorId) ?? {
        vendorName: quote.vendorName,
        bestPrices: new Map()
      };
      const current = entry.bestPrices.get(bomItem.id);
      if (current === undefined || quote.convertedPrice < current) {
        entry.bestPrices.set(bomItem.id, quote.convertedPrice);
      }
      coverage.set(quote.vendorId, entry);
    }
  }

  const vendors: VendorConsolidation[] = [];
  for (const [vendorId, entry] of coverage) {
    const covered = items.filter(item => entry.bestPrices.has(item.bomItem.id));
    let totalCostIfUsed = 0;
    let rankSum = 0;

    for (const item of covered) {
      const price = entry.bestPrices.get(item.bomItem.id) ?? 0;
      totalCostIfUsed += price * item.bomItem.quantity;
      rankSum += priceRank(price, item.comparisons);
    }

    vendors.push({
      vendorId,
      vendorName: entry.vendorName,
      rating: ratings.get(vendorId) ?? null,
      bomItemIds: covered.map(item => item.bomItem.id),
      specificationsCount: new Set(covered.map(item => item.bomItem.specificationId)).size,
      totalQuantity: covered.reduce((sum, item) => sum + item.bomItem.quantity, 0),
      totalCostIfUsed,
      averagePriceRank: covered.length > 0 ? rankSum / covered.length : 0,
      shippingAdvantage: covered.length > items.length / 2
    });
  }

  vendors.sort((a, b) => {
    if (a.bomItemIds.length !== b.bomItemIds.length) {
      return b.bomItemIds.length - a.bomItemIds.length;
    }
    if (a.totalCostIfUsed !== b.totalCostIfUsed) {
      return a.totalCostIfUsed - b.totalCostIfUsed;
    }
    return a.vendorId - b.vendorId;
  });

  return { projectId, totalBomItems: items.length, vendors };
}

/**
 * Age and freshness of the distinct quotes behind a project
 */
export function calculateQuoteFreshness(items: EvaluationItem[], asOf: Date): QuoteFreshnessStats {
  const stats: QuoteFreshnessStats = {
    totalQuotes: 0,
    freshQuotes: 0,
    staleQuotes: 0,
    expiredQuotes: 0,
    averageAgeDays: 0
  };
  const seen = new Set<number>();
  let totalAgeDays = 0;

  for (const { comparisons } of items) {
    for (const quote of comparisons) {
      if (seen.has(quote.quoteId)) {
        continue;
      }
      seen.add(quote.quoteId);

      stats.totalQuotes++;
      totalAgeDays += Math.floor((asOf.getTime() - quote.quoteDate.getTime()) / MS_PER_DAY);

      if (quote.expired) {
        stats.expiredQuotes++;
      } else if (quote.stale) {
        stats.staleQuotes++;
      } else {
        stats.freshQuotes++;
      }
    }
  }

  if (stats.totalQuotes > 0) {
    stats.averageAgeDays = Math.trunc(totalAgeDays / stats.totalQuotes);
  }

  return stats;
}
