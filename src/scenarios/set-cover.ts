/**
 * Greedy vendor cover
 * Picks vendors until every coverable item has a qualifying quote from one of them
 */

import { QuoteComparison } from '../types/core';
import { comparePrice } from '../comparison/ranking';

export interface CoverItem {
  bomItemId: number;
  quantity: number;
  tier: QuoteComparison[];
}

export interface CoverOptions {
  preferredVendorIds?: number[];
  allowedVendorIds?: Set<number>;
  maxVendors?: number;
}

export interface CoverResult {
  vendorIds: number[];
  uncoveredItemIds: number[];
}

interface VendorGain {
  vendorId: number;
  itemIds: number[];
  cost: number;
}

/**
 * Cheapest tier quote from one of the given vendors
 */
export function cheapestFrom(
  tier: QuoteComparison[],
  vendorIds: Set<number>
): QuoteComparison | undefined {
  const [best] = tier.filter(quote => vendorIds.has(quote.vendorId)).sort(comparePrice);
  return best;
}

function compareGains(a: VendorGain, b: VendorGain, preferred: Set<number>): number {
  if (a.itemIds.length !== b.itemIds.length) {
    return b.itemIds.length - a.itemIds.length;
  }
  if (a.cost !== b.cost) {
    return a.cost - b.cost;
  }
  const aPreferred = preferred.has(a.vendorId);
  if (aPreferred !== preferred.has(b.vendorId)) {
    return aPreferred ? -1 : 1;
  }
  return a.vendorId - b.vendorId;
}

export function greedyVendorCover(items: CoverItem[], options: CoverOptions = {}): CoverResult {
  const preferred = new Set(options.preferredVendorIds ?? []);
  const maxVendors = options.maxVendors ?? Number.POSITIVE_INFINITY;

  const candidates = new Set<number>();
  for (const item of items) {
    for (const quote of item.tier) {
      if (!options.allowedVendorIds || options.allowedVendorIds.has(quote.vendorId)) {
        candidates.add(quote.vendorId);
      }
    }
  }

  const chosen: number[] = [];
  let uncovered = items.filter(item => item.tier.length > 0);

  while (uncovered.length > 0 && chosen.length < maxVendors) {
    let best: VendorGain | undefined;

    for (const vendorId of candidates) {
      const gain = gainFor(vendorId, uncovered);
      if (gain.itemIds.length === 0) {
        continue;
      }
      if (!best || compareGains(gain, best, preferred) < 0) {
        best = gain;
      }
    }

    if (!best) {
      break;
    }

    chosen.push(best.vendorId);
    candidates.delete(best.vendorId);
    const covered = new Set(best.itemIds);
    uncovered = uncovered.filter(item => !covered.has(item.bomItemId));
  }

  const coveredByChosen = new Set(chosen);
  return {
    vendorIds: chosen,
    uncoveredItemIds: items
      .filter(item => !cheapestFrom(item.tier, coveredByChosen))
      .map(item => item.bomItemId)
  };
}

function gainFor(vendorId: number, uncovered: CoverItem[]): VendorGain {
  const vendorSet = new Set([vendorId]);
  const itemIds: number[] = [];
  let cost = 0;

  for (const item of uncovered) {
    const quote = cheapestFrom(item.tier, vendorSet);
    if (quote) {
      itemIds.push(item.bomItemId);
      cost += (quote.convertedPrice ?? 0) * item.quantity;
    }
  }

  return { vendorId, itemIds, cost };
}
