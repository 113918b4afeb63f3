/**
 * Procurement strategy variants
 */

import { ProcurementStrategyName, VendorRatingSummary } from '../types/core';
import { InvalidStrategyError } from '../errors/procurement-errors';
import { comparePrice, QuoteComparator } from '../comparison/ranking';

export const PROCUREMENT_STRATEGIES = [
  'lowest_cost',
  'fewest_vendors',
  'balanced',
  'quality_focused'
] as const satisfies readonly ProcurementStrategyName[];

export const DEFAULT_STRATEGY: ProcurementStrategyName = 'balanced';

/**
 * Resolves a vendor's rating on the 1-5 scale
 */
export type VendorRatingLookup = (vendorId: number) => number;

export interface StrategyVariant {
  name: ProcurementStrategyName;
  label: string;
  description: string;
  tradeoffs: string;
  createComparator(ratingOf: VendorRatingLookup): QuoteComparator;
}

const priceOnly = (): QuoteComparator => comparePrice;

export const STRATEGY_VARIANTS: Record<ProcurementStrategyName, StrategyVariant> = {
  lowest_cost: {
    name: 'lowest_cost',
    label: 'Lowest Cost',
    description: 'Buy every item from the vendor with the lowest normalized price',
    tradeoffs: 'Minimizes spend but may spread the order across many vendors',
    createComparator: priceOnly
  },
  fewest_vendors: {
    name: 'fewest_vendors',
    label: 'Fewest Vendors',
    description: 'Cover the bill of materials with as few vendors as possible',
    tradeoffs: 'Simplifies ordering and shipping at a possibly higher price',
    createComparator: priceOnly
  },
  balanced: {
    name: 'balanced',
    label: 'Balanced',
    description: 'Weigh total cost against the number of vendors involved',
    tradeoffs: 'Accepts a small premium when it removes vendors from the order',
    createComparator: priceOnly
  },
  quality_focused: {
    name: 'quality_focused',
    label: 'Quality Focused',
    description: 'Prefer the best-rated vendors, then the lowest price',
    tradeoffs: 'Higher vendor ratings usually come at a higher price',
    createComparator: ratingOf => (a, b) => {
      if (a.convertible !== b.convertible) {
        return a.convertible ? -1 : 1;
      }
      const byRating = ratingOf(b.vendorId) - ratingOf(a.vendorId);
      return byRating !== 0 ? byRating : comparePrice(a, b);
    }
  }
};

export function isProcurementStrategy(value: string): value is ProcurementStrategyName {
  return PROCUREMENT_STRATEGIES.some(name => name === value);
}

/**
 * Validate a strategy name before any computation runs
 */
export function parseStrategy(value: string): ProcurementStrategyName {
  const name = value.trim();
  if (!isProcurementStrategy(name)) {
    throw new InvalidStrategyError(value, PROCUREMENT_STRATEGIES);
  }
  return name;
}

export function createRatingLookup(
  ratings: Map<number, VendorRatingSummary>,
  neutralRating: number
): VendorRatingLookup {
  return vendorId => ratings.get(vendorId)?.overallAvg ?? neutralRating;
}
