/**
 * Quote ranking and best-quote selection
 */

import { BestQuoteSelection, QuoteComparison, RelaxedConstraint } from '../types/core';

export type QuoteComparator = (a: QuoteComparison, b: QuoteComparison) => number;

/**
 * Convertible first, then converted price, oldest quote, quote id
 */
export const comparePrice: QuoteComparator = (a, b) => {
  if (a.convertedPrice === null || b.convertedPrice === null) {
    if (a.convertedPrice !== b.convertedPrice) {
      return a.convertedPrice === null ? 1 : -1;
    }
  } else if (a.convertedPrice !== b.convertedPrice) {
    return a.convertedPrice - b.convertedPrice;
  }

  const byDate = a.quoteDate.getTime() - b.quoteDate.getTime();
  if (byDate !== 0) {
    return byDate;
  }

  return a.quoteId - b.quoteId;
};

export function relaxedConstraints(comparison: QuoteComparison): RelaxedConstraint[] {
  const relaxed: RelaxedConstraint[] = [];
  if (!comparison.compliant) {relaxed.push('no-compliant-quote');}
  if (comparison.expired) {relaxed.push('only-expired-quotes');}
  if (!comparison.convertible) {relaxed.push('no-convertible-quotes');}
  return relaxed;
}

export function isFullyEligible(comparison: QuoteComparison): boolean {
  return relaxedConstraints(comparison).length === 0;
}

function qualificationRank(comparison: QuoteComparison): number {
  const otherSatisfied = (comparison.compliant ? 1 : 0) + (comparison.convertible ? 1 : 0);
  return (comparison.expired ? 0 : 10) + otherSatisfied * 2 + (comparison.convertible ? 1 : 0);
}

/**
 * Quotes with the best qualification: unexpired first, then most of the other
 * constraints satisfied, convertible preferred among equals. Every strategy
 * picks from this tier.
 */
export function selectTier(comparisons: QuoteComparison[]): QuoteComparison[] {
  if (comparisons.length === 0) {
    return [];
  }

  const best = Math.max(...comparisons.map(qualificationRank));
  return comparisons.filter(comparison => qualificationRank(comparison) === best);
}

/**
 * Pick the best quote under a comparator, relaxing constraints only when no
 * quote satisfies all of them
 */
export function selectBestQuote(
  comparisons: QuoteComparison[],
  comparator: QuoteComparator = comparePrice
): BestQuoteSelection | null {
  const tier = selectTier(comparisons);
  if (tier.length === 0) {
    return null;
  }

  const [chosen] = [...tier].sort(comparator);
  return toSelection(chosen);
}

export function toSelection(
  comparison: QuoteComparison,
  extra: RelaxedConstraint[] = []
): BestQuoteSelection {
  const relaxed = [...relaxedConstraints(comparison), ...extra];
  return {
    comparison,
    degraded: relaxed.length > 0,
    relaxed,
    reason: relaxed.length > 0 ? relaxed.join(', ') : undefined
  };
}
