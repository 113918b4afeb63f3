/**
 * Scenario Evaluator
 * Runs each procurement strategy over a project snapshot and scores the result
 */

import {
  BalancedSelection,
  BestQuoteSelection,
  BillOfMaterialsItem,
  Caveat,
  EngineConfig,
  ItemAssignment,
  ProcurementStrategyName,
  Project,
  ProjectProcurementStrategy,
  QuoteComparison,
  RelaxedConstraint,
  ScenarioPhase,
  ScenarioResult,
  VendorRatingSummary
} from '../types/core';
import { selectBestQuote, selectTier, toSelection } from '../comparison/ranking';
import { logger } from '../utils/logger';
import {
  createRatingLookup,
  PROCUREMENT_STRATEGIES,
  STRATEGY_VARIANTS,
  VendorRatingLookup
} from './strategies';
import { cheapestFrom, CoverItem, greedyVendorCover } from './set-cover';

export interface EvaluationItem {
  bomItem: BillOfMaterialsItem;
  comparisons: QuoteComparison[];
}

export interface ScenarioInput {
  project: Project;
  strategy: ProjectProcurementStrategy;
  items: EvaluationItem[];
  ratings: Map<number, VendorRatingSummary>;
  config: EngineConfig;
}

const TRANSITIONS: Record<ScenarioPhase, ScenarioPhase[]> = {
  collecting: ['assigning', 'infeasible'],
  assigning: ['scored', 'infeasible'],
  scored: [],
  infeasible: []
};

/**
 * Lifecycle of a single scenario evaluation
 */
export class ScenarioStateMachine {
  private phase: ScenarioPhase = 'collecting';

  get current(): ScenarioPhase {
    return this.phase;
  }

  transition(next: ScenarioPhase): void {
    if (!TRANSITIONS[this.phase].includes(next)) {
      throw new Error(`Illegal scenario transition from ${this.phase} to ${next}`);
    }
    this.phase = next;
  }
}

interface PreparedItem {
  bomItem: BillOfMaterialsItem;
  comparisons: QuoteComparison[];
  tier: QuoteComparison[];
}

type Selections = Array<BestQuoteSelection | null>;

interface Candidate {
  name: string;
  selections: Selections;
  caveats: Caveat[];
}

interface StrategyOutcome {
  selections: Selections;
  caveats: Caveat[];
  selection?: BalancedSelection;
}

export class ScenarioEvaluator {
  /**
   * Evaluate every strategy in the fixed presentation order
   */
  evaluateAll(input: ScenarioInput): ScenarioResult[] {
    return PROCUREMENT_STRATEGIES.map(name => this.evaluate(name, input));
  }

  evaluate(name: ProcurementStrategyName, input: ScenarioInput): ScenarioResult {
    const machine = new ScenarioStateMachine();
    const items = this.prepare(input);

    machine.transition('assigning');
    const outcome = this.assign(name, items, input);

    const assignments = items.map((item, index) =>
      this.toAssignment(item, outcome.selections[index])
    );
    const caveats = [...this.itemCaveats(items, assignments, input), ...outcome.caveats];
    const { totalCost, vendorCount } = this.totals(assignments);

    const vendorAssignments: Record<number, number[]> = {};
    for (const assignment of assignments) {
      if (assignment.vendorId !== undefined) {
        (vendorAssignments[assignment.vendorId] ??= []).push(assignment.bomItemId);
      }
    }

    const phase: 'scored' | 'infeasible' = assignments.some(a => a.status === 'no-quotes')
      ? 'infeasible'
      : 'scored';
    machine.transition(phase);

    for (const assignment of assignments) {
      if (assignment.degraded && assignment.quoteId !== undefined) {
        logger.degradedSelection(
          input.project.id,
          assignment.bomItemId,
          assignment.quoteId,
          assignment.relaxed.join(', ')
        );
      }
    }
    logger.scenarioScored(input.project.id, name, totalCost, vendorCount, phase);

    const variant = STRATEGY_VARIANTS[name];
    return {
      name,
      label: variant.label,
      description: variant.description,
      tradeoffs: variant.tradeoffs,
      phase,
      totalCost,
      vendorCount,
      savingsVsBudget: input.project.budget > 0 ? input.project.budget - totalCost : 0,
      perItemAssignment: assignments,
      vendorAssignments,
      caveats,
      selection: outcome.selection
    };
  }

  private prepare(input: ScenarioInput): PreparedItem[] {
    const excluded = new Set(input.strategy.excludedVendorIds);
    return input.items.map(({ bomItem, comparisons }) => {
      const eligible = comparisons.filter(quote => !excluded.has(quote.vendorId));
      return { bomItem, comparisons: eligible, tier: selectTier(eligible) };
    });
  }

  private assign(
    name: ProcurementStrategyName,
    items: PreparedItem[],
    input: ScenarioInput
  ): StrategyOutcome {
    const ratingOf = createRatingLookup(input.ratings, input.config.neutralRating);

    switch (name) {
      case 'lowest_cost':
        return { selections: this.lowestCost(items, ratingOf), caveats: [] };
      case 'fewest_vendors':
        return { selections: this.fewestVendors(items, input, ratingOf), caveats: [] };
      case 'balanced':
        return this.balanced(items, input, ratingOf);
      case 'quality_focused':
        return this.qualityFocused(items, input, ratingOf);
    }
  }

  private lowestCost(items: PreparedItem[], ratingOf: VendorRatingLookup): Selections {
    const comparator = STRATEGY_VARIANTS.lowest_cost.createComparator(ratingOf);
    return items.map(item => selectBestQuote(item.comparisons, comparator));
  }

  private fewestVendors(
    items: PreparedItem[],
    input: ScenarioInput,
    ratingOf: VendorRatingLookup
  ): Selections {
    const lowestVendors = vendorsOf(this.lowestCost(items, ratingOf));
    const cover = greedyVendorCover(toCoverItems(items), {
      preferredVendorIds: input.strategy.preferredVendorIds
    });

    // Never use more vendors than the cheapest assignment already needs
    const vendorIds = cover.vendorIds.length > lowestVendors.size
      ? lowestVendors
      : new Set(cover.vendorIds);

    return items.map(item => {
      const quote = cheapestFrom(item.tier, vendorIds);
      return quote ? toSelection(quote) : null;
    });
  }

  private balanced(
    items: PreparedItem[],
    input: ScenarioInput,
    ratingOf: VendorRatingLookup
  ): StrategyOutcome {
    const { strategy, config } = input;
    const candidates: Candidate[] = [
      { name: 'lowest_cost', selections: this.lowestCost(items, ratingOf), caveats: [] },
      { name: 'fewest_vendors', selections: this.fewestVendors(items, input, ratingOf), caveats: [] }
    ];
    const caveats: Caveat[] = [];

    if (strategy.maxVendors !== undefined || strategy.minVendorRating !== undefined) {
      const constrained = this.constrained(items, input, ratingOf);
      if ('discarded' in constrained) {
        caveats.push(constrained.discarded);
      } else {
        candidates.push(constrained);
      }
    }

    const baseline = this.selectionTotals(items, candidates[0].selections);
    const scores = candidates.map(candidate => {
      const totals = this.selectionTotals(items, candidate.selections);
      const score =
        config.balancedCostWeight * normalize(totals.totalCost, baseline.totalCost) +
        config.balancedVendorWeight * normalize(totals.vendorCount, baseline.vendorCount);
      return { candidate: candidate.name, score, ...totals };
    });

    let bestIndex = 0;
    scores.forEach((entry, index) => {
      if (entry.score < scores[bestIndex].score) {
        bestIndex = index;
      }
    });

    const chosen = candidates[bestIndex];
    return {
      selections: chosen.selections,
      caveats: [...caveats, ...chosen.caveats],
      selection: { chosen: chosen.name, scores }
    };
  }

  /**
   * Greedy cover restricted to vendors meeting the rating floor, capped at maxVendors
   */
  private constrained(
    items: PreparedItem[],
    input: ScenarioInput,
    ratingOf: VendorRatingLookup
  ): Candidate | { discarded: Caveat } {
    const { strategy } = input;
    const minRating = strategy.minVendorRating;

    const allowed = new Set<number>();
    for (const item of items) {
      for (const quote of item.tier) {
        if (minRating === undefined || ratingOf(quote.vendorId) >= minRating) {
          allowed.add(quote.vendorId);
        }
      }
    }

    const cover = greedyVendorCover(toCoverItems(items), {
      preferredVendorIds: strategy.preferredVendorIds,
      allowedVendorIds: allowed,
      maxVendors: strategy.maxVendors
    });
    const vendorIds = new Set(cover.vendorIds);

    const selections: Selections = [];
    const caveats: Caveat[] = [];

    for (const item of items) {
      if (item.tier.length === 0) {
        selections.push(null);
        continue;
      }

      const quote = cheapestFrom(item.tier, vendorIds);
      if (quote) {
        selections.push(toSelection(quote));
        continue;
      }

      const specName = item.bomItem.specification.name;
      if (!strategy.allowPartialFulfill) {
        return {
          discarded: {
            kind: 'constraint-unsatisfiable',
            message: `No vendor within the procurement constraints quotes ${specName}; constrained selection discarded`,
            bomItemId: item.bomItem.id
          }
        };
      }

      const fallback = selectBestQuote(item.comparisons);
      selections.push(fallback && toSelection(fallback.comparison, ['constraint-unsatisfiable']));
      caveats.push({
        kind: 'constraint-unsatisfiable',
        message: `No vendor within the procurement constraints quotes ${specName}; using the best available quote`,
        bomItemId: item.bomItem.id
      });
    }

    return { name: 'constrained', selections, caveats };
  }

  private qualityFocused(
    items: PreparedItem[],
    input: ScenarioInput,
    ratingOf: VendorRatingLookup
  ): StrategyOutcome {
    const comparator = STRATEGY_VARIANTS.quality_focused.createComparator(ratingOf);
    const minRating = input.strategy.minVendorRating;
    const caveats: Caveat[] = [];

    const selections = items.map(item => {
      let pool = item.tier;
      const relaxed: RelaxedConstraint[] = [];
      if (minRating !== undefined && pool.length > 0) {
        const rated = pool.filter(quote => ratingOf(quote.vendorId) >= minRating);
        if (rated.length > 0) {
          pool = rated;
        } else {
          relaxed.push('constraint-unsatisfiable');
          caveats.push({
            kind: 'constraint-unsatisfiable',
            message: `No vendor rated ${minRating} or higher quotes ${item.bomItem.specification.name}; rating minimum ignored`,
            bomItemId: item.bomItem.id
          });
        }
      }

      const [best] = [...pool].sort(comparator);
      return best ? toSelection(best, relaxed) : null;
    });

    return { selections, caveats };
  }

  private toAssignment(item: PreparedItem, selected: BestQuoteSelection | null): ItemAssignment {
    const { bomItem } = item;
    const base = {
      bomItemId: bomItem.id,
      specificationId: bomItem.specificationId,
      specificationName: bomItem.specification.name,
      quantity: bomItem.quantity
    };

    if (!selected) {
      return { ...base, status: 'no-quotes', degraded: false, relaxed: [] };
    }

    const quote = selected.comparison;
    const quoted = {
      ...base,
      quoteId: quote.quoteId,
      vendorId: quote.vendorId,
      vendorName: quote.vendorName,
      validUntil: quote.validUntil,
      degraded: selected.degraded,
      relaxed: selected.relaxed
    };

    if (quote.convertedPrice === null) {
      return { ...quoted, status: 'unpriced' };
    }

    return {
      ...quoted,
      status: 'assigned',
      unitPrice: quote.convertedPrice,
      lineCost: quote.convertedPrice * bomItem.quantity
    };
  }

  private itemCaveats(
    items: PreparedItem[],
    assignments: ItemAssignment[],
    input: ScenarioInput
  ): Caveat[] {
    const caveats: Caveat[] = [];

    items.forEach((item, index) => {
      const assignment = assignments[index];
      const specName = item.bomItem.specification.name;

      if (assignment.status === 'no-quotes') {
        caveats.push({
          kind: 'infeasible',
          message: `No quotes available for ${specName}`,
          bomItemId: item.bomItem.id
        });
      }

      for (const quote of item.comparisons) {
        if (!quote.convertible) {
          caveats.push({
            kind: 'unconvertible',
            message: `Quote ${quote.quoteId} from ${quote.vendorName} in ${quote.currency} cannot be converted to ${input.config.referenceCurrency}`,
            bomItemId: item.bomItem.id,
            quoteId: quote.quoteId,
            vendorId: quote.vendorId
          });
        }
      }

      if (assignment.degraded) {
        caveats.push({
          kind: 'degraded-selection',
          message: `Selected quote ${assignment.quoteId} for ${specName} relaxes: ${assignment.relaxed.join(', ')}`,
          bomItemId: item.bomItem.id,
          quoteId: assignment.quoteId,
          vendorId: assignment.vendorId
        });
      }

      const selected = item.comparisons.find(quote => quote.quoteId === assignment.quoteId);
      const minQuantity = selected?.minQuantity;
      if (selected && minQuantity !== undefined && item.bomItem.quantity < minQuantity) {
        caveats.push({
          kind: 'below-minimum-order',
          message: `Selected quote ${selected.quoteId} for ${specName} requires at least ${minQuantity} units; ${item.bomItem.quantity} needed`,
          bomItemId: item.bomItem.id,
          quoteId: selected.quoteId,
          vendorId: selected.vendorId
        });
      }
    });

    return caveats;
  }

  private selectionTotals(
    items: PreparedItem[],
    selections: Selections
  ): { totalCost: number; vendorCount: number } {
    return this.totals(items.map((item, index) => this.toAssignment(item, selections[index])));
  }

  private totals(assignments: ItemAssignment[]): { totalCost: number; vendorCount: number } {
    const vendors = new Set<number>();
    let totalCost = 0;
    for (const assignment of assignments) {
      totalCost += assignment.lineCost ?? 0;
      if (assignment.vendorId !== undefined) {
        vendors.add(assignment.vendorId);
      }
    }
    return { totalCost, vendorCount: vendors.size };
  }
}

function toCoverItems(items: PreparedItem[]): CoverItem[] {
  return items.map(item => ({
    bomItemId: item.bomItem.id,
    quantity: item.bomItem.quantity,
    tier: item.tier
  }));
}

function vendorsOf(selections: Selections): Set<number> {
  const vendors = new Set<number>();
  for (const selected of selections) {
    if (selected) {
      vendors.add(selected.comparison.vendorId);
    }
  }
  return vendors;
}

/**
 * Ratio against the lowest-cost baseline; a zero baseline maps 0 to 1 and v to 1 + v
 */
function normalize(value: number, baseline: number): number {
  if (baseline > 0) {
    return value / baseline;
  }
  return value === 0 ? 1 : 1 + value;
}
