/**
 * Scenario Evaluator Tests
 */

import { ScenarioEvaluator, ScenarioStateMachine } from '../evaluator';
import { QuoteComparisonBuilder } from '../../comparison/builder';
import { CurrencyNormalizer } from '../../forex/normalizer';
import { VendorRatingSummary } from '../../types/core';
import {
  AS_OF,
  daysFrom,
  makeBomItem,
  makeComparison,
  makeItem,
  makeProject,
  makeQuote,
  makeScenarioInput,
  makeStrategy
} from '../../__tests__/test-helpers';

function rating(vendorId: number, overallAvg: number): VendorRatingSummary {
  return { vendorId, totalRatings: 1, overallAvg };
}

/**
 * Vendor 1 quotes both items; vendor 2 undercuts it on item 2
 */
function twoItemSnapshot() {
  return [
    makeItem(1, 1, [makeComparison({ quoteId: 11, vendorId: 1, price: 100 })]),
    makeItem(2, 1, [
      makeComparison({ quoteId: 21, vendorId: 1, price: 110 }),
      makeComparison({ quoteId: 22, vendorId: 2, price: 100 })
    ])
  ];
}

describe('ScenarioStateMachine', () => {
  it('should follow collecting, assigning, scored', () => {
    const machine = new ScenarioStateMachine();
    machine.transition('assigning');
    machine.transition('scored');

    expect(machine.current).toBe('scored');
  });

  it('should reject illegal transitions', () => {
    const machine = new ScenarioStateMachine();

    expect(() => machine.transition('scored')).toThrow(
      'Illegal scenario transition from collecting to scored'
    );
  });

  it('should not leave a terminal phase', () => {
    const machine = new ScenarioStateMachine();
    machine.transition('infeasible');

    expect(() => machine.transition('assigning')).toThrow(
      'Illegal scenario transition from infeasible to assigning'
    );
  });
});

describe('ScenarioEvaluator', () => {
  const evaluator = new ScenarioEvaluator();

  describe('evaluateAll', () => {
    it('should return the four strategies in fixed order', () => {
      const results = evaluator.evaluateAll(makeScenarioInput(twoItemSnapshot()));

      expect(results.map(result => result.name)).toEqual([
        'lowest_cost',
        'fewest_vendors',
        'balanced',
        'quality_focused'
      ]);
      expect(results.map(result => result.label)).toEqual([
        'Lowest Cost',
        'Fewest Vendors',
        'Balanced',
        'Quality Focused'
      ]);
    });
  });

  describe('lowest_cost', () => {
    it('should assign the cheapest quote per item', () => {
      const result = evaluator.evaluate('lowest_cost', makeScenarioInput(twoItemSnapshot()));

      expect(result.phase).toBe('scored');
      expect(result.totalCost).toBe(200);
      expect(result.vendorCount).toBe(2);
      expect(result.perItemAssignment.map(a => a.quoteId)).toEqual([11, 22]);
      expect(result.vendorAssignments).toEqual({ 1: [1], 2: [2] });
      expect(result.caveats).toEqual([]);
    });

    it('should multiply unit prices by quantity', () => {
      const items = [makeItem(1, 4, [makeComparison({ quoteId: 1, vendorId: 1, price: 12.5 })])];

      const result = evaluator.evaluate('lowest_cost', makeScenarioInput(items));

      expect(result.perItemAssignment[0]).toMatchObject({
        status: 'assigned',
        unitPrice: 12.5,
        lineCost: 50
      });
      expect(result.totalCost).toBe(50);
    });

    it('should remove excluded vendors from the quote universe', () => {
      const input = makeScenarioInput(twoItemSnapshot(), {
        strategy: makeStrategy({ excludedVendorIds: [2] })
      });

      const result = evaluator.evaluate('lowest_cost', input);

      expect(result.totalCost).toBe(210);
      expect(result.vendorCount).toBe(1);
    });
  });

  describe('fewest_vendors', () => {
    it('should consolidate onto the vendor covering every item', () => {
      const result = evaluator.evaluate('fewest_vendors', makeScenarioInput(twoItemSnapshot()));

      expect(result.totalCost).toBe(210);
      expect(result.vendorCount).toBe(1);
      expect(result.vendorAssignments).toEqual({ 1: [1, 2] });
    });

    it('should fall back to the lowest-cost vendors when the greedy cover needs more', () => {
      // Greedy takes vendor 3 first and then still needs vendors 1 and 2
      const items = [
        makeItem(1, 1, [makeComparison({ quoteId: 1, vendorId: 1, price: 10 }), makeComparison({ quoteId: 2, vendorId: 3, price: 20 })]),
        makeItem(2, 1, [makeComparison({ quoteId: 3, vendorId: 1, price: 10 }), makeComparison({ quoteId: 4, vendorId: 3, price: 20 })]),
        makeItem(3, 1, [makeComparison({ quoteId: 5, vendorId: 1, price: 10 })]),
        makeItem(4, 1, [makeComparison({ quoteId: 6, vendorId: 2, price: 10 }), makeComparison({ quoteId: 7, vendorId: 3, price: 20 })]),
        makeItem(5, 1, [makeComparison({ quoteId: 8, vendorId: 2, price: 10 }), makeComparison({ quoteId: 9, vendorId: 3, price: 20 })]),
        makeItem(6, 1, [makeComparison({ quoteId: 10, vendorId: 2, price: 10 })])
      ];

      const result = evaluator.evaluate('fewest_vendors', makeScenarioInput(items));

      expect(result.vendorCount).toBe(2);
      expect(result.totalCost).toBe(60);
      expect(result.vendorAssignments).toEqual({ 1: [1, 2, 3], 2: [4, 5, 6] });
    });
  });

  describe('balanced', () => {
    it('should accept a small premium to drop a vendor', () => {
      const result = evaluator.evaluate('balanced', makeScenarioInput(twoItemSnapshot()));

      expect(result.totalCost).toBe(210);
      expect(result.vendorCount).toBe(1);
      expect(result.selection?.chosen).toBe('fewest_vendors');
      expect(result.selection?.scores).toHaveLength(2);
      expect(result.selection?.scores[0]).toEqual({
        candidate: 'lowest_cost',
        score: 1,
        totalCost: 200,
        vendorCount: 2
      });
      expect(result.selection?.scores[1].score).toBeCloseTo(0.83, 10);
    });

    it('should keep the lowest-cost assignment when consolidation costs too much', () => {
      const items = [
        makeItem(1, 1, [makeComparison({ quoteId: 11, vendorId: 1, price: 100 })]),
        makeItem(2, 1, [
          makeComparison({ quoteId: 21, vendorId: 1, price: 400 }),
          makeComparison({ quoteId: 22, vendorId: 2, price: 100 })
        ])
      ];

      const result = evaluator.evaluate('balanced', makeScenarioInput(items));

      // fewest_vendors scores 0.6 * 2.5 + 0.4 * 0.5 = 1.7
      expect(result.selection?.chosen).toBe('lowest_cost');
      expect(result.totalCost).toBe(200);
    });

    it('should honour configured weights', () => {
      const input = makeScenarioInput(twoItemSnapshot(), {
        config: { ...makeScenarioInput([]).config, balancedCostWeight: 1, balancedVendorWeight: 0 }
      });

      const result = evaluator.evaluate('balanced', input);

      expect(result.selection?.chosen).toBe('lowest_cost');
    });

    it('should add a constrained candidate when the strategy sets limits', () => {
      const input = makeScenarioInput(twoItemSnapshot(), {
        strategy: makeStrategy({ maxVendors: 1 })
      });

      const result = evaluator.evaluate('balanced', input);

      expect(result.selection?.scores.map(score => score.candidate)).toEqual([
        'lowest_cost',
        'fewest_vendors',
        'constrained'
      ]);
    });

    it('should discard the constrained candidate when partial fulfilment is not allowed', () => {
      const items = [
        makeItem(1, 1, [makeComparison({ quoteId: 1, vendorId: 1, price: 100 })]),
        makeItem(2, 1, [makeComparison({ quoteId: 2, vendorId: 2, price: 100 })])
      ];
      const input = makeScenarioInput(items, {
        strategy: makeStrategy({ maxVendors: 1, allowPartialFulfill: false })
      });

      const result = evaluator.evaluate('balanced', input);

      expect(result.selection?.scores).toHaveLength(2);
      expect(result.caveats).toEqual([
        {
          kind: 'constraint-unsatisfiable',
          message: 'No vendor within the procurement constraints quotes Spec 2; constrained selection discarded',
          bomItemId: 2
        }
      ]);
    });

    it('should fall back to the best quote for items outside the constraints', () => {
      // Only vendor 2 is rated high enough, and it quotes item 2 alone
      const items = [
        makeItem(1, 1, [makeComparison({ quoteId: 1, vendorId: 1, price: 100 })]),
        makeItem(2, 1, [makeComparison({ quoteId: 2, vendorId: 2, price: 50 })])
      ];
      const input = makeScenarioInput(items, {
        strategy: makeStrategy({ minVendorRating: 4 }),
        ratings: new Map([[1, rating(1, 2)], [2, rating(2, 5)]])
      });

      const result = evaluator.evaluate('balanced', input);

      const constrained = result.selection?.scores.find(score => score.candidate === 'constrained');
      expect(constrained).toEqual({ candidate: 'constrained', score: 1, totalCost: 150, vendorCount: 2 });
      // ties keep the earlier candidate
      expect(result.selection?.chosen).toBe('lowest_cost');
    });

    it('should mark fallback selections of a chosen constrained candidate as degraded', () => {
      // Vendor 4 covers everything at a premium; only vendors 2 and 3 meet the rating floor
      const items = [
        makeItem(1, 1, [
          makeComparison({ quoteId: 1, vendorId: 1, price: 100 }),
          makeComparison({ quoteId: 4, vendorId: 4, price: 150 })
        ]),
        makeItem(2, 1, [
          makeComparison({ quoteId: 2, vendorId: 2, price: 90 }),
          makeComparison({ quoteId: 3, vendorId: 3, price: 91 }),
          makeComparison({ quoteId: 5, vendorId: 4, price: 150 })
        ]),
        makeItem(3, 1, [
          makeComparison({ quoteId: 6, vendorId: 3, price: 90 }),
          makeComparison({ quoteId: 7, vendorId: 2, price: 91 }),
          makeComparison({ quoteId: 8, vendorId: 4, price: 150 })
        ])
      ];
      const input = makeScenarioInput(items, {
        strategy: makeStrategy({ maxVendors: 1, minVendorRating: 4 }),
        ratings: new Map([[1, rating(1, 1)], [2, rating(2, 5)], [3, rating(3, 5)], [4, rating(4, 1)]])
      });

      const result = evaluator.evaluate('balanced', input);

      expect(result.selection?.chosen).toBe('constrained');
      expect(result.totalCost).toBe(281);
      expect(result.perItemAssignment.map(a => [a.quoteId, a.degraded, a.relaxed])).toEqual([
        [1, true, ['constraint-unsatisfiable']],
        [2, false, []],
        [7, false, []]
      ]);
      expect(result.caveats.map(c => c.message)).toEqual([
        'Selected quote 1 for Spec 1 relaxes: constraint-unsatisfiable',
        'No vendor within the procurement constraints quotes Spec 1; using the best available quote'
      ]);
    });
  });

  describe('quality_focused', () => {
    it('should prefer the best-rated vendor over price', () => {
      const input = makeScenarioInput(twoItemSnapshot(), {
        ratings: new Map([[1, rating(1, 4.5)], [2, rating(2, 2)]])
      });

      const result = evaluator.evaluate('quality_focused', input);

      expect(result.perItemAssignment.map(a => a.quoteId)).toEqual([11, 21]);
      expect(result.totalCost).toBe(210);
    });

    it('should treat unrated vendors as the neutral rating', () => {
      const input = makeScenarioInput(twoItemSnapshot(), {
        ratings: new Map([[1, rating(1, 2.5)]])
      });

      const result = evaluator.evaluate('quality_focused', input);

      // vendor 2 is unrated and counts as 3
      expect(result.perItemAssignment[1].vendorId).toBe(2);
    });

    it('should ignore the rating minimum when no vendor meets it', () => {
      const input = makeScenarioInput(twoItemSnapshot(), {
        strategy: makeStrategy({ minVendorRating: 5 }),
        ratings: new Map([[1, rating(1, 4.5)], [2, rating(2, 2)]])
      });

      const result = evaluator.evaluate('quality_focused', input);

      expect(result.perItemAssignment.map(a => a.vendorId)).toEqual([1, 1]);
      expect(result.caveats.map(caveat => caveat.message)).toEqual([
        'Selected quote 11 for Spec 1 relaxes: constraint-unsatisfiable',
        'Selected quote 21 for Spec 2 relaxes: constraint-unsatisfiable',
        'No vendor rated 5 or higher quotes Spec 1; rating minimum ignored',
        'No vendor rated 5 or higher quotes Spec 2; rating minimum ignored'
      ]);
    });

    it('should flag selections that ignore the rating minimum as degraded', () => {
      const items = [
        makeItem(1, 1, [makeComparison({ quoteId: 1, vendorId: 1, price: 100 })]),
        makeItem(2, 1, [makeComparison({ quoteId: 2, vendorId: 2, price: 80 })])
      ];
      const input = makeScenarioInput(items, {
        strategy: makeStrategy({ minVendorRating: 5 }),
        ratings: new Map([[1, rating(1, 2)], [2, rating(2, 5)]])
      });

      const result = evaluator.evaluate('quality_focused', input);

      expect(result.perItemAssignment.map(a => [a.quoteId, a.degraded, a.relaxed])).toEqual([
        [1, true, ['constraint-unsatisfiable']],
        [2, false, []]
      ]);
    });
  });

  describe('partial failure', () => {
    it('should mark the scenario infeasible but still assign the other items', () => {
      const items = [...twoItemSnapshot(), makeItem(3, 2, [])];

      const result = evaluator.evaluate('lowest_cost', makeScenarioInput(items));

      expect(result.phase).toBe('infeasible');
      expect(result.totalCost).toBe(200);
      expect(result.perItemAssignment[2]).toEqual({
        bomItemId: 3,
        specificationId: 3,
        specificationName: 'Spec 3',
        quantity: 2,
        status: 'no-quotes',
        degraded: false,
        relaxed: []
      });
      expect(result.caveats).toEqual([
        { kind: 'infeasible', message: 'No quotes available for Spec 3', bomItemId: 3 }
      ]);
    });

    it('should leave unconvertible selections out of the total', () => {
      const items = [
        makeItem(1, 1, [
          makeComparison({ quoteId: 5, vendorId: 7, price: 900, currency: 'JPY', convertedPrice: null })
        ])
      ];

      const result = evaluator.evaluate('lowest_cost', makeScenarioInput(items));

      expect(result.totalCost).toBe(0);
      expect(result.vendorCount).toBe(1);
      expect(result.perItemAssignment[0].status).toBe('unpriced');
      expect(result.caveats).toEqual([
        {
          kind: 'unconvertible',
          message: 'Quote 5 from Vendor 7 in JPY cannot be converted to USD',
          bomItemId: 1,
          quoteId: 5,
          vendorId: 7
        },
        {
          kind: 'degraded-selection',
          message: 'Selected quote 5 for Spec 1 relaxes: no-convertible-quotes',
          bomItemId: 1,
          quoteId: 5,
          vendorId: 7
        }
      ]);
    });
  });

  describe('budget', () => {
    it('should report savings against a non-zero budget', () => {
      const input = makeScenarioInput(twoItemSnapshot(), { project: makeProject({ budget: 150 }) });

      expect(evaluator.evaluate('lowest_cost', input).savingsVsBudget).toBe(-50);
    });

    it('should report a negative saving when the quantities push the total over budget', () => {
      const items = [
        makeItem(1, 2, [makeComparison({ quoteId: 1, vendorId: 1, price: 300 })]),
        makeItem(2, 1, [makeComparison({ quoteId: 2, vendorId: 2, price: 500 })])
      ];
      const input = makeScenarioInput(items, { project: makeProject({ budget: 1000 }) });

      const result = evaluator.evaluate('lowest_cost', input);

      expect(result.totalCost).toBe(1100);
      expect(result.savingsVsBudget).toBe(-100);
      expect(result.perItemAssignment.map(a => a.lineCost)).toEqual([600, 500]);
    });

    it('should report zero savings without a budget', () => {
      expect(evaluator.evaluate('lowest_cost', makeScenarioInput(twoItemSnapshot())).savingsVsBudget).toBe(0);
    });
  });

  describe('minimum order quantity', () => {
    it('should flag a selected quote whose minimum exceeds the needed quantity', () => {
      const items = [
        makeItem(1, 5, [makeComparison({ quoteId: 1, vendorId: 1, price: 10, minQuantity: 20 })]),
        makeItem(2, 20, [makeComparison({ quoteId: 2, vendorId: 1, price: 10, minQuantity: 20 })])
      ];

      const result = evaluator.evaluate('lowest_cost', makeScenarioInput(items));

      expect(result.totalCost).toBe(250);
      expect(result.caveats).toEqual([
        {
          kind: 'below-minimum-order',
          message: 'Selected quote 1 for Spec 1 requires at least 20 units; 5 needed',
          bomItemId: 1,
          quoteId: 1,
          vendorId: 1
        }
      ]);
    });
  });

  describe('with built comparisons', () => {
    it('should select an item\'s only quote when it has expired, marked degraded', () => {
      const builder = new QuoteComparisonBuilder(new CurrencyNormalizer());
      const bomItem = makeBomItem(1, 3);
      const expired = makeQuote({ id: 1, vendorId: 1, price: 40, validUntil: daysFrom(AS_OF, -3) });
      const comparisons = builder.compareQuotes([expired], bomItem.specification, { asOf: AS_OF });

      const result = evaluator.evaluate('lowest_cost', makeScenarioInput([{ bomItem, comparisons }]));

      expect(result.phase).toBe('scored');
      expect(result.totalCost).toBe(120);
      expect(result.perItemAssignment[0]).toMatchObject({
        quoteId: 1,
        degraded: true,
        relaxed: ['only-expired-quotes']
      });
      expect(result.caveats).toEqual([
        {
          kind: 'degraded-selection',
          message: 'Selected quote 1 for Spec 1 relaxes: only-expired-quotes',
          bomItemId: 1,
          quoteId: 1,
          vendorId: 1
        }
      ]);
    });
  });
});
