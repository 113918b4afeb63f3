/**
 * Savings Report Tests
 */

import { calculateSavings } from '../savings';
import { EvaluationItem, ScenarioEvaluator } from '../../scenarios/evaluator';
import { DEFAULT_ENGINE_CONFIG } from '../../config/defaults';
import { makeComparison, makeItem, makeScenarioInput } from '../../__tests__/test-helpers';

describe('calculateSavings', () => {
  const evaluator = new ScenarioEvaluator();

  function report(items: EvaluationItem[]) {
    const lowestCost = evaluator.evaluate('lowest_cost', makeScenarioInput(items));
    return calculateSavings(1, items, lowestCost, DEFAULT_ENGINE_CONFIG);
  }

  function baseItems(): EvaluationItem[] {
    return [
      makeItem(1, 2, [
        makeComparison({ quoteId: 1, vendorId: 1, price: 120 }),
        makeComparison({ quoteId: 2, vendorId: 2, price: 100 })
      ]),
      makeItem(2, 1, [
        makeComparison({ quoteId: 3, vendorId: 3, price: 80, convertedPrice: null }),
        makeComparison({ quoteId: 4, vendorId: 1, price: 50 })
      ])
    ];
  }

  it('should measure savings against the first convertible quote of each item', () => {
    const savings = report(baseItems());

    expect(savings.bestTotal).toBe(250);
    expect(savings.baselineTotal).toBe(290);
    expect(savings.savings).toBe(40);
    expect(savings.savingsPercent).toBeCloseTo(13.79, 2);
    expect(savings.lines).toEqual([
      {
        bomItemId: 1,
        specificationName: 'Spec 1',
        quantity: 2,
        baselineUnitPrice: 120,
        bestUnitPrice: 100,
        savings: 40
      },
      {
        bomItemId: 2,
        specificationName: 'Spec 2',
        quantity: 1,
        baselineUnitPrice: 50,
        bestUnitPrice: 50,
        savings: 0
      }
    ]);
  });

  it('should not count unconvertible suppliers toward consolidation savings', () => {
    expect(report(baseItems()).consolidationSavings).toBe(0);
  });

  it('should credit the admin cost of every supplier the selection avoids', () => {
    const items = baseItems();
    items[0].comparisons.push(makeComparison({ quoteId: 5, vendorId: 4, price: 130 }));

    expect(report(items).consolidationSavings).toBe(250);
  });

  it('should report zero percent without a baseline', () => {
    const items = [makeItem(1, 1, [makeComparison({ quoteId: 1, vendorId: 1, convertedPrice: null })])];

    const savings = report(items);

    expect(savings.baselineTotal).toBe(0);
    expect(savings.savingsPercent).toBe(0);
    expect(savings.lines[0]).toMatchObject({ baselineUnitPrice: null, bestUnitPrice: null, savings: 0 });
  });
});
