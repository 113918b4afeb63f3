import { analyzeVendorConsolidation, calculateQuoteFreshness } from '../consolidation';
import { AS_OF, daysFrom, makeComparison, makeItem } from '../../__tests__/test-helpers';

describe('analyzeVendorConsolidation', () => {
  const items = [
    makeItem(1, 1, [
      makeComparison({ quoteId: 1, vendorId: 1, price: 10 }),
      makeComparison({ quoteId: 2, vendorId: 2, price: 8 })
    ]),
    makeItem(2, 2, [
      makeComparison({ quoteId: 3, vendorId: 1, price: 15 }),
      makeComparison({ quoteId: 4, vendorId: 2, price: 4, expired: true }),
      makeComparison({ quoteId: 5, vendorId: 3, price: 10 })
    ])
  ];

  it('should order vendors by coverage then by cost', () => {
    const report = analyzeVendorConsolidation(7, items);

    expect(report.projectId).toBe(7);
    expect(report.totalBomItems).toBe(2);
    expect(report.vendors.map(v => v.vendorId)).toEqual([1, 2, 3]);
  });

  it('should total the cost of buying every covered item from the vendor', () => {
    const [broad, narrow, third] = analyzeVendorConsolidation(7, items).vendors;

    expect(broad).toEqual({
      vendorId: 1,
      vendorName: 'Vendor 1',
      rating: null,
      bomItemIds: [1, 2],
      specificationsCount: 2,
      totalQuantity: 3,
      totalCostIfUsed: 40,
      averagePriceRank: 2,
      shippingAdvantage: true
    });
    expect(narrow).toMatchObject({ bomItemIds: [1], totalCostIfUsed: 8, averagePriceRank: 1, shippingAdvantage: false });
    expect(third).toMatchObject({ bomItemIds: [2], totalCostIfUsed: 20, averagePriceRank: 1 });
  });

  it('should attach known ratings', () => {
    const rating = { vendorId: 3, totalRatings: 1, overallAvg: 5 };

    const report = analyzeVendorConsolidation(7, items, new Map([[3, rating]]));

    expect(report.vendors[2].rating).toBe(rating);
  });
});

describe('calculateQuoteFreshness', () => {
  it('should count each quote once and truncate the average age', () => {
    const fresh = makeComparison({ quoteId: 1, vendorId: 1, quoteDate: daysFrom(AS_OF, -10) });
    const stale = makeComparison({ quoteId: 2, vendorId: 2, quoteDate: daysFrom(AS_OF, -45), stale: true });
    const expired = makeComparison({
      quoteId: 3,
      vendorId: 3,
      quoteDate: daysFrom(AS_OF, -100.5),
      stale: true,
      expired: true
    });

    const stats = calculateQuoteFreshness(
      [makeItem(1, 1, [fresh, stale]), makeItem(2, 1, [fresh, expired])],
      AS_OF
    );

    expect(stats).toEqual({
      totalQuotes: 3,
      freshQuotes: 1,
      staleQuotes: 1,
      expiredQuotes: 1,
      averageAgeDays: 51
    });
  });

  it('should report zeros without quotes', () => {
    expect(calculateQuoteFreshness([makeItem(1, 1, [])], AS_OF).averageAgeDays).toBe(0);
  });
});
