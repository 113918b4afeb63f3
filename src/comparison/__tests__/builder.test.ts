/**
 * Quote Comparison Builder Tests
 */

import { QuoteComparisonBuilder } from '../builder';
import { CurrencyNormalizer } from '../../forex/normalizer';
import { ComplianceMatcher } from '../../compliance/matcher';
import { logger } from '../../utils/logger';
import {
  AS_OF,
  daysFrom,
  makeAttribute,
  makeProduct,
  makeQuote,
  makeRate,
  makeSpecification,
  makeVendor,
  numberValue
} from '../../__tests__/test-helpers';

describe('QuoteComparisonBuilder', () => {
  const specification = makeSpecification(1, [makeAttribute(10, { name: 'wattage', minValue: 100 })]);
  const compliantProduct = makeProduct(1, { attributes: [numberValue(1, 1, 10, 200)] });
  const weakProduct = makeProduct(2, { attributes: [numberValue(2, 2, 10, 50)] });
  const otherProduct = makeProduct(3, { specificationId: 2 });

  const quotes = [
    makeQuote({ id: 1, vendorId: 1, price: 100, product: compliantProduct, quoteDate: daysFrom(AS_OF, -10) }),
    makeQuote({
      id: 2,
      vendorId: 2,
      price: 80,
      currency: 'EUR',
      product: weakProduct,
      quoteDate: daysFrom(AS_OF, -20)
    }),
    makeQuote({
      id: 3,
      vendorId: 3,
      price: 90,
      currency: '',
      vendor: makeVendor(3, { currency: 'JPY' }),
      product: compliantProduct
    }),
    makeQuote({ id: 4, vendorId: 4, price: 1, product: otherProduct }),
    makeQuote({ id: 5, vendorId: 1, price: 70, product: compliantProduct, replacedById: 6 })
  ];

  let builder: QuoteComparisonBuilder;

  beforeEach(() => {
    const normalizer = new CurrencyNormalizer([makeRate(1, 'EUR', 'USD', 1.25)]);
    builder = new QuoteComparisonBuilder(normalizer, new ComplianceMatcher(), { staleQuoteDays: 90 });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('buildMatrix', () => {
    it('should compare every current quote for the specification in price order', () => {
      const matrix = builder.buildMatrix(
        { kind: 'specification', specificationId: 1 },
        specification,
        quotes,
        { asOf: AS_OF }
      );

      expect(matrix.referenceCurrency).toBe('USD');
      expect(matrix.asOf).toBe(AS_OF);
      // quote 2 converts to 100 and is older than quote 1
      expect(matrix.quotes.map(quote => quote.quoteId)).toEqual([2, 1, 3]);
    });

    it('should record conversion and compliance per quote', () => {
      const matrix = builder.buildMatrix(
        { kind: 'specification', specificationId: 1 },
        specification,
        quotes,
        { asOf: AS_OF }
      );
      const [euro, dollar, yen] = matrix.quotes;

      expect(euro).toMatchObject({
        currency: 'EUR',
        convertedPrice: 100,
        conversionRate: 1.25,
        convertible: true,
        compliant: false,
        attributeCompliance: { 10: false }
      });
      expect(dollar).toMatchObject({ convertedPrice: 100, conversionRate: 1, compliant: true });
      expect(yen).toMatchObject({
        currency: 'JPY',
        convertedPrice: null,
        conversionRate: null,
        convertible: false
      });
    });

    it('should restrict a product matrix to that product', () => {
      const matrix = builder.buildMatrix({ kind: 'product', productId: 2 }, specification, quotes, {
        asOf: AS_OF
      });

      expect(matrix.quotes.map(quote => quote.quoteId)).toEqual([2]);
    });

    it('should only attach extra attributes when asked', () => {
      const target = { kind: 'product' as const, productId: 1 };
      const without = builder.buildMatrix(target, null, quotes, { asOf: AS_OF });
      const withExtras = builder.buildMatrix(target, null, quotes, { asOf: AS_OF, includeExtras: true });

      expect(without.quotes[0].extraAttributes).toBeUndefined();
      expect(withExtras.quotes[0].extraAttributes).toEqual(compliantProduct.attributes);
    });
  });

  describe('compareQuotes', () => {
    it('should keep listing order and skip superseded quotes', () => {
      const comparisons = builder.compareQuotes(quotes, specification, { asOf: AS_OF });

      expect(comparisons.map(quote => quote.quoteId)).toEqual([1, 2, 3, 4]);
    });

    it('should log quotes that cannot be converted', () => {
      const spy = jest.spyOn(logger, 'conversionFailed');

      builder.compareQuotes([quotes[2]], specification, { asOf: AS_OF });

      expect(spy).toHaveBeenCalledWith(
        3,
        3,
        'No exchange rate from JPY to USD effective on or before 2024-06-01'
      );
    });
  });

  describe('compareQuote', () => {
    it('should mark a quote past its validity as expired and stale', () => {
      const quote = makeQuote({ id: 7, vendorId: 1, price: 10, validUntil: daysFrom(AS_OF, -1) });

      const comparison = builder.compareQuote(quote, null, { asOf: AS_OF });

      expect(comparison.expired).toBe(true);
      expect(comparison.stale).toBe(true);
      expect(comparison.daysUntilExpiry).toBe(-1);
    });

    it('should count whole days until expiry', () => {
      const quote = makeQuote({ id: 7, vendorId: 1, price: 10, validUntil: daysFrom(AS_OF, 14.5) });

      const comparison = builder.compareQuote(quote, null, { asOf: AS_OF });

      expect(comparison.expired).toBe(false);
      expect(comparison.stale).toBe(false);
      expect(comparison.daysUntilExpiry).toBe(14);
    });

    it('should mark an open-ended quote older than the stale window as stale', () => {
      const old = makeQuote({ id: 8, vendorId: 1, price: 10, quoteDate: daysFrom(AS_OF, -91) });
      const recent = makeQuote({ id: 9, vendorId: 1, price: 10, quoteDate: daysFrom(AS_OF, -90) });

      expect(builder.compareQuote(old, null, { asOf: AS_OF }).stale).toBe(true);
      expect(builder.compareQuote(recent, null, { asOf: AS_OF }).stale).toBe(false);
      expect(builder.compareQuote(old, null, { asOf: AS_OF }).daysUntilExpiry).toBeNull();
    });

    it('should carry the vendor minimum order quantity', () => {
      const bulk = makeQuote({ id: 10, vendorId: 1, price: 10, minQuantity: 25 });

      expect(builder.compareQuote(bulk, null, { asOf: AS_OF }).minQuantity).toBe(25);
      expect(builder.compareQuote(quotes[0], null, { asOf: AS_OF }).minQuantity).toBeUndefined();
    });
  });
});
