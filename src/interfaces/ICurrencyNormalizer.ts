import { ForexRate } from '../types/core';
import { UnconvertibleCurrencyError } from '../errors/procurement-errors';

export type ConversionPath = 'identity' | 'direct' | 'via-reference';

export type ConversionResult =
  | {
    ok: true;
    convertedAmount: number;
    rateUsed: number;
    path: ConversionPath;
    effectiveDate?: Date; // oldest rate involved; absent for identity
    staleRate: boolean;
  }
  | {
    ok: false;
    error: UnconvertibleCurrencyError;
  };

/**
 * Currency Normalizer Interface
 * Converts amounts between currencies using dated, directed exchange rates
 */
export interface ICurrencyNormalizer {
  /**
   * Reference (pivot) currency for composed conversions
   */
  readonly referenceCurrency: string;

  /**
   * Latest rate for the pair not newer than asOf
   */
  getRate(fromCurrency: string, toCurrency: string, asOf: Date): ForexRate | undefined;

  /**
   * Convert an amount, composing through the reference currency when needed
   */
  convert(
    amount: number,
    fromCurrency: string,
    toCurrency: string,
    asOf: Date
  ): ConversionResult;
}
