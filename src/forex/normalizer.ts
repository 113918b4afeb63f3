/**
 * Currency Normalizer
 * Converts quote prices into the reference currency from an in-memory rate table
 */

import { ForexRate } from '../types/core';
import { ConversionResult, ICurrencyNormalizer } from '../interfaces/ICurrencyNormalizer';
import { UnconvertibleCurrencyError } from '../errors/procurement-errors';
import { DEFAULT_ENGINE_CONFIG } from '../config/defaults';
import { MS_PER_DAY } from '../utils/dates';

export interface CurrencyNormalizerOptions {
  referenceCurrency?: string;
  staleAfterDays?: number;
}

export function normalizeCurrencyCode(code: string): string {
  return code.trim().toUpperCase();
}

export class CurrencyNormalizer implements ICurrencyNormalizer {
  readonly referenceCurrency: string;
  private readonly staleAfterDays: number;
  // pair key -> rates, newest effective date first
  private ratesByPair: Map<string, ForexRate[]> = new Map();

  constructor(rates: ForexRate[] = [], options: CurrencyNormalizerOptions = {}) {
    this.referenceCurrency = normalizeCurrencyCode(
      options.referenceCurrency ?? DEFAULT_ENGINE_CONFIG.referenceCurrency
    );
    this.staleAfterDays = options.staleAfterDays ?? DEFAULT_ENGINE_CONFIG.forexStaleAfterDays;

    for (const rate of rates) {
      this.addRate(rate);
    }
  }

  /**
   * Add a rate to the table
   */
  addRate(rate: ForexRate): void {
    if (!(rate.rate > 0)) {
      throw new RangeError(`Forex rate ${rate.id} must be positive, got ${rate.rate}`);
    }

    const key = this.getPairKey(rate.fromCurrency, rate.toCurrency);
    const rates = this.ratesByPair.get(key) ?? [];
    rates.push(rate);
    rates.sort((a, b) => {
      const byDate = b.effectiveDate.getTime() - a.effectiveDate.getTime();
      return byDate !== 0 ? byDate : b.id - a.id;
    });
    this.ratesByPair.set(key, rates);
  }

  getRate(fromCurrency: string, toCurrency: string, asOf: Date): ForexRate | undefined {
    const rates = this.ratesByPair.get(this.getPairKey(fromCurrency, toCurrency));
    if (!rates) {
      return undefined;
    }

    return rates.find(rate => rate.effectiveDate.getTime() <= asOf.getTime());
  }

  convert(
    amount: number,
    fromCurrency: string,
    toCurrency: string,
    asOf: Date
  ): ConversionResult {
    const from = normalizeCurrencyCode(fromCurrency);
    const to = normalizeCurrencyCode(toCurrency);

    if (from === to) {
      return { ok: true, convertedAmount: amount, rateUsed: 1.0, path: 'identity', staleRate: false };
    }

    const direct = this.getRate(from, to, asOf);
    if (direct) {
      return this.success(amount, [direct], 'direct', asOf);
    }

    const ref = this.referenceCurrency;
    if (from !== ref && to !== ref) {
      const firstHop = this.getRate(from, ref, asOf);
      const secondHop = this.getRate(ref, to, asOf);
      if (firstHop && secondHop) {
        return this.success(amount, [firstHop, secondHop], 'via-reference', asOf);
      }
    }

    return { ok: false, error: new UnconvertibleCurrencyError(from, to, asOf) };
  }

  private success(
    amount: number,
    hops: ForexRate[],
    path: 'direct' | 'via-reference',
    asOf: Date
  ): ConversionResult {
    const rateUsed = hops.reduce((product, hop) => product * hop.rate, 1);
    const oldest = hops.reduce(
      (min, hop) => (hop.effectiveDate.getTime() < min.getTime() ? hop.effectiveDate : min),
      hops[0].effectiveDate
    );
    const ageDays = (asOf.getTime() - oldest.getTime()) / MS_PER_DAY;

    return {
      ok: true,
      convertedAmount: amount * rateUsed,
      rateUsed,
      path,
      effectiveDate: oldest,
      staleRate: ageDays > this.staleAfterDays
    };
  }

  private getPairKey(fromCurrency: string, toCurrency: string): string {
    return `${normalizeCurrencyCode(fromCurrency)}:${normalizeCurrencyCode(toCurrency)}`;
  }
}
