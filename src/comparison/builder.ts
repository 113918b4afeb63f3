/**
 * Quote Comparison Builder
 * Normalizes quote prices, runs compliance checks, and orders quotes best price first
 */

import {
  ComparisonMatrix,
  ComparisonTarget,
  EngineConfig,
  Quote,
  QuoteComparison,
  Specification
} from '../types/core';
import { ICurrencyNormalizer } from '../interfaces/ICurrencyNormalizer';
import { ComplianceMatcher } from '../compliance/matcher';
import { DEFAULT_ENGINE_CONFIG } from '../config/defaults';
import { MS_PER_DAY, wholeDaysBetween } from '../utils/dates';
import { logger } from '../utils/logger';
import { comparePrice } from './ranking';

export interface ComparisonOptions {
  asOf: Date;
  includeExtras?: boolean;
}

export class QuoteComparisonBuilder {
  private normalizer: ICurrencyNormalizer;
  private matcher: ComplianceMatcher;
  private staleQuoteDays: number;

  constructor(
    normalizer: ICurrencyNormalizer,
    matcher: ComplianceMatcher = new ComplianceMatcher(),
    config: Pick<EngineConfig, 'staleQuoteDays'> = DEFAULT_ENGINE_CONFIG
  ) {
    this.normalizer = normalizer;
    this.matcher = matcher;
    this.staleQuoteDays = config.staleQuoteDays;
  }

  /**
   * Build the sorted comparison matrix for a specification or a single product
   */
  buildMatrix(
    target: ComparisonTarget,
    specification: Specification | null,
    quotes: Quote[],
    options: ComparisonOptions
  ): ComparisonMatrix {
    const candidates = quotes.filter(quote =>
      target.kind === 'specification'
        ? quote.product.specificationId === target.specificationId
        : quote.productId === target.productId
    );

    return {
      target,
      specification,
      asOf: options.asOf,
      referenceCurrency: this.normalizer.referenceCurrency,
      quotes: this.compareQuotes(candidates, specification, options).sort(comparePrice)
    };
  }

  /**
   * Compare quotes in listing order, skipping superseded revisions
   */
  compareQuotes(
    quotes: Quote[],
    specification: Specification | null,
    options: ComparisonOptions
  ): QuoteComparison[] {
    return quotes
      .filter(quote => quote.replacedById === undefined)
      .map(quote => this.compareQuote(quote, specification, options));
  }

  compareQuote(
    quote: Quote,
    specification: Specification | null,
    options: ComparisonOptions
  ): QuoteComparison {
    const { asOf } = options;
    const currency = quote.currency.trim() || quote.vendor.currency;
    const conversion = this.normalizer.convert(
      quote.price,
      currency,
      this.normalizer.referenceCurrency,
      asOf
    );

    if (!conversion.ok) {
      logger.conversionFailed(quote.id, quote.vendorId, conversion.error.message);
    }

    const compliance = this.matcher.evaluate(specification, quote.product);
    const expired = quote.validUntil !== undefined && quote.validUntil.getTime() < asOf.getTime();
    const ageDays = (asOf.getTime() - quote.quoteDate.getTime()) / MS_PER_DAY;
    const stale = expired || (quote.validUntil === undefined && ageDays > this.staleQuoteDays);

    const comparison: QuoteComparison = {
      quoteId: quote.id,
      vendorId: quote.vendorId,
      vendorName: quote.vendor.name,
      productId: quote.productId,
      productName: quote.product.name,
      brandName: quote.product.brandName,
      price: quote.price,
      currency,
      quoteDate: quote.quoteDate,
      validUntil: quote.validUntil,
      convertedPrice: conversion.ok ? conversion.convertedAmount : null,
      conversionRate: conversion.ok ? conversion.rateUsed : null,
      convertible: conversion.ok,
      staleRate: conversion.ok && conversion.staleRate,
      expired,
      stale,
      daysUntilExpiry: quote.validUntil ? wholeDaysBetween(asOf, quote.validUntil) : null,
      minQuantity: quote.minQuantity,
      compliant: compliance.overallCompliant,
      attributeCompliance: compliance.perAttribute,
      complianceIssues: compliance.issues
    };

    if (options.includeExtras) {
      comparison.extraAttributes = compliance.extraAttributes;
    }

    return comparison;
  }
}
