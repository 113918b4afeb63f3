/**
 * Procurement Errors
 * Structural errors abort a call; data-quality issues are reported as caveats instead
 */

export type ProcurementErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_STRATEGY'
  | 'UNCONVERTIBLE_CURRENCY';

/**
 * Base class for errors raised by the engine
 */
export class ProcurementError extends Error {
  readonly code: ProcurementErrorCode;

  constructor(code: ProcurementErrorCode, message: string) {
    super(message);
    this.name = 'ProcurementError';
    this.code = code;
  }
}

export class NotFoundError extends ProcurementError {
  readonly entity: string;
  readonly entityId: number;

  constructor(entity: string, entityId: number) {
    super('NOT_FOUND', `${entity} with id '${entityId}' not found`);
    this.name = 'NotFoundError';
    this.entity = entity;
    this.entityId = entityId;
  }
}

export class InvalidStrategyError extends ProcurementError {
  readonly strategy: string;

  constructor(strategy: string, allowed: readonly string[]) {
    super(
      'INVALID_STRATEGY',
      `Unknown procurement strategy '${strategy}'. Expected one of: ${allowed.join(', ')}`
    );
    this.name = 'InvalidStrategyError';
    this.strategy = strategy;
  }
}

/**
 * Carried inside a failed conversion result; the engine never throws it
 */
export class UnconvertibleCurrencyError extends ProcurementError {
  readonly fromCurrency: string;
  readonly toCurrency: string;

  constructor(fromCurrency: string, toCurrency: string, asOf: Date) {
    super(
      'UNCONVERTIBLE_CURRENCY',
      `No exchange rate from ${fromCurrency} to ${toCurrency} effective on or before ${asOf.toISOString().slice(0, 10)}`
    );
    this.name = 'UnconvertibleCurrencyError';
    this.fromCurrency = fromCurrency;
    this.toCurrency = toCurrency;
  }
}
