/**
 * Procurement Recommendation Engine - Main Entry Point
 */

// Export core types
export * from './types/core';

// Export errors
export * from './errors/procurement-errors';

// Export interfaces
export * from './interfaces/ICurrencyNormalizer';
export * from './interfaces/IProcurementDataStore';
export * from './interfaces/IProcurementService';
export * from './interfaces/IConfigurationManager';
export * from './interfaces/IAPIGateway';

// Export implementations
export { CurrencyNormalizer, normalizeCurrencyCode } from './forex/normalizer';
export { ComplianceMatcher } from './compliance/matcher';
export { QuoteComparisonBuilder } from './comparison/builder';
export type { ComparisonOptions } from './comparison/builder';
export { comparePrice, selectBestQuote, selectTier } from './comparison/ranking';
export { ScenarioEvaluator, ScenarioStateMachine } from './scenarios/evaluator';
export type { EvaluationItem, ScenarioInput } from './scenarios/evaluator';
export {
  PROCUREMENT_STRATEGIES,
  DEFAULT_STRATEGY,
  STRATEGY_VARIANTS,
  parseStrategy
} from './scenarios/strategies';
export { summarizeVendorRatings } from './ratings/summary';
export { generateVendorRecommendations } from './reporting/recommendations';
export { assessProjectRisks, assessItemRisk, summarizeRisk } from './reporting/risk-assessor';
export { calculateSavings } from './reporting/savings';
export { analyzeVendorConsolidation, calculateQuoteFreshness } from './reporting/consolidation';
export { ProcurementService } from './procurement/service';
export { PostgresProcurementStore } from './store/postgres-store';
export { ConfigurationManager, ConfigurationValidationError } from './config/manager';
export { FeatureFlagsManager } from './config/feature-flags';
export { DEFAULT_ENGINE_CONFIG } from './config/defaults';
export { APIGateway } from './api/gateway';
