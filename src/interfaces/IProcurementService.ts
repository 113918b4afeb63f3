import {
  ComparisonMatrix,
  ConsolidationReport,
  ProjectProcurementComparison,
  ProjectProcurementStrategy,
  RiskFinding,
  SavingsReport,
  ScenarioResult,
  VendorRecommendation
} from '../types/core';

/**
 * Procurement Service Interface
 * Entry points of the recommendation engine
 */
export interface IProcurementService {
  /**
   * Evaluate all four strategies in fixed order
   */
  compareScenarios(projectId: number): Promise<ScenarioResult[]>;

  /**
   * Vendor recommendations for a strategy, defaulting to the project's current one
   */
  generateVendorRecommendations(projectId: number, strategy?: string): Promise<VendorRecommendation[]>;

  /**
   * Risk findings for the project's current strategy
   */
  assessEnhancedProjectRisks(projectId: number): Promise<RiskFinding[]>;

  calculateProjectSavings(projectId: number): Promise<SavingsReport>;

  getVendorConsolidationAnalysis(projectId: number): Promise<ConsolidationReport>;

  getProjectProcurementComparison(projectId: number): Promise<ProjectProcurementComparison>;

  getProjectStrategy(projectId: number): Promise<ProjectProcurementStrategy>;

  /**
   * Persist a new strategy name for the project
   */
  setProjectStrategy(projectId: number, strategy: string): Promise<ProjectProcurementStrategy>;

  compareQuotesForSpecification(specificationId: number, includeExtras: boolean): Promise<ComparisonMatrix>;

  compareQuotesForProduct(productId: number, includeExtras: boolean): Promise<ComparisonMatrix>;
}
