/**
 * Procurement Service
 * Loads a fresh project snapshot per call and runs the comparison, scenario and reporting pipeline
 */

import { IProcurementService } from '../interfaces/IProcurementService';
import { IProcurementDataStore } from '../interfaces/IProcurementDataStore';
import { IConfigurationManager } from '../interfaces/IConfigurationManager';
import {
  BillOfMaterialsItem,
  BomItemAnalysis,
  ComparisonMatrix,
  ConsolidationReport,
  EngineConfig,
  ProcurementStrategyName,
  Project,
  ProjectProcurementComparison,
  ProjectProcurementStrategy,
  Quote,
  RiskFinding,
  SavingsReport,
  ScenarioResult,
  Specification,
  VendorRatingSummary,
  VendorRecommendation
} from '../types/core';
import { NotFoundError } from '../errors/procurement-errors';
import { FeatureFlagsManager } from '../config/feature-flags';
import { CurrencyNormalizer } from '../forex/normalizer';
import { ComplianceMatcher } from '../compliance/matcher';
import { QuoteComparisonBuilder } from '../comparison/builder';
import { comparePrice, isFullyEligible, selectBestQuote } from '../comparison/ranking';
import { EvaluationItem, ScenarioEvaluator, ScenarioInput } from '../scenarios/evaluator';
import { parseStrategy, PROCUREMENT_STRATEGIES } from '../scenarios/strategies';
import { summarizeVendorRatings } from '../ratings/summary';
import { generateVendorRecommendations } from '../reporting/recommendations';
import { assessItemRisk, assessProjectRisks, summarizeRisk } from '../reporting/risk-assessor';
import { calculateSavings } from '../reporting/savings';
import { analyzeVendorConsolidation, calculateQuoteFreshness } from '../reporting/consolidation';
import {
  recordAnalysisRequest,
  recordUnconvertibleQuotes,
  updateScenarioMetrics
} from '../monitoring/metrics';
import { logger } from '../utils/logger';

interface ProjectSnapshot extends ScenarioInput {
  asOf: Date;
}

export class ProcurementService implements IProcurementService {
  private store: IProcurementDataStore;
  private configManager: IConfigurationManager;
  private featureFlags: FeatureFlagsManager;
  private now: () => Date;
  private matcher = new ComplianceMatcher();
  private evaluator = new ScenarioEvaluator();

  constructor(
    store: IProcurementDataStore,
    configManager: IConfigurationManager,
    featureFlags: FeatureFlagsManager = new FeatureFlagsManager(),
    now: () => Date = () => new Date()
  ) {
    this.store = store;
    this.configManager = configManager;
    this.featureFlags = featureFlags;
    this.now = now;
  }

  async compareScenarios(projectId: number): Promise<ScenarioResult[]> {
    return this.track('compareScenarios', async () => {
      const snapshot = await this.loadSnapshot(projectId, 'compareScenarios');
      return this.scoreScenarios(snapshot, PROCUREMENT_STRATEGIES);
    });
  }

  async generateVendorRecommendations(
    projectId: number,
    strategy?: string
  ): Promise<VendorRecommendation[]> {
    return this.track('generateVendorRecommendations', async () => {
      // Reject unknown names before loading anything
      const requested = strategy !== undefined ? parseStrategy(strategy) : undefined;
      const snapshot = await this.loadSnapshot(projectId, 'generateVendorRecommendations');
      const [scenario] = this.scoreScenarios(snapshot, [requested ?? snapshot.strategy.strategy]);
      return generateVendorRecommendations(scenario, snapshot.ratings);
    });
  }

  async assessEnhancedProjectRisks(projectId: number): Promise<RiskFinding[]> {
    return this.track('assessEnhancedProjectRisks', async () => {
      const snapshot = await this.loadSnapshot(projectId, 'assessEnhancedProjectRisks');
      const [scenario] = this.scoreScenarios(snapshot, [snapshot.strategy.strategy]);
      return assessProjectRisks({
        project: snapshot.project,
        scenario,
        items: snapshot.items,
        config: snapshot.config,
        asOf: snapshot.asOf
      });
    });
  }

  async calculateProjectSavings(projectId: number): Promise<SavingsReport> {
    return this.track('calculateProjectSavings', async () => {
      const snapshot = await this.loadSnapshot(projectId, 'calculateProjectSavings');
      const [lowestCost] = this.scoreScenarios(snapshot, ['lowest_cost']);
      return calculateSavings(projectId, snapshot.items, lowestCost, snapshot.config);
    });
  }

  async getVendorConsolidationAnalysis(projectId: number): Promise<ConsolidationReport> {
    return this.track('getVendorConsolidationAnalysis', async () => {
      const snapshot = await this.loadSnapshot(projectId, 'getVendorConsolidationAnalysis');
      return analyzeVendorConsolidation(projectId, snapshot.items, snapshot.ratings);
    });
  }

  async getProjectProcurementComparison(projectId: number): Promise<ProjectProcurementComparison> {
    return this.track('getProjectProcurementComparison', async () => {
      const started = Date.now();
      const snapshot = await this.loadSnapshot(projectId, 'getProjectProcurementComparison');
      const { project, strategy, items, config, asOf } = snapshot;

      const scenarios = this.scoreScenarios(snapshot, PROCUREMENT_STRATEGIES);
      const lowestCost = this.findScenario(scenarios, 'lowest_cost');
      const current = this.findScenario(scenarios, strategy.strategy);

      const itemAnalyses: BomItemAnalysis[] = items.map(({ bomItem, comparisons }, index) => {
        const bestQuote = selectBestQuote(comparisons);
        const recommended = current.perItemAssignment[index];
        return {
          bomItemId: bomItem.id,
          specification: bomItem.specification,
          quantity: bomItem.quantity,
          quotes: [...comparisons].sort(comparePrice),
          bestQuote,
          recommended,
          bestTotalCost: (bestQuote?.comparison.convertedPrice ?? 0) * bomItem.quantity,
          recommendedTotalCost: recommended.lineCost ?? 0,
          riskLevel: assessItemRisk(comparisons)
        };
      });

      const fullyCoveredItems = items.filter(item => item.comparisons.some(isFullyEligible)).length;
      const uncoveredItems = items.filter(item => item.comparisons.length === 0).length;

      const worstCaseCost = items.reduce((sum, { bomItem, comparisons }) => {
        const prices = comparisons.flatMap(quote => (quote.convertedPrice === null ? [] : [quote.convertedPrice]));
        return sum + (prices.length > 0 ? Math.max(...prices) * bomItem.quantity : 0);
      }, 0);

      const riskFindings = assessProjectRisks({ project, scenario: current, items, config, asOf });

      const comparison: ProjectProcurementComparison = {
        project,
        strategy,
        analysisDate: asOf,
        referenceCurrency: config.referenceCurrency,
        itemAnalyses,
        totalBomItems: items.length,
        fullyCoveredItems,
        partiallyCoveredItems: items.length - fullyCoveredItems - uncoveredItems,
        uncoveredItems,
        bestCaseCost: lowestCost.totalCost,
        recommendedCost: current.totalCost,
        worstCaseCost,
        savingsVsBudget: current.savingsVsBudget,
        savingsPercent: project.budget > 0 ? (current.savingsVsBudget / project.budget) * 100 : 0,
        scenarios,
        recommendations: generateVendorRecommendations(current, snapshot.ratings),
        riskFindings,
        riskSummary: summarizeRisk(riskFindings),
        savings: calculateSavings(projectId, items, lowestCost, config),
        consolidation: analyzeVendorConsolidation(projectId, items, snapshot.ratings),
        quoteFreshness: calculateQuoteFreshness(items, asOf)
      };

      logger.analysisComplete('getProjectProcurementComparison', projectId, Date.now() - started);
      return comparison;
    });
  }

  async getProjectStrategy(projectId: number): Promise<ProjectProcurementStrategy> {
    return this.track('getProjectStrategy', async () => {
      await this.requireProject(projectId);
      return this.store.getOrCreateStrategy(projectId);
    });
  }

  async setProjectStrategy(projectId: number, strategy: string): Promise<ProjectProcurementStrategy> {
    return this.track('setProjectStrategy', async () => {
      const name = parseStrategy(strategy);
      await this.requireProject(projectId);
      const updated = await this.store.updateStrategyName(projectId, name);
      logger.info(`Project strategy set to ${name}`, { component: 'ProcurementService', projectId, strategy: name });
      return updated;
    });
  }

  async compareQuotesForSpecification(
    specificationId: number,
    includeExtras: boolean
  ): Promise<ComparisonMatrix> {
    return this.track('compareQuotesForSpecification', async () => {
      const specification = await this.store.getSpecification(specificationId);
      if (!specification) {
        throw new NotFoundError('Specification', specificationId);
      }

      const [quotes, builder] = await Promise.all([
        this.store.listQuotesForSpecification(specificationId),
        this.createBuilder()
      ]);
      return builder.buildMatrix(
        { kind: 'specification', specificationId },
        specification,
        quotes,
        { asOf: this.now(), includeExtras }
      );
    });
  }

  async compareQuotesForProduct(productId: number, includeExtras: boolean): Promise<ComparisonMatrix> {
    return this.track('compareQuotesForProduct', async () => {
      const product = await this.store.getProduct(productId);
      if (!product) {
        throw new NotFoundError('Product', productId);
      }

      let specification: Specification | null = null;
      if (product.specificationId !== undefined) {
        specification = await this.store.getSpecification(product.specificationId);
        if (!specification) {
          throw new NotFoundError('Specification', product.specificationId);
        }
      }

      const [quotes, builder] = await Promise.all([
        this.store.listQuotesForProduct(productId),
        this.createBuilder()
      ]);
      return builder.buildMatrix(
        { kind: 'product', productId },
        specification,
        quotes,
        { asOf: this.now(), includeExtras }
      );
    });
  }

  private async requireProject(projectId: number): Promise<Project> {
    const project = await this.store.getProject(projectId);
    if (!project) {
      throw new NotFoundError('Project', projectId);
    }
    return project;
  }

  private async createBuilder(config?: EngineConfig): Promise<QuoteComparisonBuilder> {
    const engineConfig = config ?? (await this.configManager.getEngineConfig());
    const rates = await this.store.listForexRates();
    const normalizer = new CurrencyNormalizer(rates, {
      referenceCurrency: engineConfig.referenceCurrency,
      staleAfterDays: engineConfig.forexStaleAfterDays
    });
    return new QuoteComparisonBuilder(normalizer, this.matcher, engineConfig);
  }

  /**
   * Load everything one call needs; independent reads run concurrently when enabled
   */
  private async loadSnapshot(projectId: number, operation: string): Promise<ProjectSnapshot> {
    const asOf = this.now();
    const project = await this.requireProject(projectId);

    const [bom, config, strategy] = await Promise.all([
      this.store.getBillOfMaterials(projectId),
      this.configManager.getEngineConfig(),
      this.store.getOrCreateStrategy(projectId)
    ]);

    logger.analysisStart(operation, projectId, bom.length);

    const builder = await this.createBuilder(config);
    const specificationIds = [...new Set(bom.map(item => item.specificationId))];
    const quoteLists = await this.loadEach(specificationIds, id => this.store.listQuotesForSpecification(id));
    const quotesBySpecification = new Map<number, Quote[]>(
      specificationIds.map((id, index) => [id, quoteLists[index]])
    );

    const items: EvaluationItem[] = bom.map((bomItem: BillOfMaterialsItem) => ({
      bomItem,
      comparisons: builder.compareQuotes(
        quotesBySpecification.get(bomItem.specificationId) ?? [],
        bomItem.specification,
        { asOf }
      )
    }));

    const vendorIds = [...new Set(items.flatMap(item => item.comparisons.map(quote => quote.vendorId)))]
      .sort((a, b) => a - b);
    const ratingRows = await this.loadEach(vendorIds, id => this.store.getVendorRatings(id));
    const ratings = new Map<number, VendorRatingSummary>(
      vendorIds.map((id, index) => [id, summarizeVendorRatings(id, ratingRows[index])])
    );

    if (this.featureFlags.isMetricsEnabled()) {
      const unconvertible = new Set(
        items.flatMap(item => item.comparisons.filter(quote => !quote.convertible).map(quote => quote.quoteId))
      );
      recordUnconvertibleQuotes(unconvertible.size);
    }

    return { project, strategy, items, ratings, config, asOf };
  }

  private async loadEach<K, V>(keys: K[], load: (key: K) => Promise<V>): Promise<V[]> {
    if (this.featureFlags.isConcurrentLoadingEnabled()) {
      return Promise.all(keys.map(load));
    }

    const results: V[] = [];
    for (const key of keys) {
      results.push(await load(key));
    }
    return results;
  }

  private scoreScenarios(
    snapshot: ProjectSnapshot,
    names: readonly ProcurementStrategyName[]
  ): ScenarioResult[] {
    return names.map(name => {
      const started = process.hrtime.bigint();
      const result = this.evaluator.evaluate(name, snapshot);
      if (this.featureFlags.isMetricsEnabled()) {
        const seconds = Number(process.hrtime.bigint() - started) / 1e9;
        updateScenarioMetrics(result, seconds);
      }
      return result;
    });
  }

  private findScenario(scenarios: ScenarioResult[], name: ProcurementStrategyName): ScenarioResult {
    const scenario = scenarios.find(candidate => candidate.name === name);
    if (!scenario) {
      throw new Error(`Scenario ${name} was not evaluated`);
    }
    return scenario;
  }

  private async track<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      const result = await run();
      if (this.featureFlags.isMetricsEnabled()) {
        recordAnalysisRequest(operation, 'success');
      }
      return result;
    } catch (error) {
      if (this.featureFlags.isMetricsEnabled()) {
        recordAnalysisRequest(operation, 'error');
      }
      throw error;
    }
  }
}
