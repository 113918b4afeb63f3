/**
 * Core data models for the procurement recommendation engine
 */

// ============================================================================
// Catalog Models
// ============================================================================

export type AttributeDataType = 'number' | 'text' | 'boolean';

export interface SpecificationAttribute {
  id: number;
  specificationId: number;
  name: string;
  dataType: AttributeDataType;
  unit?: string;
  isRequired: boolean;
  minValue?: number;
  maxValue?: number;
  description?: string;
}

export interface Specification {
  id: number;
  name: string;
  description?: string;
  attributes: SpecificationAttribute[];
}

export type AttributeValue =
  | { kind: 'number'; value: number }
  | { kind: 'text'; value: string }
  | { kind: 'boolean'; value: boolean };

export interface ProductAttribute {
  id: number;
  productId: number;
  specificationAttributeId: number;
  value: AttributeValue;
}

export interface Product {
  id: number;
  name: string;
  brandId: number;
  brandName?: string;
  specificationId?: number;
  attributes: ProductAttribute[];
}

export interface Vendor {
  id: number;
  name: string;
  currency: string; // ISO 4217
  discountCode?: string;
}

export interface Quote {
  id: number;
  vendorId: number;
  productId: number;
  vendor: Vendor;
  product: Product;
  price: number;
  currency: string; // empty means the vendor's currency
  quoteDate: Date;
  validUntil?: Date;
  minQuantity?: number;
  replacedById?: number; // set when a newer revision supersedes this quote
  notes?: string;
}

export interface ForexRate {
  id: number;
  fromCurrency: string;
  toCurrency: string;
  rate: number;
  effectiveDate: Date;
}

// ============================================================================
// Project Models
// ============================================================================

export type ProjectStatus = 'planning' | 'active' | 'completed' | 'cancelled';

export interface Project {
  id: number;
  name: string;
  description?: string;
  budget: number; // 0 = unconstrained
  deadline?: Date;
  status: ProjectStatus;
}

export interface BillOfMaterialsItem {
  id: number;
  specificationId: number;
  specification: Specification;
  quantity: number;
  notes?: string;
}

export type ProcurementStrategyName =
  | 'lowest_cost'
  | 'fewest_vendors'
  | 'balanced'
  | 'quality_focused';

export interface ProjectProcurementStrategy {
  id: number;
  projectId: number;
  strategy: ProcurementStrategyName;
  maxVendors?: number;
  minVendorRating?: number;
  preferredVendorIds: number[];
  excludedVendorIds: number[];
  allowPartialFulfill: boolean;
}

export interface VendorRatingRecord {
  vendorId: number;
  priceRating?: number;
  qualityRating?: number;
  deliveryRating?: number;
  serviceRating?: number;
}

export interface VendorRatingSummary {
  vendorId: number;
  totalRatings: number;
  avgPrice?: number;
  avgQuality?: number;
  avgDelivery?: number;
  avgService?: number;
  overallAvg?: number; // absent when the vendor has no ratings
}

// ============================================================================
// Engine Configuration
// ============================================================================

export interface EngineConfig {
  referenceCurrency: string;
  expiryWarningDays: number;
  concentrationThreshold: number; // share of total cost (0-1)
  balancedCostWeight: number;
  balancedVendorWeight: number;
  staleQuoteDays: number;
  forexStaleAfterDays: number;
  neutralRating: number;
  adminCostPerVendor: number;
}

// ============================================================================
// Compliance
// ============================================================================

export type ComplianceIssueType =
  | 'missing'
  | 'type-mismatch'
  | 'below-minimum'
  | 'above-maximum';

export interface ComplianceIssue {
  attributeId: number;
  attributeName: string;
  type: ComplianceIssueType;
  required: boolean;
  message: string;
}

export interface ComplianceResult {
  perAttribute: Record<number, boolean>;
  issues: ComplianceIssue[];
  overallCompliant: boolean;
  extraAttributes: ProductAttribute[];
}

// ============================================================================
// Quote Comparison
// ============================================================================

export type ComparisonTarget =
  | { kind: 'specification'; specificationId: number }
  | { kind: 'product'; productId: number };

export interface QuoteComparison {
  quoteId: number;
  vendorId: number;
  vendorName: string;
  productId: number;
  productName: string;
  brandName?: string;
  price: number;
  currency: string;
  quoteDate: Date;
  validUntil?: Date;
  convertedPrice: number | null;
  conversionRate: number | null;
  convertible: boolean;
  staleRate: boolean;
  expired: boolean;
  stale: boolean;
  daysUntilExpiry: number | null;
  minQuantity?: number;
  compliant: boolean;
  attributeCompliance: Record<number, boolean>;
  complianceIssues: ComplianceIssue[];
  extraAttributes?: ProductAttribute[];
}

export interface ComparisonMatrix {
  target: ComparisonTarget;
  specification: Specification | null;
  asOf: Date;
  referenceCurrency: string;
  quotes: QuoteComparison[];
}

export type RelaxedConstraint =
  | 'no-compliant-quote'
  | 'only-expired-quotes'
  | 'no-convertible-quotes'
  | 'constraint-unsatisfiable';

export interface BestQuoteSelection {
  comparison: QuoteComparison;
  degraded: boolean;
  relaxed: RelaxedConstraint[];
  reason?: string;
}

// ============================================================================
// Scenarios
// ============================================================================

export type ScenarioPhase = 'collecting' | 'assigning' | 'scored' | 'infeasible';

export type CaveatKind =
  | 'infeasible'
  | 'unconvertible'
  | 'constraint-unsatisfiable'
  | 'degraded-selection'
  | 'below-minimum-order';

export interface Caveat {
  kind: CaveatKind;
  message: string;
  bomItemId?: number;
  quoteId?: number;
  vendorId?: number;
}

export type AssignmentStatus = 'assigned' | 'unpriced' | 'no-quotes';

export interface ItemAssignment {
  bomItemId: number;
  specificationId: number;
  specificationName: string;
  quantity: number;
  status: AssignmentStatus;
  quoteId?: number;
  vendorId?: number;
  vendorName?: string;
  unitPrice?: number; // reference currency
  lineCost?: number;
  validUntil?: Date;
  degraded: boolean;
  relaxed: RelaxedConstraint[];
}

export interface BalancedSelection {
  chosen: string;
  scores: Array<{ candidate: string; score: number; totalCost: number; vendorCount: number }>;
}

export interface ScenarioResult {
  name: ProcurementStrategyName;
  label: string;
  description: string;
  tradeoffs: string;
  phase: 'scored' | 'infeasible';
  totalCost: number;
  vendorCount: number;
  savingsVsBudget: number;
  perItemAssignment: ItemAssignment[];
  vendorAssignments: Record<number, number[]>;
  caveats: Caveat[];
  selection?: BalancedSelection;
}

// ============================================================================
// Reports
// ============================================================================

export interface VendorRecommendation {
  vendorId: number;
  vendorName: string;
  bomItemIds: number[];
  totalCost: number;
  itemCount: number;
  degradedItemCount: number;
  rationale: string;
  priority: number;
}

export type RiskSeverity = 'low' | 'medium' | 'high';

export type RiskKind =
  | 'quote-expiring'
  | 'no-quotes'
  | 'no-compliant-quotes'
  | 'vendor-concentration'
  | 'budget-overrun'
  | 'single-source'
  | 'unconvertible-quote'
  | 'degraded-selection'
  | 'constraint-unsatisfiable'
  | 'below-minimum-order';

export interface RiskFinding {
  kind: RiskKind;
  severity: RiskSeverity;
  message: string;
  bomItemIds: number[];
  vendorId?: number;
  quoteId?: number;
}

export interface MitigationAction {
  priority: RiskSeverity;
  kind: RiskKind;
  action: string;
}

export interface RiskSummary {
  overallRisk: RiskSeverity;
  counts: Record<RiskSeverity, number>;
  mitigationActions: MitigationAction[];
}

export interface SavingsLine {
  bomItemId: number;
  specificationName: string;
  quantity: number;
  baselineUnitPrice: number | null;
  bestUnitPrice: number | null;
  savings: number;
}

export interface SavingsReport {
  projectId: number;
  bestTotal: number;
  baselineTotal: number;
  savings: number;
  savingsPercent: number;
  consolidationSavings: number;
  lines: SavingsLine[];
}

export interface VendorConsolidation {
  vendorId: number;
  vendorName: string;
  rating: VendorRatingSummary | null;
  bomItemIds: number[];
  specificationsCount: number;
  totalQuantity: number;
  totalCostIfUsed: number;
  averagePriceRank: number;
  shippingAdvantage: boolean;
}

export interface ConsolidationReport {
  projectId: number;
  totalBomItems: number;
  vendors: VendorConsolidation[];
}

export interface QuoteFreshnessStats {
  totalQuotes: number;
  freshQuotes: number;
  staleQuotes: number;
  expiredQuotes: number;
  averageAgeDays: number;
}

export type ItemRiskLevel = 'low' | 'medium' | 'high' | 'critical';

export interface BomItemAnalysis {
  bomItemId: number;
  specification: Specification;
  quantity: number;
  quotes: QuoteComparison[];
  bestQuote: BestQuoteSelection | null;
  recommended: ItemAssignment;
  bestTotalCost: number;
  recommendedTotalCost: number;
  riskLevel: ItemRiskLevel;
}

export interface ProjectProcurementComparison {
  project: Project;
  strategy: ProjectProcurementStrategy;
  analysisDate: Date;
  referenceCurrency: string;
  itemAnalyses: BomItemAnalysis[];
  totalBomItems: number;
  fullyCoveredItems: number;
  partiallyCoveredItems: number;
  uncoveredItems: number;
  bestCaseCost: number;
  recommendedCost: number;
  worstCaseCost: number;
  savingsVsBudget: number;
  savingsPercent: number;
  scenarios: ScenarioResult[];
  recommendations: VendorRecommendation[];
  riskFindings: RiskFinding[];
  riskSummary: RiskSummary;
  savings: SavingsReport;
  consolidation: ConsolidationReport;
  quoteFreshness: QuoteFreshnessStats;
}

// ============================================================================
// API Models
// ============================================================================

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    retryable: boolean;
  };
  timestamp: Date;
}
