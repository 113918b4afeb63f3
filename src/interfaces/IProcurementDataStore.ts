import {
  BillOfMaterialsItem,
  ForexRate,
  ProcurementStrategyName,
  Product,
  Project,
  ProjectProcurementStrategy,
  Quote,
  Specification,
  VendorRatingRecord
} from '../types/core';

/**
 * Procurement Data Store Interface
 * Read access to the catalog plus the single persisted setting, the project's strategy name
 */
export interface IProcurementDataStore {
  /**
   * Get a project, or null when it does not exist
   */
  getProject(projectId: number): Promise<Project | null>;

  /**
   * BOM items of a project with their specifications; empty when the project has no BOM
   */
  getBillOfMaterials(projectId: number): Promise<BillOfMaterialsItem[]>;

  getSpecification(specificationId: number): Promise<Specification | null>;

  getProduct(productId: number): Promise<Product | null>;

  /**
   * Quotes for every product linked to the specification, in listing order
   */
  listQuotesForSpecification(specificationId: number): Promise<Quote[]>;

  /**
   * Quotes for one product, in listing order
   */
  listQuotesForProduct(productId: number): Promise<Quote[]>;

  listForexRates(): Promise<ForexRate[]>;

  /**
   * Raw rating rows for a vendor
   */
  getVendorRatings(vendorId: number): Promise<VendorRatingRecord[]>;

  /**
   * Get the project's strategy, creating the default one on first access
   */
  getOrCreateStrategy(projectId: number): Promise<ProjectProcurementStrategy>;

  updateStrategyName(
    projectId: number,
    strategy: ProcurementStrategyName
  ): Promise<ProjectProcurementStrategy>;
}
