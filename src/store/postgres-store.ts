/**
 * PostgreSQL Procurement Store
 * Loads catalog, project and quote data; persists only the project's strategy name
 */

import { Pool } from 'pg';
import { IProcurementDataStore } from '../interfaces/IProcurementDataStore';
import {
  AttributeValue,
  BillOfMaterialsItem,
  ForexRate,
  ProcurementStrategyName,
  Product,
  ProductAttribute,
  Project,
  ProjectProcurementStrategy,
  ProjectStatus,
  Quote,
  Specification,
  SpecificationAttribute,
  VendorRatingRecord
} from '../types/core';
import { NotFoundError } from '../errors/procurement-errors';
import { DEFAULT_STRATEGY, isProcurementStrategy } from '../scenarios/strategies';
import { logger } from '../utils/logger';

// pg returns NUMERIC columns as strings
type Numeric = number | string;

interface ProjectRow {
  id: number;
  name: string;
  description: string | null;
  budget: Numeric | null;
  deadline: Date | null;
  status: string;
}

interface SpecificationRow {
  id: number;
  name: string;
  description: string | null;
}

interface SpecificationAttributeRow {
  id: number;
  specification_id: number;
  name: string;
  data_type: string;
  unit: string | null;
  is_required: boolean;
  min_value: Numeric | null;
  max_value: Numeric | null;
  description: string | null;
}

interface ProductRow {
  id: number;
  name: string;
  brand_id: number;
  brand_name: string | null;
  specification_id: number | null;
}

interface ProductAttributeRow {
  id: number;
  product_id: number;
  specification_attribute_id: number;
  value_text: string | null;
  value_number: Numeric | null;
  value_boolean: boolean | null;
}

interface QuoteRow {
  id: number;
  vendor_id: number;
  product_id: number;
  price: Numeric;
  currency: string | null;
  quote_date: Date;
  valid_until: Date | null;
  min_quantity: number | null;
  replaced_by: number | null;
  notes: string | null;
  vendor_name: string;
  vendor_currency: string;
  discount_code: string | null;
  product_name: string;
  brand_id: number;
  brand_name: string | null;
  specification_id: number | null;
}

interface BomItemRow {
  id: number;
  specification_id: number;
  quantity: number;
  notes: string | null;
}

interface ForexRow {
  id: number;
  from_currency: string;
  to_currency: string;
  rate: Numeric;
  effective_date: Date;
}

interface StrategyRow {
  id: number;
  project_id: number;
  strategy: string;
  max_vendors: number | null;
  min_vendor_rating: Numeric | null;
  preferred_vendor_ids: string | null;
  excluded_vendor_ids: string | null;
  allow_partial_fulfill: boolean;
}

interface RatingRow {
  vendor_id: number;
  price_rating: number | null;
  quality_rating: number | null;
  delivery_rating: number | null;
  service_rating: number | null;
}

const PROJECT_STATUSES: ProjectStatus[] = ['planning', 'active', 'completed', 'cancelled'];

const QUOTE_COLUMNS = `
  q.id, q.vendor_id, q.product_id, q.price, q.currency, q.quote_date, q.valid_until,
  q.min_quantity, q.replaced_by, q.notes,
  v.name AS vendor_name, v.currency AS vendor_currency, v.discount_code,
  p.name AS product_name, p.brand_id, b.name AS brand_name, p.specification_id
`;

const QUOTE_JOINS = `
  FROM quotes q
  JOIN vendors v ON v.id = q.vendor_id
  JOIN products p ON p.id = q.product_id
  LEFT JOIN brands b ON b.id = p.brand_id
`;

function toNumber(value: Numeric): number {
  return typeof value === 'number' ? value : parseFloat(value);
}

function toOptionalNumber(value: Numeric | null): number | undefined {
  return value === null ? undefined : toNumber(value);
}

/**
 * Comma-separated vendor id list
 */
export function parseIdList(value: string | null): number[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map(part => Number(part.trim()))
    .filter(id => Number.isInteger(id) && id > 0);
}

export class PostgresProcurementStore implements IProcurementDataStore {
  private db: Pool;

  constructor(db: Pool) {
    this.db = db;
  }

  async getProject(projectId: number): Promise<Project | null> {
    const result = await this.db.query<ProjectRow>(
      `SELECT id, name, description, budget, deadline, status
       FROM projects WHERE id = $1`,
      [projectId]
    );

    const row = result.rows[0];
    if (!row) {
      return null;
    }

    const status = PROJECT_STATUSES.find(candidate => candidate === row.status) ?? 'planning';
    return {
      id: row.id,
      name: row.name,
      description: row.description ?? undefined,
      budget: row.budget === null ? 0 : toNumber(row.budget),
      deadline: row.deadline ?? undefined,
      status
    };
  }

  async getBillOfMaterials(projectId: number): Promise<BillOfMaterialsItem[]> {
    const result = await this.db.query<BomItemRow>(
      `SELECT i.id, i.specification_id, i.quantity, i.notes
       FROM bill_of_materials_items i
       JOIN bills_of_materials bom ON bom.id = i.bill_of_materials_id
       WHERE bom.project_id = $1
       ORDER BY i.id`,
      [projectId]
    );

    const specifications = await this.loadSpecifications(
      [...new Set(result.rows.map(row => row.specification_id))]
    );

    return result.rows.map(row => {
      const specification = specifications.get(row.specification_id);
      if (!specification) {
        throw new NotFoundError('Specification', row.specification_id);
      }
      return {
        id: row.id,
        specificationId: row.specification_id,
        specification,
        quantity: row.quantity,
        notes: row.notes ?? undefined
      };
    });
  }

  async getSpecification(specificationId: number): Promise<Specification | null> {
    const specifications = await this.loadSpecifications([specificationId]);
    return specifications.get(specificationId) ?? null;
  }

  async getProduct(productId: number): Promise<Product | null> {
    const result = await this.db.query<ProductRow>(
      `SELECT p.id, p.name, p.brand_id, b.name AS brand_name, p.specification_id
       FROM products p
       LEFT JOIN brands b ON b.id = p.brand_id
       WHERE p.id = $1`,
      [productId]
    );

    const row = result.rows[0];
    if (!row) {
      return null;
    }

    const attributes = await this.loadProductAttributes([row.id]);
    return {
      id: row.id,
      name: row.name,
      brandId: row.brand_id,
      brandName: row.brand_name ?? undefined,
      specificationId: row.specification_id ?? undefined,
      attributes: attributes.get(row.id) ?? []
    };
  }

  async listQuotesForSpecification(specificationId: number): Promise<Quote[]> {
    const result = await this.db.query<QuoteRow>(
      `SELECT ${QUOTE_COLUMNS} ${QUOTE_JOINS}
       WHERE p.specification_id = $1
       ORDER BY q.id`,
      [specificationId]
    );
    return this.toQuotes(result.rows);
  }

  async listQuotesForProduct(productId: number): Promise<Quote[]> {
    const result = await this.db.query<QuoteRow>(
      `SELECT ${QUOTE_COLUMNS} ${QUOTE_JOINS}
       WHERE q.product_id = $1
       ORDER BY q.id`,
      [productId]
    );
    return this.toQuotes(result.rows);
  }

  async listForexRates(): Promise<ForexRate[]> {
    const result = await this.db.query<ForexRow>(
      `SELECT id, from_currency, to_currency, rate, effective_date
       FROM forex
       ORDER BY effective_date, id`
    );

    const rates: ForexRate[] = [];
    for (const row of result.rows) {
      const rate = toNumber(row.rate);
      if (!(rate > 0)) {
        logger.warn(`Skipping forex rate ${row.id}: rate must be positive, got ${row.rate}`, {
          component: 'ProcurementStore'
        });
        continue;
      }
      rates.push({
        id: row.id,
        fromCurrency: row.from_currency,
        toCurrency: row.to_currency,
        rate,
        effectiveDate: row.effective_date
      });
    }
    return rates;
  }

  async getVendorRatings(vendorId: number): Promise<VendorRatingRecord[]> {
    const result = await this.db.query<RatingRow>(
      `SELECT vendor_id, price_rating, quality_rating, delivery_rating, service_rating
       FROM vendor_ratings WHERE vendor_id = $1
       ORDER BY id`,
      [vendorId]
    );

    return result.rows.map(row => ({
      vendorId: row.vendor_id,
      priceRating: row.price_rating ?? undefined,
      qualityRating: row.quality_rating ?? undefined,
      deliveryRating: row.delivery_rating ?? undefined,
      serviceRating: row.service_rating ?? undefined
    }));
  }

  async getOrCreateStrategy(projectId: number): Promise<ProjectProcurementStrategy> {
    await this.db.query(
      `INSERT INTO project_procurement_strategies
         (project_id, strategy, allow_partial_fulfill, preferred_vendor_ids, excluded_vendor_ids, created_at, updated_at)
       VALUES ($1, $2, true, '', '', NOW(), NOW())
       ON CONFLICT (project_id) DO NOTHING`,
      [projectId, DEFAULT_STRATEGY]
    );

    const result = await this.db.query<StrategyRow>(
      `SELECT id, project_id, strategy, max_vendors, min_vendor_rating,
              preferred_vendor_ids, excluded_vendor_ids, allow_partial_fulfill
       FROM project_procurement_strategies WHERE project_id = $1`,
      [projectId]
    );

    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError('Project', projectId);
    }
    return this.toStrategy(row);
  }

  async updateStrategyName(
    projectId: number,
    strategy: ProcurementStrategyName
  ): Promise<ProjectProcurementStrategy> {
    await this.getOrCreateStrategy(projectId);

    const result = await this.db.query<StrategyRow>(
      `UPDATE project_procurement_strategies
       SET strategy = $2, updated_at = NOW()
       WHERE project_id = $1
       RETURNING id, project_id, strategy, max_vendors, min_vendor_rating,
                 preferred_vendor_ids, excluded_vendor_ids, allow_partial_fulfill`,
      [projectId, strategy]
    );

    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError('Project', projectId);
    }
    return this.toStrategy(row);
  }

  private toStrategy(row: StrategyRow): ProjectProcurementStrategy {
    let strategy = DEFAULT_STRATEGY;
    if (isProcurementStrategy(row.strategy)) {
      strategy = row.strategy;
    } else {
      logger.warn(`Unknown stored strategy '${row.strategy}', using ${DEFAULT_STRATEGY}`, {
        component: 'ProcurementStore',
        projectId: row.project_id
      });
    }

    return {
      id: row.id,
      projectId: row.project_id,
      strategy,
      maxVendors: row.max_vendors ?? undefined,
      minVendorRating: toOptionalNumber(row.min_vendor_rating),
      preferredVendorIds: parseIdList(row.preferred_vendor_ids),
      excludedVendorIds: parseIdList(row.excluded_vendor_ids),
      allowPartialFulfill: row.allow_partial_fulfill
    };
  }

  private async loadSpecifications(ids: number[]): Promise<Map<number, Specification>> {
    const specifications = new Map<number, Specification>();
    if (ids.length === 0) {
      return specifications;
    }

    const specResult = await this.db.query<SpecificationRow>(
      `SELECT id, name, description FROM specifications WHERE id = ANY($1::int[])`,
      [ids]
    );
    const attrResult = await this.db.query<SpecificationAttributeRow>(
      `SELECT id, specification_id, name, data_type, unit, is_required,
              min_value, max_value, description
       FROM specification_attributes
       WHERE specification_id = ANY($1::int[])
       ORDER BY id`,
      [ids]
    );

    for (const row of specResult.rows) {
      specifications.set(row.id, {
        id: row.id,
        name: row.name,
        description: row.description ?? undefined,
        attributes: []
      });
    }

    for (const row of attrResult.rows) {
      const attribute = this.toSpecificationAttribute(row);
      if (attribute) {
        specifications.get(row.specification_id)?.attributes.push(attribute);
      }
    }

    return specifications;
  }

  private toSpecificationAttribute(row: SpecificationAttributeRow): SpecificationAttribute | null {
    const dataType = row.data_type === 'number' || row.data_type === 'text' || row.data_type === 'boolean'
      ? row.data_type
      : null;
    if (!dataType) {
      logger.warn(`Skipping specification attribute ${row.id}: unknown data type '${row.data_type}'`, {
        component: 'ProcurementStore'
      });
      return null;
    }

    let minValue = toOptionalNumber(row.min_value);
    let maxValue = toOptionalNumber(row.max_value);
    if (minValue !== undefined && maxValue !== undefined && minValue > maxValue) {
      logger.warn(
        `Specification attribute ${row.id} has minimum ${minValue} above maximum ${maxValue}; ignoring bounds`,
        { component: 'ProcurementStore' }
      );
      minValue = undefined;
      maxValue = undefined;
    }

    return {
      id: row.id,
      specificationId: row.specification_id,
      name: row.name,
      dataType,
      unit: row.unit ?? undefined,
      isRequired: row.is_required,
      minValue,
      maxValue,
      description: row.description ?? undefined
    };
  }

  private async loadProductAttributes(productIds: number[]): Promise<Map<number, ProductAttribute[]>> {
    const byProduct = new Map<number, ProductAttribute[]>();
    if (productIds.length === 0) {
      return byProduct;
    }

    const result = await this.db.query<ProductAttributeRow>(
      `SELECT id, product_id, specification_attribute_id, value_text, value_number, value_boolean
       FROM product_attributes
       WHERE product_id = ANY($1::int[])
       ORDER BY id`,
      [productIds]
    );

    for (const row of result.rows) {
      const value = this.toAttributeValue(row);
      if (!value) {
        continue;
      }
      const attributes = byProduct.get(row.product_id) ?? [];
      attributes.push({
        id: row.id,
        productId: row.product_id,
        specificationAttributeId: row.specification_attribute_id,
        value
      });
      byProduct.set(row.product_id, attributes);
    }

    return byProduct;
  }

  /**
   * Exactly one value column must be populated
   */
  private toAttributeValue(row: ProductAttributeRow): AttributeValue | null {
    const values: AttributeValue[] = [];
    if (row.value_text !== null) {values.push({ kind: 'text', value: row.value_text });}
    if (row.value_number !== null) {values.push({ kind: 'number', value: toNumber(row.value_number) });}
    if (row.value_boolean !== null) {values.push({ kind: 'boolean', value: row.value_boolean });}

    if (values.length !== 1) {
      logger.warn(
        `Skipping product attribute ${row.id}: expected one value, found ${values.length}`,
        { component: 'ProcurementStore' }
      );
      return null;
    }
    return values[0];
  }

  private async toQuotes(rows: QuoteRow[]): Promise<Quote[]> {
    const priced = rows.filter(row => {
      if (toNumber(row.price) > 0) {
        return true;
      }
      logger.warn(`Skipping quote ${row.id}: price must be positive, got ${row.price}`, {
        component: 'ProcurementStore'
      });
      return false;
    });
    const attributes = await this.loadProductAttributes([...new Set(priced.map(row => row.product_id))]);

    return priced.map(row => ({
      id: row.id,
      vendorId: row.vendor_id,
      productId: row.product_id,
      vendor: {
        id: row.vendor_id,
        name: row.vendor_name,
        currency: row.vendor_currency,
        discountCode: row.discount_code ?? undefined
      },
      product: {
        id: row.product_id,
        name: row.product_name,
        brandId: row.brand_id,
        brandName: row.brand_name ?? undefined,
        specificationId: row.specification_id ?? undefined,
        attributes: attributes.get(row.product_id) ?? []
      },
      price: toNumber(row.price),
      currency: row.currency ?? '',
      quoteDate: row.quote_date,
      validUntil: row.valid_until ?? undefined,
      minQuantity: row.min_quantity ?? undefined,
      replacedById: row.replaced_by ?? undefined,
      notes: row.notes ?? undefined
    }));
  }
}
