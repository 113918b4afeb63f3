/**
 * Attribute Compliance Matcher
 * Checks a product's attribute values against a specification's declared attributes
 */

import {
  ComplianceIssue,
  ComplianceResult,
  Product,
  ProductAttribute,
  Specification,
  SpecificationAttribute
} from '../types/core';

export class ComplianceMatcher {
  /**
   * Evaluate a product against a specification
   */
  evaluate(specification: Specification | null, product: Product): ComplianceResult {
    const perAttribute: Record<number, boolean> = {};
    const issues: ComplianceIssue[] = [];
    let overallCompliant = true;

    const valuesByAttribute = new Map<number, ProductAttribute>();
    for (const attribute of product.attributes) {
      valuesByAttribute.set(attribute.specificationAttributeId, attribute);
    }

    const requiredIds = new Set<number>();

    for (const attribute of specification?.attributes ?? []) {
      if (attribute.isRequired) {
        requiredIds.add(attribute.id);
      }

      const issue = this.checkAttribute(attribute, valuesByAttribute.get(attribute.id));
      perAttribute[attribute.id] = issue === null;

      if (issue) {
        issues.push(issue);
        if (attribute.isRequired) {
          overallCompliant = false;
        }
      }
    }

    const extraAttributes = product.attributes.filter(
      value => !requiredIds.has(value.specificationAttributeId)
    );

    return { perAttribute, issues, overallCompliant, extraAttributes };
  }

  private checkAttribute(
    attribute: SpecificationAttribute,
    offered: ProductAttribute | undefined
  ): ComplianceIssue | null {
    const issue = (type: ComplianceIssue['type'], message: string): ComplianceIssue => ({
      attributeId: attribute.id,
      attributeName: attribute.name,
      type,
      required: attribute.isRequired,
      message
    });

    if (!offered || (offered.value.kind === 'text' && offered.value.value.trim().length === 0)) {
      return issue('missing', `${attribute.name} has no value`);
    }

    const { value } = offered;
    if (value.kind !== attribute.dataType) {
      return issue(
        'type-mismatch',
        `${attribute.name} expects a ${attribute.dataType} value, got ${value.kind}`
      );
    }

    if (value.kind === 'number') {
      const unit = attribute.unit ? ` ${attribute.unit}` : '';
      if (attribute.minValue !== undefined && value.value < attribute.minValue) {
        return issue(
          'below-minimum',
          `${attribute.name} ${value.value}${unit} is below the minimum of ${attribute.minValue}${unit}`
        );
      }
      if (attribute.maxValue !== undefined && value.value > attribute.maxValue) {
        return issue(
          'above-maximum',
          `${attribute.name} ${value.value}${unit} exceeds the maximum of ${attribute.maxValue}${unit}`
        );
      }
    }

    return null;
  }
}
