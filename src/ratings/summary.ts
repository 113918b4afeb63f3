/**
 * Vendor rating aggregation
 */

import { VendorRatingRecord, VendorRatingSummary } from '../types/core';

type RatingCategory = 'priceRating' | 'qualityRating' | 'deliveryRating' | 'serviceRating';

function average(records: VendorRatingRecord[], category: RatingCategory): number | undefined {
  const values = records
    .map(record => record[category])
    .filter((value): value is number => value !== undefined);
  if (values.length === 0) {
    return undefined;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Summarize raw rating rows; overallAvg is the mean of the category averages present
 */
export function summarizeVendorRatings(
  vendorId: number,
  records: VendorRatingRecord[]
): VendorRatingSummary {
  const summary: VendorRatingSummary = {
    vendorId,
    totalRatings: records.length,
    avgPrice: average(records, 'priceRating'),
    avgQuality: average(records, 'qualityRating'),
    avgDelivery: average(records, 'deliveryRating'),
    avgService: average(records, 'serviceRating')
  };

  const categories = [summary.avgPrice, summary.avgQuality, summary.avgDelivery, summary.avgService]
    .filter((value): value is number => value !== undefined);
  if (categories.length > 0) {
    summary.overallAvg = categories.reduce((sum, value) => sum + value, 0) / categories.length;
  }

  return summary;
}
