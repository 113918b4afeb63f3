/**
 * Default engine configuration
 */

import { EngineConfig } from '../types/core';

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  referenceCurrency: 'USD',
  expiryWarningDays: 14,
  concentrationThreshold: 0.6,
  balancedCostWeight: 0.6,
  balancedVendorWeight: 0.4,
  staleQuoteDays: 90,
  forexStaleAfterDays: 30,
  neutralRating: 3,
  adminCostPerVendor: 250
};
