/**
 * Feature Flags for the Procurement Engine
 * Controls optional runtime behaviour
 */

export interface FeatureFlags {
  enableConcurrentLoading: boolean;
  enableMetrics: boolean;
  enableRateLimiting: boolean;
}

/**
 * Default feature flags (all enabled)
 */
export const DEFAULT_FEATURE_FLAGS: FeatureFlags = {
  enableConcurrentLoading: true,
  enableMetrics: true,
  enableRateLimiting: true
};

/**
 * Feature Flags Manager
 */
export class FeatureFlagsManager {
  private flags: FeatureFlags;

  constructor(flags?: Partial<FeatureFlags>) {
    this.flags = {
      ...DEFAULT_FEATURE_FLAGS,
      ...flags
    };
  }

  /**
   * Check if snapshot loads run concurrently
   */
  isConcurrentLoadingEnabled(): boolean {
    return this.flags.enableConcurrentLoading;
  }

  /**
   * Check if the metrics endpoint and recording are enabled
   */
  isMetricsEnabled(): boolean {
    return this.flags.enableMetrics;
  }

  isRateLimitingEnabled(): boolean {
    return this.flags.enableRateLimiting;
  }

  /**
   * Get all flags
   */
  getAllFlags(): FeatureFlags {
    return { ...this.flags };
  }

  /**
   * Update flags
   */
  updateFlags(updates: Partial<FeatureFlags>): void {
    this.flags = {
      ...this.flags,
      ...updates
    };
  }

  /**
   * Load from environment variables
   */
  static fromEnvironment(): FeatureFlagsManager {
    const flags: Partial<FeatureFlags> = {};

    if (process.env.ENABLE_CONCURRENT_LOADING !== undefined) {
      flags.enableConcurrentLoading = process.env.ENABLE_CONCURRENT_LOADING === 'true';
    }

    if (process.env.ENABLE_METRICS !== undefined) {
      flags.enableMetrics = process.env.ENABLE_METRICS === 'true';
    }

    if (process.env.ENABLE_RATE_LIMITING !== undefined) {
      flags.enableRateLimiting = process.env.ENABLE_RATE_LIMITING === 'true';
    }

    return new FeatureFlagsManager(flags);
  }
}
