import { EngineConfig } from '../types/core';

/**
 * Configuration Manager Interface
 * Manages engine configuration
 */
export interface IConfigurationManager {
  /**
   * Get the active engine configuration, or the defaults when none is stored
   */
  getEngineConfig(): Promise<EngineConfig>;

  /**
   * Validate and store a new configuration version
   */
  updateEngineConfig(updates: Partial<EngineConfig>): Promise<EngineConfig>;
}
