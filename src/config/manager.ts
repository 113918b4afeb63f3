/**
 * Configuration Manager
 * Manages engine configuration with database persistence and Redis caching
 */

import { Pool } from 'pg';
import { RedisClientType } from 'redis';
import { IConfigurationManager } from '../interfaces/IConfigurationManager';
import { EngineConfig } from '../types/core';
import { DEFAULT_ENGINE_CONFIG } from './defaults';

/**
 * Configuration validation error
 */
export class ConfigurationValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationValidationError';
  }
}

const NUMERIC_FIELDS = [
  'expiryWarningDays',
  'concentrationThreshold',
  'balancedCostWeight',
  'balancedVendorWeight',
  'staleQuoteDays',
  'forexStaleAfterDays',
  'neutralRating',
  'adminCostPerVendor'
] as const satisfies ReadonlyArray<keyof EngineConfig>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a partial configuration from an untrusted request body
 */
export function parseEngineConfigUpdate(body: unknown): Partial<EngineConfig> {
  if (!isRecord(body)) {
    throw new ConfigurationValidationError('Configuration update must be a JSON object');
  }

  const updates: Partial<EngineConfig> = {};
  for (const [key, value] of Object.entries(body)) {
    if (key === 'referenceCurrency') {
      if (typeof value !== 'string') {
        throw new ConfigurationValidationError('referenceCurrency must be a string');
      }
      updates.referenceCurrency = value;
      continue;
    }

    const field = NUMERIC_FIELDS.find(name => name === key);
    if (!field) {
      throw new ConfigurationValidationError(`Unknown configuration field '${key}'`);
    }
    if (typeof value !== 'number') {
      throw new ConfigurationValidationError(`${field} must be a number`);
    }
    updates[field] = value;
  }

  return updates;
}

/**
 * Configuration Manager implementation
 */
export class ConfigurationManager implements IConfigurationManager {
  private db: Pool;
  private redis: RedisClientType;
  private readonly CACHE_KEYS = {
    engine: 'config:engine'
  };

  constructor(db: Pool, redis: RedisClientType) {
    this.db = db;
    this.redis = redis;
  }

  /**
   * Get current engine configuration
   */
  async getEngineConfig(): Promise<EngineConfig> {
    // Try cache first
    const cached = await this.redis.get(this.CACHE_KEYS.engine);
    if (cached) {
      const parsed: unknown = JSON.parse(cached);
      return this.deserializeEngineConfig(parsed);
    }

    // Fetch from database
    const result = await this.db.query<{ config_data: unknown }>(
      `SELECT config_data FROM configurations
       WHERE config_type = 'engine' AND active = true
       ORDER BY version DESC LIMIT 1`
    );

    if (result.rows.length === 0) {
      // Return default configuration
      return this.getDefaultEngineConfig();
    }

    const config = this.deserializeEngineConfig(result.rows[0].config_data);

    // Cache it
    await this.redis.set(this.CACHE_KEYS.engine, JSON.stringify(result.rows[0].config_data));

    return config;
  }

  /**
   * Update engine configuration
   */
  async updateEngineConfig(updates: Partial<EngineConfig>): Promise<EngineConfig> {
    const config: EngineConfig = { ...(await this.getEngineConfig()), ...updates };
    config.referenceCurrency = config.referenceCurrency.trim().toUpperCase();

    // Validate configuration
    this.validateEngineConfig(config);

    // Get current version
    const versionResult = await this.db.query<{ max_version: number | string }>(
      `SELECT COALESCE(MAX(version), 0) as max_version
       FROM configurations WHERE config_type = 'engine'`
    );
    const newVersion = Number(versionResult.rows[0]?.max_version ?? 0) + 1;

    // Deactivate old configurations
    await this.db.query(
      `UPDATE configurations SET active = false
       WHERE config_type = 'engine' AND active = true`
    );

    // Insert new configuration
    await this.db.query(
      `INSERT INTO configurations (id, config_type, config_data, version, created_at, active)
       VALUES (gen_random_uuid(), 'engine', $1, $2, NOW(), true)`,
      [JSON.stringify(config), newVersion]
    );

    // Invalidate cache
    await this.redis.del(this.CACHE_KEYS.engine);

    return config;
  }

  validateEngineConfig(config: EngineConfig): void {
    if (!/^[A-Z]{3}$/.test(config.referenceCurrency)) {
      throw new ConfigurationValidationError(
        `Reference currency must be a three-letter ISO 4217 code, got '${config.referenceCurrency}'`
      );
    }

    for (const field of NUMERIC_FIELDS) {
      if (!Number.isFinite(config[field]) || config[field] < 0) {
        throw new ConfigurationValidationError(`${field} must be a non-negative number`);
      }
    }

    if (config.concentrationThreshold <= 0 || config.concentrationThreshold > 1) {
      throw new ConfigurationValidationError(
        'Concentration threshold must be greater than 0 and at most 1'
      );
    }

    if (config.balancedCostWeight + config.balancedVendorWeight <= 0) {
      throw new ConfigurationValidationError('Balanced weights must not both be zero');
    }

    if (config.staleQuoteDays <= 0 || config.forexStaleAfterDays <= 0) {
      throw new ConfigurationValidationError('Staleness windows must be positive');
    }

    if (config.neutralRating < 1 || config.neutralRating > 5) {
      throw new ConfigurationValidationError('Neutral rating must be between 1 and 5');
    }
  }

  private deserializeEngineConfig(raw: unknown): EngineConfig {
    if (!isRecord(raw)) {
      throw new ConfigurationValidationError('Stored engine configuration must be an object');
    }

    const config = this.getDefaultEngineConfig();
    const { referenceCurrency } = raw;
    if (typeof referenceCurrency === 'string') {
      config.referenceCurrency = referenceCurrency.trim().toUpperCase();
    }
    for (const field of NUMERIC_FIELDS) {
      const value = raw[field];
      if (typeof value === 'number') {
        config[field] = value;
      }
    }

    this.validateEngineConfig(config);
    return config;
  }

  private getDefaultEngineConfig(): EngineConfig {
    return { ...DEFAULT_ENGINE_CONFIG };
  }
}
