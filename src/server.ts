/**
 * Production Server Entry Point
 * Starts the procurement recommendation engine API Gateway
 */

import { Pool } from 'pg';
import { createClient, RedisClientType } from 'redis';
import { APIGateway } from './api/gateway';
import { ConfigurationManager } from './config/manager';
import { FeatureFlagsManager } from './config/feature-flags';
import { PostgresProcurementStore } from './store/postgres-store';
import { ProcurementService } from './procurement/service';

async function startServer(): Promise<void> {
  const version = process.env.APP_VERSION || 'dev';
  console.log('Starting procurement recommendation engine...');
  console.log(`Version: ${version}`);

  // Initialize database connection
  const pool = new Pool({
    host: process.env.DATABASE_HOST || 'localhost',
    port: parseInt(process.env.DATABASE_PORT || '5432'),
    database: process.env.DATABASE_NAME || 'procurement',
    user: process.env.DATABASE_USER || 'postgres',
    password: process.env.DATABASE_PASSWORD || 'postgres'
  });

  console.log('Connecting to PostgreSQL...');
  try {
    await pool.query('SELECT 1');
    console.log('✓ PostgreSQL connected');
  } catch (error) {
    console.error('Failed to connect to PostgreSQL:', error);
    process.exit(1);
  }

  // Initialize Redis client
  const redisUrl = process.env.REDIS_URL || 'redis://localhost:6379';
  console.log('Connecting to Redis...');
  const redis: RedisClientType = createClient({ url: redisUrl });

  redis.on('error', (err) => {
    console.error('Redis error:', err);
  });

  try {
    await redis.connect();
    console.log('✓ Redis connected');
  } catch (error) {
    console.error('Failed to connect to Redis:', error);
    process.exit(1);
  }

  // Initialize components
  console.log('Initializing components...');
  const featureFlags = FeatureFlagsManager.fromEnvironment();
  const configManager = new ConfigurationManager(pool, redis);
  const store = new PostgresProcurementStore(pool);
  const service = new ProcurementService(store, configManager, featureFlags);

  try {
    const engineConfig = await configManager.getEngineConfig();
    console.log(`✓ Engine configuration loaded (reference currency ${engineConfig.referenceCurrency})`);
  } catch (error) {
    console.warn('⚠️  Could not load engine configuration:', error);
  }

  // Start API Gateway
  const port = parseInt(process.env.API_PORT || '3000');
  const apiGateway = new APIGateway(service, configManager, featureFlags);

  console.log(`Starting API Gateway on port ${port}...`);
  await apiGateway.start(port);
  console.log(`✓ API Gateway running on http://0.0.0.0:${port}`);
  console.log(`\nHealth check: http://localhost:${port}/health`);

  // Handle graceful shutdown
  const shutdown = async (signal: string, isError: boolean = false) => {
    if (isError) {
      console.error(`\n${signal} received. Shutting down due to error...`);
    } else {
      console.log(`\n${signal} received. Shutting down gracefully...`);
    }
    try {
      await apiGateway.stop();
      await redis.disconnect();
      console.log('✓ Redis disconnected');
      await pool.end();
      console.log('✓ PostgreSQL disconnected');
      console.log('Shutdown complete');
      process.exit(isError ? 1 : 0);
    } catch (error) {
      console.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM', false));
  process.on('SIGINT', () => void shutdown('SIGINT', false));

  // Handle uncaught errors
  process.on('uncaughtException', (error) => {
    console.error('Uncaught exception:', error);
    void shutdown('UNCAUGHT_EXCEPTION', true);
  });

  process.on('unhandledRejection', (reason, promise) => {
    console.error('Unhandled rejection at:', promise, 'reason:', reason);
    void shutdown('UNHANDLED_REJECTION', true);
  });
}

// Start the server
startServer().catch((error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
