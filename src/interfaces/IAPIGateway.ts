import { Express } from 'express';

/**
 * API Gateway Interface
 * Handles REST API endpoints for the procurement recommendation engine
 */
export interface IAPIGateway {
  /**
   * Express application, for mounting or in-process testing
   */
  getApp(): Express;

  /**
   * Start the API server
   */
  start(port: number): Promise<void>;

  /**
   * Stop the API server
   */
  stop(): Promise<void>;
}
