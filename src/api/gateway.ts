/**
 * REST API Gateway
 * Exposes the procurement engine operations over HTTP
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { Server } from 'http';

import { IAPIGateway } from '../interfaces/IAPIGateway';
import { IProcurementService } from '../interfaces/IProcurementService';
import { IConfigurationManager } from '../interfaces/IConfigurationManager';
import { FeatureFlagsManager } from '../config/feature-flags';
import { ConfigurationValidationError, parseEngineConfigUpdate } from '../config/manager';
import {
  InvalidStrategyError,
  NotFoundError,
  ProcurementError
} from '../errors/procurement-errors';
import { procurementMetricsRegistry } from '../monitoring/metrics';
import { summarizeRisk } from '../reporting/risk-assessor';
import { logger } from '../utils/logger';
import { ErrorResponse } from '../types/core';

/**
 * Raised for path ids that are not positive integers
 */
class InvalidIdError extends Error {
  readonly parameter: string;

  constructor(parameter: string, value: string) {
    super(`Parameter '${parameter}' must be a positive integer, got '${value}'`);
    this.name = 'InvalidIdError';
    this.parameter = parameter;
  }
}

/**
 * Parse a route parameter as a positive integer id
 */
export function parseId(value: string, parameter: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidIdError(parameter, value);
  }
  const id = Number(value);
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new InvalidIdError(parameter, value);
  }
  return id;
}

function parseFlag(value: unknown): boolean {
  return value === 'true' || value === '1';
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * API Gateway implementation
 */
export class APIGateway implements IAPIGateway {
  private app: Express;
  private server?: Server;
  private service: IProcurementService;
  private configManager: IConfigurationManager;
  private featureFlags: FeatureFlagsManager;

  constructor(
    service: IProcurementService,
    configManager: IConfigurationManager,
    featureFlags: FeatureFlagsManager = new FeatureFlagsManager()
  ) {
    this.app = express();
    this.service = service;
    this.configManager = configManager;
    this.featureFlags = featureFlags;

    this.setupMiddleware();
    this.setupRoutes();
  }

  getApp(): Express {
    return this.app;
  }

  /**
   * Set up Express middleware
   */
  private setupMiddleware(): void {
    // CORS
    this.app.use(cors());

    // JSON body parser
    this.app.use(express.json());

    // Rate limiting (disabled in test mode and development mode)
    const isTestMode = process.env.NODE_ENV === 'test';
    const isDevelopment = process.env.NODE_ENV === 'development';
    if (!isTestMode && !isDevelopment && this.featureFlags.isRateLimitingEnabled()) {
      const limiter = rateLimit({
        windowMs: 15 * 60 * 1000, // 15 minutes
        max: 300,
        message: 'Too many requests from this IP, please try again later'
      });
      this.app.use('/api/', limiter);
    }

    // Request logging
    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      logger.debug(`${req.method} ${req.path}`, { component: 'APIGateway' });
      next();
    });
  }

  /**
   * Set up API routes
   */
  private setupRoutes(): void {
    // Health check endpoint
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        version: process.env.APP_VERSION || 'dev'
      });
    });

    if (this.featureFlags.isMetricsEnabled()) {
      this.app.get('/metrics', this.getMetrics.bind(this));
    }

    // API v1 routes

    this.app.get('/api/v1/projects/:projectId/scenarios', this.getScenarios.bind(this));
    this.app.get('/api/v1/projects/:projectId/recommendations', this.getRecommendations.bind(this));
    this.app.get('/api/v1/projects/:projectId/risks', this.getRisks.bind(this));
    this.app.get('/api/v1/projects/:projectId/savings', this.getSavings.bind(this));
    this.app.get('/api/v1/projects/:projectId/consolidation', this.getConsolidation.bind(this));
    this.app.get('/api/v1/projects/:projectId/comparison', this.getComparison.bind(this));
    this.app.get('/api/v1/projects/:projectId/strategy', this.getStrategy.bind(this));
    this.app.put('/api/v1/projects/:projectId/strategy', this.setStrategy.bind(this));

    this.app.get(
      '/api/v1/specifications/:specificationId/quotes',
      this.getSpecificationQuotes.bind(this)
    );
    this.app.get('/api/v1/products/:productId/quotes', this.getProductQuotes.bind(this));

    this.app.get('/api/v1/config/engine', this.getEngineConfig.bind(this));
    this.app.put('/api/v1/config/engine', this.updateEngineConfig.bind(this));

    // 404 for everything else
    this.app.use((req: Request, res: Response) => {
      res
        .status(404)
        .json(this.createErrorResponse('NOT_FOUND', `Route ${req.method} ${req.path} not found`));
    });

    this.app.use(this.errorHandler.bind(this));
  }

  private async getMetrics(_req: Request, res: Response): Promise<void> {
    try {
      res.set('Content-Type', procurementMetricsRegistry.contentType);
      res.end(await procurementMetricsRegistry.metrics());
    } catch (error) {
      this.sendError(res, error);
    }
  }

  private async getScenarios(req: Request, res: Response): Promise<void> {
    await this.respond(res, () =>
      this.service.compareScenarios(parseId(req.params.projectId, 'projectId'))
    );
  }

  private async getRecommendations(req: Request, res: Response): Promise<void> {
    await this.respond(res, () =>
      this.service.generateVendorRecommendations(
        parseId(req.params.projectId, 'projectId'),
        optionalString(req.query.strategy)
      )
    );
  }

  private async getRisks(req: Request, res: Response): Promise<void> {
    await this.respond(res, async () => {
      const projectId = parseId(req.params.projectId, 'projectId');
      const findings = await this.service.assessEnhancedProjectRisks(projectId);
      return { projectId, findings, summary: summarizeRisk(findings) };
    });
  }

  private async getSavings(req: Request, res: Response): Promise<void> {
    await this.respond(res, () =>
      this.service.calculateProjectSavings(parseId(req.params.projectId, 'projectId'))
    );
  }

  private async getConsolidation(req: Request, res: Response): Promise<void> {
    await this.respond(res, () =>
      this.service.getVendorConsolidationAnalysis(parseId(req.params.projectId, 'projectId'))
    );
  }

  private async getComparison(req: Request, res: Response): Promise<void> {
    await this.respond(res, () =>
      this.service.getProjectProcurementComparison(parseId(req.params.projectId, 'projectId'))
    );
  }

  private async getStrategy(req: Request, res: Response): Promise<void> {
    await this.respond(res, () =>
      this.service.getProjectStrategy(parseId(req.params.projectId, 'projectId'))
    );
  }

  private async setStrategy(req: Request, res: Response): Promise<void> {
    const body: unknown = req.body;
    const strategy =
      typeof body === 'object' && body !== null && 'strategy' in body ? body.strategy : undefined;

    if (typeof strategy !== 'string') {
      res
        .status(400)
        .json(
          this.createErrorResponse(
            'INVALID_REQUEST',
            'Request body must include a "strategy" field of type string'
          )
        );
      return;
    }

    await this.respond(res, () =>
      this.service.setProjectStrategy(parseId(req.params.projectId, 'projectId'), strategy)
    );
  }

  private async getSpecificationQuotes(req: Request, res: Response): Promise<void> {
    await this.respond(res, () =>
      this.service.compareQuotesForSpecification(
        parseId(req.params.specificationId, 'specificationId'),
        parseFlag(req.query.includeExtras)
      )
    );
  }

  private async getProductQuotes(req: Request, res: Response): Promise<void> {
    await this.respond(res, () =>
      this.service.compareQuotesForProduct(
        parseId(req.params.productId, 'productId'),
        parseFlag(req.query.includeExtras)
      )
    );
  }

  private async getEngineConfig(_req: Request, res: Response): Promise<void> {
    await this.respond(res, () => this.configManager.getEngineConfig());
  }

  private async updateEngineConfig(req: Request, res: Response): Promise<void> {
    const body: unknown = req.body;
    await this.respond(res, () =>
      this.configManager.updateEngineConfig(parseEngineConfigUpdate(body))
    );
  }

  /**
   * Run an operation and answer with its JSON result or a mapped error
   */
  private async respond<T>(res: Response, operation: () => Promise<T>): Promise<void> {
    try {
      res.json(await operation());
    } catch (error) {
      this.sendError(res, error);
    }
  }

  private sendError(res: Response, error: unknown): void {
    if (error instanceof InvalidIdError) {
      res
        .status(400)
        .json(this.createErrorResponse('INVALID_ID', error.message, { parameter: error.parameter }));
      return;
    }

    if (error instanceof NotFoundError) {
      res
        .status(404)
        .json(
          this.createErrorResponse(error.code, error.message, {
            entity: error.entity,
            id: error.entityId
          })
        );
      return;
    }

    if (error instanceof InvalidStrategyError) {
      res
        .status(400)
        .json(this.createErrorResponse(error.code, error.message, { strategy: error.strategy }));
      return;
    }

    if (error instanceof ConfigurationValidationError) {
      res.status(400).json(this.createErrorResponse('INVALID_CONFIGURATION', error.message));
      return;
    }

    if (error instanceof ProcurementError) {
      res.status(422).json(this.createErrorResponse(error.code, error.message));
      return;
    }

    logger.error('Unhandled API error', { component: 'APIGateway' }, error);
    res.status(500).json(this.internalErrorResponse(error));
  }

  /**
   * Create standardized error response
   */
  private createErrorResponse(
    code: string,
    message: string,
    details?: unknown,
    retryable: boolean = false
  ): ErrorResponse {
    return {
      error: {
        code,
        message,
        details,
        retryable
      },
      timestamp: new Date()
    };
  }

  /**
   * Don't expose internal error details to clients outside development
   */
  private internalErrorResponse(error: unknown): ErrorResponse {
    const isDevelopment = process.env.NODE_ENV === 'development';
    const message =
      isDevelopment && error instanceof Error
        ? error.message
        : 'An internal error occurred. Please try again later.';
    return this.createErrorResponse('INTERNAL_ERROR', message, undefined, true);
  }

  /**
   * Error handling middleware
   */
  private errorHandler(error: Error, req: Request, res: Response, _next: NextFunction): void {
    // Malformed JSON bodies surface here from express.json()
    if (error instanceof SyntaxError) {
      res.status(400).json(this.createErrorResponse('INVALID_REQUEST', 'Malformed JSON body'));
      return;
    }

    logger.error(`Unhandled error on ${req.method} ${req.path}`, { component: 'APIGateway' }, error);
    res.status(500).json(this.internalErrorResponse(error));
  }

  /**
   * Start the API server
   */
  async start(port: number): Promise<void> {
    return new Promise((resolve) => {
      this.server = this.app.listen(port, () => {
        logger.info(`API Gateway listening on port ${port}`, { component: 'APIGateway' });
        resolve();
      });
    });
  }

  /**
   * Stop the API server
   */
  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }

      this.server.close((error) => {
        if (error) {
          reject(error);
        } else {
          this.server = undefined;
          logger.info('API Gateway stopped', { component: 'APIGateway' });
          resolve();
        }
      });
    });
  }
}
