/**
 * Structured Logger Utility
 * Provides clean, consistent logging throughout the application
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR'
}

export interface LogContext {
  requestId?: string;
  component?: string;
  projectId?: number;
  strategy?: string;
  vendorId?: number;
  step?: string;
  duration?: number;
  [key: string]: unknown;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.values(LogLevel).some(level => level === value);
}

export class Logger {
  private static instance: Logger;
  private minLevel: LogLevel = LogLevel.DEBUG;
  private enableTimestamps: boolean = true;

  private constructor() {
    // Check environment for log level
    const envLevel = process.env.LOG_LEVEL?.toUpperCase();
    if (envLevel && isLogLevel(envLevel)) {
      this.minLevel = envLevel;
    }
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  private getLevelPriority(level: LogLevel): number {
    const priorities: Record<LogLevel, number> = {
      [LogLevel.DEBUG]: 0,
      [LogLevel.INFO]: 1,
      [LogLevel.WARN]: 2,
      [LogLevel.ERROR]: 3
    };
    return priorities[level];
  }

  private shouldLog(level: LogLevel): boolean {
    return this.getLevelPriority(level) >= this.getLevelPriority(this.minLevel);
  }

  private formatTimestamp(): string {
    return new Date().toISOString();
  }

  formatContext(ctx: LogContext): string {
    const parts: string[] = [];

    if (ctx.requestId) {parts.push(`req=${ctx.requestId.substring(0, 8)}`);}
    if (ctx.component) {parts.push(`comp=${ctx.component}`);}
    if (ctx.projectId !== undefined) {parts.push(`project=${ctx.projectId}`);}
    if (ctx.strategy) {parts.push(`strategy=${ctx.strategy}`);}
    if (ctx.vendorId !== undefined) {parts.push(`vendor=${ctx.vendorId}`);}
    if (ctx.step) {parts.push(`step=${ctx.step}`);}
    if (ctx.duration !== undefined) {parts.push(`duration=${ctx.duration}ms`);}

    return parts.length > 0 ? `[${parts.join(' | ')}]` : '';
  }

  private formatMessage(level: LogLevel, message: string, ctx?: LogContext, data?: unknown): string {
    const parts: string[] = [];

    if (this.enableTimestamps) {
      parts.push(this.formatTimestamp());
    }

    parts.push(`[${level}]`);

    if (ctx) {
      const contextStr = this.formatContext(ctx);
      if (contextStr) {parts.push(contextStr);}
    }

    parts.push(message);

    if (data !== undefined) {
      if (typeof data === 'string') {
        // Truncate long strings
        const maxLen = 500;
        parts.push(data.length > maxLen ? data.substring(0, maxLen) + '...' : data);
      } else {
        parts.push(JSON.stringify(data, null, 0));
      }
    }

    return parts.join(' ');
  }

  debug(message: string, ctx?: LogContext, data?: unknown): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.log(this.formatMessage(LogLevel.DEBUG, message, ctx, data));
    }
  }

  info(message: string, ctx?: LogContext, data?: unknown): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.log(this.formatMessage(LogLevel.INFO, message, ctx, data));
    }
  }

  warn(message: string, ctx?: LogContext, data?: unknown): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage(LogLevel.WARN, message, ctx, data));
    }
  }

  error(message: string, ctx?: LogContext, data?: unknown): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      console.error(this.formatMessage(LogLevel.ERROR, message, ctx, data));
    }
  }

  // Convenience methods for common log patterns
  analysisStart(operation: string, projectId: number, bomItemCount: number): void {
    this.info(`┌── ${operation.toUpperCase()} ──────────────────────────────────────`, {
      component: 'ProcurementService',
      projectId
    });
    this.info(`│ BOM items: ${bomItemCount}`, { projectId });
  }

  analysisComplete(operation: string, projectId: number, duration: number): void {
    this.info(`└── ${operation.toUpperCase()} COMPLETE (${duration}ms) ─────────────────────`, {
      projectId,
      duration
    });
  }

  scenarioScored(
    projectId: number,
    strategy: string,
    totalCost: number,
    vendorCount: number,
    phase: string
  ): void {
    this.debug(`│ ${strategy}: total=${totalCost.toFixed(2)} vendors=${vendorCount} phase=${phase}`, {
      projectId,
      strategy
    });
  }

  conversionFailed(quoteId: number, vendorId: number, reason: string): void {
    this.warn(`  ├─ ✗ Quote ${quoteId} excluded from totals: ${reason}`, {
      component: 'ComparisonBuilder',
      vendorId
    });
  }

  degradedSelection(projectId: number, bomItemId: number, quoteId: number, reason: string): void {
    this.info(`  ├─ Item ${bomItemId} uses quote ${quoteId} (${reason})`, {
      component: 'ScenarioEvaluator',
      projectId
    });
  }
}

// Export singleton instance
export const logger = Logger.getInstance();
