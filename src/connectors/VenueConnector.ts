/**
 * Venue connector contracts consumed by the engine, and a base implementation
 * providing rate limiting, a circuit breaker and retries for idempotent reads
 */

import { MarketOrderParams, OrderRecord, PlaceOrderParams } from '../models/Order';
import { OrderBookSnapshot } from '../models/OrderBook';
import { ConnectorStatus, VenueRole } from '../models/ConnectorStatus';
import { ApplicationError, defaultSleep, ErrorCategory, SleepFn } from '../utils/ErrorHandler';

export interface VenueCredentials {
  apiKey: string;
  secret: string;
  passphrase?: string;
}

/**
 * Venue where resting limit orders are quoted
 */
export interface IPrimaryVenueConnector {
  readonly venueId: string;

  fetchOrderBook(instrument: string): Promise<OrderBookSnapshot>;

  placeOrder(params: PlaceOrderParams): Promise<OrderRecord>;

  /**
   * Resolves false when the venue will not cancel the order (already filled or gone)
   */
  cancelOrder(orderId: string): Promise<boolean>;

  getOrderStatus(orderId: string): Promise<OrderRecord>;

  getStatus(): ConnectorStatus;
}

/**
 * Venue where fills are hedged with market orders
 */
export interface ISecondaryVenueConnector {
  readonly venueId: string;

  placeMarketOrder(params: MarketOrderParams): Promise<OrderRecord>;

  /**
   * Used for spread reporting only
   */
  fetchOrderBook?(instrument: string): Promise<OrderBookSnapshot>;

  getStatus(): ConnectorStatus;
}

export type CircuitBreakerState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeout: number;
  monitoringPeriod: number;
}

export interface RateLimiterConfig {
  requestsPerSecond: number;
}

export interface RetryConfig {
  maxRetries: number;
  baseDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
}

export interface ProtectionOptions {
  /** Retry only requests that are safe to repeat */
  idempotent: boolean;
}

export interface BaseConnectorOptions {
  circuitBreaker?: CircuitBreakerConfig;
  rateLimiter?: RateLimiterConfig;
  retry?: RetryConfig;
  sleep?: SleepFn;
  now?: () => number;
}

export class CircuitOpenError extends Error {
  constructor(venueName: string) {
    super(`Circuit breaker is open for ${venueName}`);
    this.name = 'CircuitOpenError';
  }
}

/**
 * Base venue connector with common request protection
 */
export abstract class BaseVenueConnector {
  readonly venueId: string;
  protected readonly name: string;
  protected readonly role: VenueRole;

  private circuitBreakerState: CircuitBreakerState = 'closed';
  private failureCount = 0;
  private lastFailureTime = 0;
  private readonly circuitBreakerConfig: CircuitBreakerConfig;

  private requestTimes: number[] = [];
  private readonly rateLimiterConfig: RateLimiterConfig;

  private readonly retryConfig: RetryConfig;
  protected readonly sleep: SleepFn;
  protected readonly now: () => number;

  private lastRequestAt?: Date;
  private latency = 0;
  private recentErrors: number[] = [];
  private recentRequests: number[] = [];

  constructor(venueId: string, name: string, role: VenueRole, options: BaseConnectorOptions = {}) {
    this.venueId = venueId;
    this.name = name;
    this.role = role;
    this.circuitBreakerConfig = options.circuitBreaker ?? {
      failureThreshold: 5,
      recoveryTimeout: 60000,
      monitoringPeriod: 300000
    };
    this.rateLimiterConfig = options.rateLimiter ?? { requestsPerSecond: 10 };
    this.retryConfig = options.retry ?? {
      maxRetries: 2,
      baseDelay: 250,
      maxDelay: 2000,
      backoffMultiplier: 2
    };
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * Executes a request behind the circuit breaker and rate limiter.
   * Idempotent requests are retried with exponential backoff; writes are attempted once.
   */
  protected async executeWithProtection<T>(
    operation: () => Promise<T>,
    operationName: string,
    options: ProtectionOptions
  ): Promise<T> {
    if (!this.isCircuitBreakerClosed()) {
      throw new CircuitOpenError(this.name);
    }

    const maxRetries = options.idempotent ? this.retryConfig.maxRetries : 0;
    let lastError: Error | undefined;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      await this.applyRateLimit();
      const startTime = this.now();
      try {
        const result = await operation();
        this.latency = this.now() - startTime;
        this.recordSuccess();
        return result;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        if (!this.isTransportFailure(lastError)) {
          // the venue answered; a refusal is not a connectivity problem
          throw lastError;
        }
        this.recordFailure();

        if (attempt === maxRetries || !this.isCircuitBreakerClosed()) {
          break;
        }

        const delay = Math.min(
          this.retryConfig.baseDelay * Math.pow(this.retryConfig.backoffMultiplier, attempt),
          this.retryConfig.maxDelay
        );
        await this.sleep(delay);
      }
    }

    throw new Error(`${operationName} on ${this.name} failed after retries: ${lastError?.message ?? 'Unknown error'}`);
  }

  /**
   * Whether an error means the request never got a venue answer.
   * Classified engine errors are venue answers unless they are network errors.
   */
  protected isTransportFailure(error: Error): boolean {
    return !(error instanceof ApplicationError) || error.category === ErrorCategory.NETWORK;
  }

  private isCircuitBreakerClosed(): boolean {
    switch (this.circuitBreakerState) {
      case 'closed':
      case 'half-open':
        return true;
      case 'open':
        if (this.now() - this.lastFailureTime > this.circuitBreakerConfig.recoveryTimeout) {
          this.circuitBreakerState = 'half-open';
          return true;
        }
        return false;
    }
  }

  private recordSuccess(): void {
    this.failureCount = 0;
    if (this.circuitBreakerState === 'half-open') {
      this.circuitBreakerState = 'closed';
    }
  }

  private recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();

    if (this.failureCount >= this.circuitBreakerConfig.failureThreshold || this.circuitBreakerState === 'half-open') {
      this.circuitBreakerState = 'open';
    }

    this.recentErrors.push(this.now());
  }

  private async applyRateLimit(): Promise<void> {
    const now = this.now();
    this.requestTimes = this.requestTimes.filter(time => now - time < 1000);

    if (this.requestTimes.length >= this.rateLimiterConfig.requestsPerSecond) {
      const waitTime = 1000 - (now - Math.min(...this.requestTimes));
      if (waitTime > 0) {
        await this.sleep(waitTime);
      }
    }

    const sentAt = this.now();
    this.requestTimes.push(sentAt);
    this.recentRequests = this.recentRequests.filter(time => sentAt - time < this.circuitBreakerConfig.monitoringPeriod);
    this.recentRequests.push(sentAt);
    this.lastRequestAt = new Date(sentAt);
  }

  private errorRate(): number {
    const cutoff = this.now() - this.circuitBreakerConfig.monitoringPeriod;
    this.recentErrors = this.recentErrors.filter(time => time > cutoff);
    this.recentRequests = this.recentRequests.filter(time => time > cutoff);
    return this.recentRequests.length > 0 ? Math.min(1, this.recentErrors.length / this.recentRequests.length) : 0;
  }

  getCircuitBreakerState(): CircuitBreakerState {
    return this.circuitBreakerState;
  }

  getStatus(): ConnectorStatus {
    const errorRate = this.errorRate();
    let status: ConnectorStatus['status'];

    if (this.circuitBreakerState === 'open') {
      status = 'offline';
    } else if (this.circuitBreakerState === 'half-open' || errorRate > 0.1) {
      status = 'degraded';
    } else {
      status = 'healthy';
    }

    return {
      connectorId: this.venueId,
      role: this.role,
      name: this.name,
      status,
      lastRequestAt: this.lastRequestAt,
      latency: this.latency,
      errorRate
    };
  }
}
