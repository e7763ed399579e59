/**
 * Typed engine errors and the backoff policy table that decides how each kind is retried
 */

import { FillEvent } from '../models/Order';

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  CONFIGURATION = 'configuration',
  MARKET_DATA = 'market_data',
  ORDER = 'order',
  HEDGE = 'hedge',
  NETWORK = 'network',
  SYSTEM = 'system'
}

/**
 * Error kinds that carry their own row in the backoff policy table
 */
export enum ErrorKind {
  CONFIGURATION = 'CONFIGURATION',
  SNAPSHOT = 'SNAPSHOT',
  ORDER_REJECTED = 'ORDER_REJECTED',
  HEDGE_FAILURE = 'HEDGE_FAILURE'
}

export interface ErrorContext {
  operation: string;
  component: string;
  venueId?: string;
  orderId?: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

export interface BackoffPolicy {
  intervalMs: number;
  /** Attempts allowed in total; Infinity for kinds retried once per cycle forever */
  maxAttempts: number;
  multiplier: number;
  maxIntervalMs: number;
}

export type BackoffPolicyTable = Record<ErrorKind, BackoffPolicy>;

/**
 * Base engine error with category, severity and retry context
 */
export class ApplicationError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly context: ErrorContext;
  public readonly originalError?: Error;
  public readonly isRetryable: boolean;
  public readonly userMessage: string;
  public readonly suggestedActions: string[];

  constructor(
    message: string,
    code: string,
    category: ErrorCategory,
    severity: ErrorSeverity,
    context: ErrorContext,
    options: {
      originalError?: Error;
      isRetryable?: boolean;
      userMessage?: string;
      suggestedActions?: string[];
    } = {}
  ) {
    super(message);
    this.name = 'ApplicationError';
    this.code = code;
    this.category = category;
    this.severity = severity;
    this.context = context;
    this.originalError = options.originalError;
    this.isRetryable = options.isRetryable ?? this.determineRetryability();
    this.userMessage = options.userMessage ?? this.generateUserMessage();
    this.suggestedActions = options.suggestedActions ?? this.generateSuggestedActions();
  }

  private determineRetryability(): boolean {
    switch (this.category) {
      case ErrorCategory.NETWORK:
      case ErrorCategory.MARKET_DATA:
      case ErrorCategory.ORDER:
        return true;
      case ErrorCategory.SYSTEM:
        return this.severity !== ErrorSeverity.CRITICAL;
      default:
        return false;
    }
  }

  private generateUserMessage(): string {
    switch (this.category) {
      case ErrorCategory.CONFIGURATION:
        return 'The engine configuration is invalid. Fix it and restart.';
      case ErrorCategory.MARKET_DATA:
        return 'Market data is unavailable or unusable. Quoting resumes after backoff.';
      case ErrorCategory.ORDER:
        return 'The venue refused an order request. It will be retried next cycle.';
      case ErrorCategory.HEDGE:
        return 'A fill could not be hedged. Quoting is halted until an operator clears the fault.';
      case ErrorCategory.NETWORK:
        return 'Network connection issue with a venue.';
      default:
        return 'An unexpected error occurred.';
    }
  }

  private generateSuggestedActions(): string[] {
    switch (this.category) {
      case ErrorCategory.CONFIGURATION:
        return ['Check the configuration file and HEDGER_* environment variables'];
      case ErrorCategory.HEDGE:
        return [
          'Flatten the open exposure on the secondary venue',
          'Clear the halt through POST /api/halt/clear'
        ];
      case ErrorCategory.NETWORK:
      case ErrorCategory.MARKET_DATA:
        return ['Check venue connectivity and status pages'];
      default:
        return [];
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      severity: this.severity,
      context: this.context,
      isRetryable: this.isRetryable,
      userMessage: this.userMessage,
      suggestedActions: this.suggestedActions
    };
  }
}

function contextFor(operation: string, component: string, extra: Partial<ErrorContext> = {}): ErrorContext {
  return { operation, component, timestamp: new Date(), ...extra };
}

/**
 * Unknown strategy, invalid option or missing credentials. Fatal at startup.
 */
export class ConfigurationError extends ApplicationError {
  constructor(message: string, context: ErrorContext = contextFor('configure', 'ConfigurationManager')) {
    super(message, 'CONFIGURATION_ERROR', ErrorCategory.CONFIGURATION, ErrorSeverity.CRITICAL, context, {
      isRetryable: false
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Snapshot that cannot be priced: an empty side or a crossed book
 */
export class InvalidSnapshotError extends ApplicationError {
  constructor(message: string, context: ErrorContext = contextFor('quote', 'PricingAlgorithm')) {
    super(message, 'INVALID_SNAPSHOT', ErrorCategory.MARKET_DATA, ErrorSeverity.LOW, context);
    this.name = 'InvalidSnapshotError';
  }
}

/**
 * Venue read failure while fetching a snapshot
 */
export class SnapshotError extends ApplicationError {
  constructor(message: string, context: ErrorContext, originalError?: Error) {
    super(message, 'SNAPSHOT_ERROR', ErrorCategory.MARKET_DATA, ErrorSeverity.MEDIUM, context, { originalError });
    this.name = 'SnapshotError';
  }
}

export type OrderRejectionReason = 'REJECTED' | 'ALREADY_FILLED' | 'NOT_FOUND' | 'TRANSPORT';

/**
 * Placement or cancel refused by the venue
 */
export class OrderRejectedError extends ApplicationError {
  public readonly reason: OrderRejectionReason;

  constructor(message: string, reason: OrderRejectionReason, context: ErrorContext, originalError?: Error) {
    super(message, `ORDER_${reason}`, ErrorCategory.ORDER, ErrorSeverity.MEDIUM, context, { originalError });
    this.name = 'OrderRejectedError';
    this.reason = reason;
  }
}

/**
 * Secondary venue failed to take a hedge within the retry budget. Leaves unhedged exposure.
 */
export class HedgeFailureError extends ApplicationError {
  public readonly fill: FillEvent;
  public readonly attempts: number;

  constructor(message: string, fill: FillEvent, attempts: number, originalError?: Error) {
    super(
      message,
      'HEDGE_FAILURE',
      ErrorCategory.HEDGE,
      ErrorSeverity.CRITICAL,
      contextFor('hedge', 'HedgeExecutor', { orderId: fill.orderId }),
      { originalError, isRetryable: false }
    );
    this.name = 'HedgeFailureError';
    this.fill = fill;
    this.attempts = attempts;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export type SleepFn = (ms: number) => Promise<void>;

export const defaultSleep: SleepFn = (ms) => new Promise(resolve => setTimeout(resolve, ms));

export interface BackoffSettings {
  errorBackoffMs: number;
  cycleIntervalMs: number;
  hedgeMaxRetries: number;
  hedgeBaseBackoffMs: number;
  hedgeBackoffMultiplier: number;
  hedgeMaxBackoffMs: number;
}

/**
 * Builds the per-kind backoff policy table from engine settings
 */
export function buildBackoffPolicyTable(settings: BackoffSettings): BackoffPolicyTable {
  return {
    [ErrorKind.CONFIGURATION]: {
      intervalMs: 0,
      maxAttempts: 0,
      multiplier: 1,
      maxIntervalMs: 0
    },
    [ErrorKind.SNAPSHOT]: {
      intervalMs: settings.errorBackoffMs,
      maxAttempts: Infinity,
      multiplier: 1,
      maxIntervalMs: settings.errorBackoffMs
    },
    [ErrorKind.ORDER_REJECTED]: {
      intervalMs: settings.cycleIntervalMs,
      maxAttempts: Infinity,
      multiplier: 1,
      maxIntervalMs: settings.cycleIntervalMs
    },
    [ErrorKind.HEDGE_FAILURE]: {
      intervalMs: settings.hedgeBaseBackoffMs,
      // the first submission plus the configured retries
      maxAttempts: settings.hedgeMaxRetries + 1,
      multiplier: settings.hedgeBackoffMultiplier,
      maxIntervalMs: settings.hedgeMaxBackoffMs
    }
  };
}

/**
 * Delay before the given retry (1-based), growing by the policy multiplier up to its cap
 */
export function backoffDelay(policy: BackoffPolicy, retry: number): number {
  const delay = policy.intervalMs * Math.pow(policy.multiplier, Math.max(0, retry - 1));
  return Math.min(delay, policy.maxIntervalMs);
}

export interface RetryOutcome<T> {
  success: boolean;
  result?: T;
  error?: Error;
  attempts: number;
}

/**
 * Classifies any error into a policy row
 */
export function classifyError(error: unknown): ErrorKind {
  if (error instanceof ConfigurationError) return ErrorKind.CONFIGURATION;
  if (error instanceof HedgeFailureError) return ErrorKind.HEDGE_FAILURE;
  if (error instanceof OrderRejectedError) return ErrorKind.ORDER_REJECTED;
  return ErrorKind.SNAPSHOT;
}

/**
 * Runs operations against the backoff policy table and keeps error metrics
 */
export class ErrorHandler {
  private readonly policies: BackoffPolicyTable;
  private readonly sleep: SleepFn;
  private errorMetrics: Map<string, { count: number; lastOccurrence: Date }> = new Map();

  constructor(policies: BackoffPolicyTable, sleep: SleepFn = defaultSleep) {
    this.policies = policies;
    this.sleep = sleep;
  }

  getPolicy(kind: ErrorKind): BackoffPolicy {
    return { ...this.policies[kind] };
  }

  /**
   * Runs an operation until it succeeds or the policy's attempt budget is spent.
   * Never throws; the last error is returned in the outcome.
   */
  async executeWithRetry<T>(
    kind: ErrorKind,
    operation: (attempt: number) => Promise<T>,
    onAttemptFailed?: (error: Error, attempt: number) => void
  ): Promise<RetryOutcome<T>> {
    const policy = this.policies[kind];
    let attempts = 0;
    let lastError: Error | undefined;

    while (attempts < policy.maxAttempts) {
      attempts++;
      try {
        const result = await operation(attempts);
        return { success: true, result, attempts };
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        this.recordError(lastError);
        onAttemptFailed?.(lastError, attempts);

        if (attempts < policy.maxAttempts) {
          await this.sleep(backoffDelay(policy, attempts));
        }
      }
    }

    return { success: false, error: lastError, attempts };
  }

  /**
   * Records an error occurrence under its name
   */
  recordError(error: Error): void {
    const key = error instanceof ApplicationError ? `${error.category}:${error.code}` : `unclassified:${error.name}`;
    const existing = this.errorMetrics.get(key) ?? { count: 0, lastOccurrence: new Date() };

    this.errorMetrics.set(key, {
      count: existing.count + 1,
      lastOccurrence: new Date()
    });
  }

  getErrorMetrics(): Map<string, { count: number; lastOccurrence: Date }> {
    return new Map(this.errorMetrics);
  }
}
