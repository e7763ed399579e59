/**
 * Trading Loop drives the quote -> reconcile -> fill check -> hedge cycle
 * and owns the engine's halted state
 */

import { IPrimaryVenueConnector, ISecondaryVenueConnector } from '../connectors/VenueConnector';
import { ConnectorStatus } from '../models/ConnectorStatus';
import { FillEvent, OrderSide } from '../models/Order';
import { OrderBookSnapshot, Quote } from '../models/OrderBook';
import { AuditService } from './AuditService';
import { FillDetector } from './FillDetector';
import { HedgeExecutor } from './HedgeExecutor';
import { OrderLifecycleManager, ReconcileResult } from './OrderLifecycleManager';
import { PricingAlgorithm, relativeSpread } from './PricingAlgorithm';
import { RiskGuard, RiskSnapshot } from './RiskGuard';
import {
  ApplicationError,
  ErrorHandler,
  HedgeFailureError,
  SleepFn,
  defaultSleep,
  errorMessage
} from '../utils/ErrorHandler';

export interface TradingLoopConfig {
  /** Symbol on the primary venue */
  instrument: string;
  /** Symbol on the secondary venue, used for spread reporting */
  secondaryInstrument: string;
  tradeSize: number;
  cycleIntervalMs: number;
  errorBackoffMs: number;
  cancelOnHalt: boolean;
}

export interface TradingLoopDependencies {
  primary: IPrimaryVenueConnector;
  secondary: ISecondaryVenueConnector;
  pricing: PricingAlgorithm;
  lifecycle: OrderLifecycleManager;
  fillDetector: FillDetector;
  hedgeExecutor: HedgeExecutor;
  riskGuard: RiskGuard;
  errorHandler: ErrorHandler;
  auditService: AuditService;
  sleep?: SleepFn;
}

export type CycleOutcome = 'quoted' | 'halted' | 'failed' | 'skipped';

export interface CycleResult {
  cycle: number;
  outcome: CycleOutcome;
  quote?: Quote;
  reconcile?: ReconcileResult;
  fills: number;
  hedged: number;
  error?: string;
  completedAt: Date;
}

export interface ClearHaltRequest {
  operator: string;
  /** Re-dispatch the backlog before clearing; otherwise the operator flattened it by hand */
  rehedge: boolean;
}

export interface ClearHaltResult {
  cleared: boolean;
  rehedged: number;
  remainingBacklog: number;
  message: string;
}

export interface RestingOrderView {
  orderId: string;
  side: OrderSide;
  price?: number;
  size: number;
  filledSize: number;
  status: string;
  cancelRequested: boolean;
}

export interface EngineStatus {
  running: boolean;
  halted: boolean;
  haltReason?: string;
  haltedAt?: Date;
  placementsEnabled: boolean;
  cycleCount: number;
  lastCycle?: CycleResult;
  lastQuote?: Quote;
  restingOrders: RestingOrderView[];
  unhedgedBacklog: FillEvent[];
  risk: RiskSnapshot;
  connectors: ConnectorStatus[];
}

export class TradingLoop {
  private readonly config: TradingLoopConfig;
  private readonly deps: TradingLoopDependencies;
  private readonly sleep: SleepFn;

  private running = false;
  private stopRequested = false;
  private wake?: () => void;
  private runPromise?: Promise<void>;

  private busy = false;
  private currentWork?: Promise<unknown>;

  private halted = false;
  private haltReason?: string;
  private haltedAt?: Date;
  private backlog: FillEvent[] = [];

  private cycleCount = 0;
  private lastCycle?: CycleResult;
  private lastQuote?: Quote;

  constructor(config: TradingLoopConfig, deps: TradingLoopDependencies) {
    this.config = config;
    this.deps = deps;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /**
   * Starts the loop. The returned promise settles once the loop has stopped
   * and resting orders have been cancelled.
   */
  start(): Promise<void> {
    if (this.runPromise) {
      return this.runPromise;
    }
    this.running = true;
    this.stopRequested = false;
    this.deps.auditService.logEvent('ENGINE_STARTED', {
      instrument: this.config.instrument,
      secondaryInstrument: this.config.secondaryInstrument,
      strategy: this.deps.pricing.name,
      tradeSize: this.config.tradeSize,
      cycleIntervalMs: this.config.cycleIntervalMs
    });
    this.runPromise = this.run();
    return this.runPromise;
  }

  /**
   * Requests a stop at the next cycle boundary and waits for shutdown to finish
   */
  async stop(): Promise<void> {
    this.stopRequested = true;
    this.wake?.();
    if (this.runPromise) {
      await this.runPromise;
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  isHalted(): boolean {
    return this.halted;
  }

  private async run(): Promise<void> {
    try {
      while (!this.stopRequested) {
        const result = await this.runCycle();
        if (this.stopRequested) break;
        await this.interruptibleSleep(result.outcome === 'failed' ? this.config.errorBackoffMs : this.config.cycleIntervalMs);
      }
    } finally {
      await this.shutdown();
    }
  }

  private async shutdown(): Promise<void> {
    while (this.currentWork) {
      await this.currentWork;
    }

    const cancels = await this.deps.lifecycle.cancelAll('shutdown');
    // fills that raced the cancels still get hedged
    const { fills, hedged } = await this.checkFillsAndHedge();

    this.deps.auditService.logEvent('ENGINE_STOPPED', {
      cycles: this.cycleCount,
      cancels,
      finalFills: fills,
      finalHedges: hedged,
      remainingOrders: this.deps.lifecycle.getRestingOrders().map(resting => resting.record.id),
      unhedgedBacklog: this.backlog.length
    });

    this.running = false;
    this.runPromise = undefined;
  }

  private interruptibleSleep(ms: number): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const finish = (): void => {
        if (settled) return;
        settled = true;
        this.wake = undefined;
        resolve();
      };
      this.wake = finish;
      this.sleep(ms).then(finish, (error: unknown) => {
        if (settled) return;
        settled = true;
        this.wake = undefined;
        reject(error);
      });
    });
  }

  /**
   * Runs one cycle. Refuses to start while another cycle or a halt clear is in progress.
   */
  async runCycle(): Promise<CycleResult> {
    if (this.busy) {
      return { cycle: this.cycleCount, outcome: 'skipped', fills: 0, hedged: 0, completedAt: new Date() };
    }
    return this.exclusive(() => this.executeCycle());
  }

  private async executeCycle(): Promise<CycleResult> {
    const cycle = ++this.cycleCount;
    let quote: Quote | undefined;
    let reconcile: ReconcileResult | undefined;
    let failure: string | undefined;

    if (!this.halted) {
      try {
        const snapshot = await this.deps.primary.fetchOrderBook(this.config.instrument);
        quote = this.deps.pricing.quote(snapshot, this.config.tradeSize);
        await this.reportQuote(quote, snapshot);
        reconcile = await this.deps.lifecycle.reconcile(quote);
      } catch (error) {
        failure = errorMessage(error);
        this.deps.errorHandler.recordError(error instanceof Error ? error : new Error(failure));
        this.deps.auditService.logEvent('CYCLE_FAILED', {
          cycle,
          stage: quote ? 'reconcile' : 'quote',
          error: failure,
          code: error instanceof ApplicationError ? error.code : undefined,
          backoffMs: this.config.errorBackoffMs
        }, this.deps.primary.venueId);
      }
    } else if (this.config.cancelOnHalt) {
      await this.deps.lifecycle.cancelAll('halt');
    }

    // a quoting failure does not stop fills already on the venue from being hedged
    const { fills, hedged } = await this.checkFillsAndHedge();

    const outcome: CycleOutcome = failure !== undefined ? 'failed' : this.halted ? 'halted' : 'quoted';
    const result: CycleResult = { cycle, outcome, quote, reconcile, fills, hedged, error: failure, completedAt: new Date() };
    this.lastCycle = result;
    return result;
  }

  private async reportQuote(quote: Quote, snapshot: OrderBookSnapshot): Promise<void> {
    const previous = this.lastQuote;
    this.lastQuote = quote;
    if (previous && previous.bidPrice === quote.bidPrice && previous.askPrice === quote.askPrice) {
      return;
    }

    const details: Record<string, unknown> = {
      strategy: quote.strategy,
      bidPrice: quote.bidPrice,
      askPrice: quote.askPrice,
      size: quote.size,
      primarySpread: relativeSpread(snapshot)
    };

    const secondary = this.deps.secondary;
    if (secondary.fetchOrderBook) {
      try {
        const secondaryBook = await secondary.fetchOrderBook(this.config.secondaryInstrument);
        const secondarySpread = relativeSpread(secondaryBook);
        details.secondarySpread = secondarySpread;
        details.spreadDifferential = relativeSpread(snapshot) - secondarySpread;
      } catch (error) {
        details.secondarySpreadError = errorMessage(error);
      }
    }

    this.deps.auditService.logEvent('QUOTE_UPDATED', details, this.deps.primary.venueId);
  }

  private async checkFillsAndHedge(): Promise<{ fills: number; hedged: number }> {
    let fills: FillEvent[];
    try {
      fills = await this.deps.fillDetector.detectFills();
    } catch (error) {
      this.deps.auditService.logEvent('CYCLE_FAILED', {
        cycle: this.cycleCount,
        stage: 'fill_check',
        error: errorMessage(error)
      }, this.deps.primary.venueId);
      return { fills: 0, hedged: 0 };
    }

    let hedged = 0;
    for (const fill of fills) {
      this.deps.riskGuard.recordFill(fill);
      if (await this.hedgeOrHalt(fill)) {
        hedged++;
      }
    }
    return { fills: fills.length, hedged };
  }

  private async hedgeOrHalt(fill: FillEvent): Promise<boolean> {
    try {
      await this.deps.hedgeExecutor.hedgeFill(fill);
      return true;
    } catch (error) {
      const failure = error instanceof HedgeFailureError
        ? error
        : new HedgeFailureError(errorMessage(error), fill, 0, error instanceof Error ? error : undefined);
      await this.enterHalt(failure);
      return false;
    }
  }

  private async enterHalt(failure: HedgeFailureError): Promise<void> {
    this.backlog.push(failure.fill);
    if (this.halted) {
      return;
    }

    this.halted = true;
    this.haltReason = failure.message;
    this.haltedAt = new Date();
    this.deps.lifecycle.setPlacementsEnabled(false);

    this.deps.auditService.logEvent('ENGINE_HALTED', {
      reason: failure.message,
      orderId: failure.fill.orderId,
      side: failure.fill.side,
      size: failure.fill.incrementalSize,
      attempts: failure.attempts,
      cancelOnHalt: this.config.cancelOnHalt,
      suggestedActions: failure.suggestedActions
    });

    if (this.config.cancelOnHalt) {
      await this.deps.lifecycle.cancelAll('halt');
    }
  }

  /**
   * Operator clear of a halt or a tripped stop-loss. With rehedge the backlog is
   * dispatched again and the halt only clears when every hedge succeeds.
   */
  async clearHalt(request: ClearHaltRequest): Promise<ClearHaltResult> {
    while (this.currentWork) {
      await this.currentWork;
    }
    return this.exclusive(() => this.executeClearHalt(request));
  }

  private async executeClearHalt(request: ClearHaltRequest): Promise<ClearHaltResult> {
    const stopLossTriggered = this.deps.riskGuard.getSnapshot().stopLossTriggered;
    if (!this.halted && !stopLossTriggered) {
      return { cleared: false, rehedged: 0, remainingBacklog: 0, message: 'Engine is not halted' };
    }

    let rehedged = 0;
    const discarded = request.rehedge ? 0 : this.backlog.length;

    if (request.rehedge) {
      const remaining: FillEvent[] = [];
      for (const fill of this.backlog) {
        try {
          await this.deps.hedgeExecutor.hedgeFill(fill);
          rehedged++;
        } catch {
          // HEDGE_FAILED is already on the event stream
          remaining.push(fill);
        }
      }
      this.backlog = remaining;

      if (remaining.length > 0) {
        this.deps.auditService.logEvent('HALT_CLEAR_FAILED', {
          operator: request.operator,
          rehedged,
          remainingBacklog: remaining.length
        });
        return {
          cleared: false,
          rehedged,
          remainingBacklog: remaining.length,
          message: `${remaining.length} fill(s) are still unhedged`
        };
      }
    } else {
      this.deps.riskGuard.recordFlattened(this.backlog);
      this.backlog = [];
    }

    this.halted = false;
    this.haltReason = undefined;
    this.haltedAt = undefined;
    this.deps.riskGuard.resetStopLoss();
    this.deps.lifecycle.setPlacementsEnabled(true);

    this.deps.auditService.logEvent('HALT_CLEARED', {
      operator: request.operator,
      rehedge: request.rehedge,
      rehedged,
      discarded,
      stopLossReset: stopLossTriggered
    });

    return { cleared: true, rehedged, remainingBacklog: 0, message: 'Halt cleared' };
  }

  private async exclusive<T>(work: () => Promise<T>): Promise<T> {
    this.busy = true;
    const pending = work();
    // waiters only need to know when the work settles; its error goes to the caller
    this.currentWork = pending.catch(() => undefined);
    try {
      return await pending;
    } finally {
      this.busy = false;
      this.currentWork = undefined;
    }
  }

  getStatus(): EngineStatus {
    return {
      running: this.running,
      halted: this.halted,
      haltReason: this.haltReason,
      haltedAt: this.haltedAt,
      placementsEnabled: this.deps.lifecycle.arePlacementsEnabled(),
      cycleCount: this.cycleCount,
      lastCycle: this.lastCycle,
      lastQuote: this.lastQuote,
      restingOrders: this.deps.lifecycle.getRestingOrders().map(resting => ({
        orderId: resting.record.id,
        side: resting.record.side,
        price: resting.record.price,
        size: resting.record.requestedSize,
        filledSize: resting.observedFilledSize,
        status: resting.record.status,
        cancelRequested: resting.cancelRequested
      })),
      unhedgedBacklog: [...this.backlog],
      risk: this.deps.riskGuard.getSnapshot(),
      connectors: [this.deps.primary.getStatus(), this.deps.secondary.getStatus()]
    };
  }
}
