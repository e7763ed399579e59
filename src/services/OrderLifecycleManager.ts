/**
 * Order Lifecycle Manager keeps at most one resting bid and one resting ask on the primary venue
 * and decides, per side, whether to place, cancel or keep
 */

import { IPrimaryVenueConnector } from '../connectors/VenueConnector';
import { OrderRecord, OrderSide } from '../models/Order';
import { Quote } from '../models/OrderBook';
import { AuditService } from './AuditService';
import { RestingOrder, RestingOrderState } from './RestingOrderState';
import { RiskGuard } from './RiskGuard';
import { OrderRejectedError, errorMessage } from '../utils/ErrorHandler';

export interface LifecycleConfig {
  instrument: string;
  /** Minimum |new - old| / old that triggers cancel-then-replace */
  repriceThreshold: number;
}

export type SideAction =
  | 'placed'
  | 'kept'
  | 'cancel_requested'
  | 'cancel_raced_fill'
  | 'cancel_failed'
  | 'placement_rejected'
  | 'risk_rejected'
  | 'placement_suppressed';

export interface ReconcileResult {
  actions: Record<OrderSide, SideAction>;
}

export type CancelOutcome = 'canceled' | 'raced_fill' | 'failed';

// absorbs float error so a move of exactly the threshold counts as reaching it
const DEVIATION_TOLERANCE = 1e-12;

export function priceDeviation(oldPrice: number, newPrice: number): number {
  return Math.abs(newPrice - oldPrice) / oldPrice;
}

export class OrderLifecycleManager {
  private readonly state: RestingOrderState;
  private readonly venue: IPrimaryVenueConnector;
  private readonly riskGuard: RiskGuard;
  private readonly auditService: AuditService;
  private readonly config: LifecycleConfig;
  private placementsEnabled = true;

  constructor(
    state: RestingOrderState,
    venue: IPrimaryVenueConnector,
    riskGuard: RiskGuard,
    auditService: AuditService,
    config: LifecycleConfig
  ) {
    this.state = state;
    this.venue = venue;
    this.riskGuard = riskGuard;
    this.auditService = auditService;
    this.config = config;
  }

  setPlacementsEnabled(enabled: boolean): void {
    this.placementsEnabled = enabled;
  }

  arePlacementsEnabled(): boolean {
    return this.placementsEnabled;
  }

  /**
   * Applies one quote to both sides. Sides are handled one after the other so that
   * resting-state mutations stay serialized.
   */
  async reconcile(quote: Quote): Promise<ReconcileResult> {
    const actions: Record<OrderSide, SideAction> = {
      BUY: await this.reconcileSide('BUY', quote.bidPrice, quote.size),
      SELL: await this.reconcileSide('SELL', quote.askPrice, quote.size)
    };

    return { actions };
  }

  private async reconcileSide(side: OrderSide, targetPrice: number, size: number): Promise<SideAction> {
    const resting = this.state.get(side);

    if (!resting) {
      return this.place(side, targetPrice, size);
    }

    if (resting.cancelRequested) {
      // awaiting a terminal status; cancel is idempotent at the venue
      return this.toSideAction(await this.requestCancel(resting, 'retry'));
    }

    const restingPrice = resting.record.price;
    if (restingPrice === undefined || priceDeviation(restingPrice, targetPrice) >= this.config.repriceThreshold - DEVIATION_TOLERANCE) {
      return this.toSideAction(await this.requestCancel(resting, 'reprice', targetPrice));
    }

    return 'kept';
  }

  private async place(side: OrderSide, price: number, size: number): Promise<SideAction> {
    if (!this.placementsEnabled) {
      return 'placement_suppressed';
    }

    const decision = this.riskGuard.checkPlacement(side, size);
    if (!decision.allowed) {
      this.auditService.logEvent('RISK_REJECTED', {
        side,
        price,
        size,
        reason: decision.reason,
        message: decision.message
      }, this.venue.venueId);
      return 'risk_rejected';
    }

    let record: OrderRecord;
    try {
      record = await this.venue.placeOrder({
        instrument: this.config.instrument,
        side,
        type: 'LIMIT',
        size,
        price
      });
    } catch (error) {
      this.auditService.logEvent('ORDER_REJECTED', {
        side,
        price,
        size,
        reason: error instanceof OrderRejectedError ? error.reason : 'TRANSPORT',
        error: errorMessage(error)
      }, this.venue.venueId);
      return 'placement_rejected';
    }

    this.riskGuard.recordPlacement();

    if (record.status === 'REJECTED') {
      this.auditService.logEvent('ORDER_REJECTED', {
        orderId: record.id,
        side,
        price,
        size,
        reason: 'REJECTED'
      }, this.venue.venueId);
      return 'placement_rejected';
    }

    this.state.track({ ...record, price: record.price ?? price });
    this.auditService.logEvent('ORDER_PLACED', {
      orderId: record.id,
      side,
      price: record.price ?? price,
      size: record.requestedSize,
      status: record.status
    }, this.venue.venueId);
    return 'placed';
  }

  /**
   * Asks the venue to cancel a resting order. The entry stays tracked until a status poll
   * confirms it is terminal, so a fill that races the cancel still reaches fill detection.
   */
  async requestCancel(resting: RestingOrder, trigger: 'reprice' | 'retry' | 'shutdown' | 'halt', newPrice?: number): Promise<CancelOutcome> {
    const { id, side, price } = resting.record;

    let canceled: boolean;
    try {
      canceled = await this.venue.cancelOrder(id);
    } catch (error) {
      if (error instanceof OrderRejectedError && error.reason === 'ALREADY_FILLED') {
        canceled = false;
      } else {
        this.auditService.logEvent('ORDER_CANCEL_FAILED', {
          orderId: id,
          side,
          trigger,
          error: errorMessage(error)
        }, this.venue.venueId);
        return 'failed';
      }
    }

    this.state.markCancelRequested(side);

    if (!canceled) {
      // on a retry the earlier cancel usually went through; the status poll tells which
      if (trigger !== 'retry') {
        this.auditService.logEvent('ORDER_CANCEL_RACED_FILL', {
          orderId: id,
          side,
          trigger
        }, this.venue.venueId);
      }
      return 'raced_fill';
    }

    if (trigger !== 'retry') {
      this.auditService.logEvent('ORDER_CANCEL_REQUESTED', {
        orderId: id,
        side,
        trigger,
        oldPrice: price,
        newPrice
      }, this.venue.venueId);
    }
    return 'canceled';
  }

  /**
   * Best-effort cancel of every tracked order whose cancel has not gone through yet.
   * Each order gets one attempt per call.
   */
  async cancelAll(trigger: 'shutdown' | 'halt'): Promise<Record<string, CancelOutcome>> {
    const outcomes: Record<string, CancelOutcome> = {};
    for (const resting of this.state.all()) {
      if (resting.cancelRequested) continue;
      outcomes[resting.record.id] = await this.requestCancel(resting, trigger);
    }
    return outcomes;
  }

  getRestingOrders(): RestingOrder[] {
    return this.state.all();
  }

  private toSideAction(outcome: CancelOutcome): SideAction {
    switch (outcome) {
      case 'canceled':
        return 'cancel_requested';
      case 'raced_fill':
        return 'cancel_raced_fill';
      case 'failed':
        return 'cancel_failed';
    }
  }
}
