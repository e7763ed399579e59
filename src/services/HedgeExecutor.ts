/**
 * Hedge Executor offsets primary fills with market orders on the secondary venue
 */

import { ISecondaryVenueConnector } from '../connectors/VenueConnector';
import { FillEvent, OrderRecord, OrderSide, oppositeSide } from '../models/Order';
import { AuditService } from './AuditService';
import { RiskGuard } from './RiskGuard';
import { ErrorHandler, ErrorKind, HedgeFailureError, OrderRejectedError, RetryOutcome } from '../utils/ErrorHandler';

const MANUAL_REFERENCE = 'manual';

function failureReason(error: Error | undefined): string {
  return error ? error.message : 'no attempts were made';
}

export interface HedgeResult {
  fill: FillEvent;
  order: OrderRecord;
  attempts: number;
}

export class HedgeExecutor {
  private readonly venue: ISecondaryVenueConnector;
  private readonly errorHandler: ErrorHandler;
  private readonly riskGuard: RiskGuard;
  private readonly auditService: AuditService;
  private readonly instrument: string;

  constructor(
    venue: ISecondaryVenueConnector,
    errorHandler: ErrorHandler,
    riskGuard: RiskGuard,
    auditService: AuditService,
    instrument: string
  ) {
    this.venue = venue;
    this.errorHandler = errorHandler;
    this.riskGuard = riskGuard;
    this.auditService = auditService;
    this.instrument = instrument;
  }

  /**
   * Submits a market order of `size` on `side` on the secondary venue, retrying per the hedge backoff policy.
   * Nothing is booked against the risk guard; this is the operator's tool for flattening by hand.
   */
  async hedge(side: OrderSide, size: number): Promise<OrderRecord> {
    const outcome = await this.dispatch(side, size, MANUAL_REFERENCE);

    if (!outcome.success || outcome.result === undefined) {
      const reason = failureReason(outcome.error);
      this.auditService.logEvent('HEDGE_FAILED', {
        orderId: MANUAL_REFERENCE,
        side,
        size,
        attempts: outcome.attempts,
        error: reason
      }, this.venue.venueId);

      throw new OrderRejectedError(
        `Failed to place ${side} ${size} on ${this.venue.venueId} after ${outcome.attempts} attempts: ${reason}`,
        'REJECTED',
        { operation: 'hedge', component: 'HedgeExecutor', venueId: this.venue.venueId, timestamp: new Date() },
        outcome.error
      );
    }

    const order = outcome.result;
    this.auditService.logEvent('HEDGE_EXECUTED', {
      orderId: MANUAL_REFERENCE,
      hedgeOrderId: order.id,
      side,
      size,
      hedgePrice: order.price,
      attempts: outcome.attempts
    }, this.venue.venueId);

    return order;
  }

  /**
   * Hedges one fill on the opposite side, retrying per the hedge backoff policy.
   * Throws HedgeFailureError once the retry budget is spent.
   */
  async hedgeFill(fill: FillEvent): Promise<HedgeResult> {
    const hedgeSide = oppositeSide(fill.side);
    const size = fill.incrementalSize;

    const outcome = await this.dispatch(hedgeSide, size, fill.orderId);

    if (!outcome.success || outcome.result === undefined) {
      const reason = failureReason(outcome.error);
      this.auditService.logEvent('HEDGE_FAILED', {
        orderId: fill.orderId,
        fillSide: fill.side,
        side: hedgeSide,
        size,
        attempts: outcome.attempts,
        error: reason
      }, this.venue.venueId);

      throw new HedgeFailureError(
        `Failed to hedge ${size} ${fill.side} fill of ${fill.orderId} after ${outcome.attempts} attempts: ${reason}`,
        fill,
        outcome.attempts,
        outcome.error
      );
    }

    const order = outcome.result;
    const hedgePrice = order.price;
    this.riskGuard.recordHedge(fill, hedgeSide, order.filledSize > 0 ? order.filledSize : size, hedgePrice);

    this.auditService.logEvent('HEDGE_EXECUTED', {
      orderId: fill.orderId,
      hedgeOrderId: order.id,
      fillSide: fill.side,
      side: hedgeSide,
      size,
      fillPrice: fill.price,
      hedgePrice,
      spread: fill.price !== undefined && hedgePrice !== undefined ? hedgePrice - fill.price : undefined,
      attempts: outcome.attempts
    }, this.venue.venueId);

    return { fill, order, attempts: outcome.attempts };
  }

  private dispatch(side: OrderSide, size: number, reference: string): Promise<RetryOutcome<OrderRecord>> {
    return this.errorHandler.executeWithRetry(
      ErrorKind.HEDGE_FAILURE,
      async () => {
        const order = await this.venue.placeMarketOrder({ instrument: this.instrument, side, size });
        if (order.status === 'REJECTED') {
          throw new Error(`Hedge order ${order.id} was rejected by ${this.venue.venueId}`);
        }
        return order;
      },
      (error, attempt) => {
        this.auditService.logEvent('HEDGE_ATTEMPT_FAILED', {
          orderId: reference,
          side,
          size,
          attempt,
          error: error.message
        }, this.venue.venueId);
      }
    );
  }
}
