/**
 * Fill Detector polls every tracked resting order and turns filledSize increases into fill events
 */

import { IPrimaryVenueConnector } from '../connectors/VenueConnector';
import { FillEvent, OrderRecord } from '../models/Order';
import { AuditService } from './AuditService';
import { RestingOrder, RestingOrderState } from './RestingOrderState';
import { OrderRejectedError, errorMessage } from '../utils/ErrorHandler';

type PollResult =
  | { resting: RestingOrder; status: OrderRecord }
  | { resting: RestingOrder; error: unknown };

export class FillDetector {
  private readonly state: RestingOrderState;
  private readonly venue: IPrimaryVenueConnector;
  private readonly auditService: AuditService;

  constructor(state: RestingOrderState, venue: IPrimaryVenueConnector, auditService: AuditService) {
    this.state = state;
    this.venue = venue;
    this.auditService = auditService;
  }

  /**
   * Polls all tracked orders concurrently, then applies the observations one at a time.
   * Terminal orders leave the resting set before the returned fills are hedged.
   */
  async detectFills(): Promise<FillEvent[]> {
    const tracked = this.state.all();
    if (tracked.length === 0) {
      return [];
    }

    const results: PollResult[] = await Promise.all(
      tracked.map(resting =>
        this.venue.getOrderStatus(resting.record.id).then(
          (status): PollResult => ({ resting, status }),
          (error: unknown): PollResult => ({ resting, error })
        )
      )
    );

    const fills: FillEvent[] = [];
    for (const result of results) {
      if ('status' in result) {
        const fill = this.applyStatus(result.resting, result.status);
        if (fill) fills.push(fill);
      } else {
        const fill = this.handlePollFailure(result.resting, result.error);
        if (fill) fills.push(fill);
      }
    }
    return fills;
  }

  /**
   * Applies one status observation to the resting set; returns the fill it reveals, if any
   */
  applyStatus(resting: RestingOrder, status: OrderRecord): FillEvent | undefined {
    const { side, id } = resting.record;
    const { increment, removed } = this.state.applyStatus(side, status);

    if (removed) {
      this.auditService.logEvent('ORDER_CLOSED', {
        orderId: id,
        side,
        status: status.status,
        filledSize: status.filledSize
      }, this.venue.venueId);
    }

    if (increment <= 0) {
      return undefined;
    }

    const fill: FillEvent = {
      orderId: id,
      side,
      incrementalSize: increment,
      cumulativeFilledSize: status.filledSize,
      price: status.price ?? resting.record.price,
      terminal: removed,
      detectedAt: new Date()
    };

    this.auditService.logEvent('ORDER_FILLED', {
      orderId: id,
      side,
      incrementalSize: fill.incrementalSize,
      cumulativeFilledSize: fill.cumulativeFilledSize,
      price: fill.price,
      status: status.status
    }, this.venue.venueId);

    return fill;
  }

  /**
   * A poll failure keeps the entry for the next cycle, except NOT_FOUND: the venue has
   * dropped the order, so whatever fill the last known record shows is handed over now.
   */
  private handlePollFailure(resting: RestingOrder, error: unknown): FillEvent | undefined {
    const { side, id } = resting.record;

    if (!(error instanceof OrderRejectedError && error.reason === 'NOT_FOUND')) {
      this.auditService.logEvent('ORDER_STATUS_FAILED', {
        orderId: id,
        side,
        error: errorMessage(error)
      }, this.venue.venueId);
      return undefined;
    }

    const known = resting.record.filledSize;
    const increment = Math.max(0, known - resting.observedFilledSize);
    this.state.remove(side, id);
    this.auditService.logEvent('ORDER_CLOSED', {
      orderId: id,
      side,
      status: 'NOT_FOUND',
      filledSize: known
    }, this.venue.venueId);

    const unconfirmed = resting.record.requestedSize - known;
    if (unconfirmed > 0) {
      this.auditService.logEvent('ORDER_LOST', {
        orderId: id,
        side,
        lastKnownFilledSize: known,
        unconfirmedSize: unconfirmed,
        error: errorMessage(error)
      }, this.venue.venueId);
    }

    if (increment <= 0) {
      return undefined;
    }

    const fill: FillEvent = {
      orderId: id,
      side,
      incrementalSize: increment,
      cumulativeFilledSize: known,
      price: resting.record.price,
      terminal: true,
      detectedAt: new Date()
    };
    this.auditService.logEvent('ORDER_FILLED', {
      orderId: id,
      side,
      incrementalSize: fill.incrementalSize,
      cumulativeFilledSize: fill.cumulativeFilledSize,
      price: fill.price,
      status: 'NOT_FOUND'
    }, this.venue.venueId);
    return fill;
  }
}
