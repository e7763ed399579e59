import { describe, it, expect, beforeEach } from 'vitest';
import { HedgeExecutor } from './HedgeExecutor';
import { RiskGuard } from './RiskGuard';
import { AuditService } from './AuditService';
import { PaperVenueConnector } from '../connectors/venues/PaperVenueConnector';
import { FillEvent, OrderSide } from '../models/Order';
import { ErrorHandler, HedgeFailureError, OrderRejectedError, buildBackoffPolicyTable } from '../utils/ErrorHandler';

const noSleep = async (): Promise<void> => undefined;

function fill(side: OrderSide, size: number, price?: number): FillEvent {
  return {
    orderId: 'dydx_1',
    side,
    incrementalSize: size,
    cumulativeFilledSize: size,
    price,
    terminal: true,
    detectedAt: new Date('2024-05-01T10:00:00Z')
  };
}

describe('HedgeExecutor', () => {
  let venue: PaperVenueConnector;
  let riskGuard: RiskGuard;
  let audit: AuditService;
  let sleeps: number[];
  let executor: HedgeExecutor;

  beforeEach(() => {
    venue = new PaperVenueConnector('hyperliquid', 'secondary', { sleep: noSleep });
    venue.setOrderBook({
      instrument: 'BRETT',
      bids: [{ price: 10.1, size: 5 }],
      asks: [{ price: 10.2, size: 5 }],
      timestamp: new Date('2024-05-01T10:00:00Z')
    });
    riskGuard = new RiskGuard({ maxPositionSize: 10, maxDailyTrades: 100, stopLossPercentage: 0.05 });
    audit = new AuditService({ signingKey: Buffer.from('test-secret') });
    sleeps = [];
    const errorHandler = new ErrorHandler(
      buildBackoffPolicyTable({
        errorBackoffMs: 5000,
        cycleIntervalMs: 1000,
        hedgeMaxRetries: 2,
        hedgeBaseBackoffMs: 500,
        hedgeBackoffMultiplier: 2,
        hedgeMaxBackoffMs: 5000
      }),
      async (ms) => {
        sleeps.push(ms);
      }
    );
    executor = new HedgeExecutor(venue, errorHandler, riskGuard, audit, 'BRETT');
  });

  it('should sell on the secondary venue what was bought on the primary', async () => {
    const result = await executor.hedgeFill(fill('BUY', 1, 10));

    expect(result.attempts).toBe(1);
    expect(result.order).toMatchObject({ id: 'hyperliquid_1', side: 'SELL', type: 'MARKET', filledSize: 1, price: 10.1, status: 'FILLED' });
    expect(riskGuard.getSnapshot().secondaryPosition).toBe(-1);
    expect(riskGuard.getSnapshot().realizedPnl).toBeCloseTo(0.1, 9);

    const executed = audit.getEventsByType('HEDGE_EXECUTED');
    expect(executed).toHaveLength(1);
    expect(executed[0].venueId).toBe('hyperliquid');
    expect(executed[0].details).toMatchObject({
      orderId: 'dydx_1',
      hedgeOrderId: 'hyperliquid_1',
      fillSide: 'BUY',
      side: 'SELL',
      size: 1,
      fillPrice: 10,
      hedgePrice: 10.1,
      attempts: 1
    });
  });

  it('should buy back a primary sell', async () => {
    const result = await executor.hedgeFill(fill('SELL', 2, 10.3));

    expect(result.order).toMatchObject({ side: 'BUY', filledSize: 2, price: 10.2 });
    expect(riskGuard.getSnapshot().secondaryPosition).toBe(2);
  });

  it('should retry with growing backoff until the venue takes the order', async () => {
    venue.simulateOutage('placeMarketOrder', 2);

    const result = await executor.hedgeFill(fill('BUY', 1, 10));

    expect(result.attempts).toBe(3);
    expect(sleeps).toEqual([500, 1000]);
    expect(audit.getEventsByType('HEDGE_ATTEMPT_FAILED').map(event => event.details.attempt)).toEqual([1, 2]);
    expect(venue.getOrders()).toHaveLength(1);
  });

  it('should throw a hedge failure once the retry budget is spent', async () => {
    venue.setRejectMarketOrders(true);

    const error = await executor.hedgeFill(fill('BUY', 1, 10)).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(HedgeFailureError);
    if (!(error instanceof HedgeFailureError)) return;
    expect(error.attempts).toBe(3);
    expect(error.fill.orderId).toBe('dydx_1');
    expect(error.message).toBe('Failed to hedge 1 BUY fill of dydx_1 after 3 attempts: Market orders are disabled on hyperliquid');
    expect(sleeps).toEqual([500, 1000]);
    expect(riskGuard.getSnapshot().secondaryPosition).toBe(0);
    expect(audit.getEventsByType('HEDGE_FAILED')[0].details).toEqual({
      orderId: 'dydx_1',
      fillSide: 'BUY',
      side: 'SELL',
      size: 1,
      attempts: 3,
      error: 'Market orders are disabled on hyperliquid'
    });
  });

  it('should place exactly the requested side and size', async () => {
    const order = await executor.hedge('SELL', 3);

    expect(order).toMatchObject({ side: 'SELL', type: 'MARKET', requestedSize: 3, filledSize: 3, price: 10.1 });
    expect(venue.getOrders().map(placed => placed.side)).toEqual(['SELL']);
    expect(riskGuard.getSnapshot().secondaryPosition).toBe(0);
    expect(audit.getEventsByType('HEDGE_EXECUTED')[0].details).toMatchObject({
      orderId: 'manual',
      hedgeOrderId: 'hyperliquid_1',
      side: 'SELL',
      size: 3
    });
  });

  it('should reject a requested hedge once the retry budget is spent', async () => {
    venue.setRejectMarketOrders(true);

    const error = await executor.hedge('BUY', 1).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(OrderRejectedError);
    expect(error).toHaveProperty(
      'message',
      'Failed to place BUY 1 on hyperliquid after 3 attempts: Market orders are disabled on hyperliquid'
    );
    expect(sleeps).toEqual([500, 1000]);
  });
});
