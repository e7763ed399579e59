import { describe, it, expect, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import { OrderLifecycleManager, priceDeviation } from './OrderLifecycleManager';
import { RestingOrderState } from './RestingOrderState';
import { RiskGuard, RiskLimits } from './RiskGuard';
import { AuditService } from './AuditService';
import { FillDetector } from './FillDetector';
import { PaperVenueConnector } from '../connectors/venues/PaperVenueConnector';
import { Quote } from '../models/OrderBook';

const noSleep = async (): Promise<void> => undefined;

const limits: RiskLimits = { maxPositionSize: 10, maxDailyTrades: 100, stopLossPercentage: 0.05 };

function quote(bidPrice: number, askPrice: number, size = 1): Quote {
  return { bidPrice, askPrice, size, strategy: 'BestBidAsk', timestamp: new Date('2024-05-01T10:00:00Z') };
}

describe('OrderLifecycleManager', () => {
  let venue: PaperVenueConnector;
  let state: RestingOrderState;
  let riskGuard: RiskGuard;
  let audit: AuditService;
  let manager: OrderLifecycleManager;

  function build(riskLimits: RiskLimits = limits): void {
    venue = new PaperVenueConnector('dydx', 'primary', { sleep: noSleep });
    state = new RestingOrderState();
    riskGuard = new RiskGuard(riskLimits, () => new Date('2024-05-01T10:00:00Z'));
    audit = new AuditService({ signingKey: Buffer.from('test-secret') });
    manager = new OrderLifecycleManager(state, venue, riskGuard, audit, {
      instrument: 'BRETT-USD',
      repriceThreshold: 0.001
    });
  }

  beforeEach(() => build());

  it('should place a bid and an ask when nothing rests', async () => {
    const result = await manager.reconcile(quote(100, 100.1));

    expect(result.actions).toEqual({ BUY: 'placed', SELL: 'placed' });
    expect(state.get('BUY')?.record).toMatchObject({ id: 'dydx_1', price: 100, requestedSize: 1, status: 'OPEN' });
    expect(state.get('SELL')?.record).toMatchObject({ id: 'dydx_2', price: 100.1 });
    expect(audit.getEventsByType('ORDER_PLACED').map(event => event.details.orderId)).toEqual(['dydx_1', 'dydx_2']);
    expect(riskGuard.getSnapshot().tradesToday).toBe(2);
  });

  it('should keep orders whose price moved less than the threshold', async () => {
    await manager.reconcile(quote(100, 100.1));
    const result = await manager.reconcile(quote(100.05, 100.1));

    expect(result.actions).toEqual({ BUY: 'kept', SELL: 'kept' });
    expect(venue.getOrders().map(order => order.status)).toEqual(['OPEN', 'OPEN']);
    expect(audit.getEventsByType('ORDER_CANCEL_REQUESTED')).toHaveLength(0);
  });

  it('should cancel an order whose price moved exactly the threshold', async () => {
    await manager.reconcile(quote(100, 100.1));
    const result = await manager.reconcile(quote(100.1, 100.1));

    expect(result.actions).toEqual({ BUY: 'cancel_requested', SELL: 'kept' });
  });

  it('should cancel, wait for the terminal status, then place one replacement', async () => {
    const detector = new FillDetector(state, venue, audit);
    await manager.reconcile(quote(100, 100.1));

    const repriced = await manager.reconcile(quote(100.2, 100.1));
    expect(repriced.actions.BUY).toBe('cancel_requested');
    expect(state.get('BUY')?.cancelRequested).toBe(true);
    expect(audit.getEventsByType('ORDER_CANCEL_REQUESTED')[0].details).toEqual({
      orderId: 'dydx_1',
      side: 'BUY',
      trigger: 'reprice',
      oldPrice: 100,
      newPrice: 100.2
    });

    // the entry only leaves once the status poll sees CANCELED
    expect(await detector.detectFills()).toEqual([]);
    expect(state.has('BUY')).toBe(false);

    const replaced = await manager.reconcile(quote(100.2, 100.1));
    expect(replaced.actions).toEqual({ BUY: 'placed', SELL: 'kept' });
    expect(state.get('BUY')?.record).toMatchObject({ id: 'dydx_3', price: 100.2 });
    expect(audit.getEventsByType('ORDER_CANCEL_REQUESTED')).toHaveLength(1);
  });

  it('should report a cancel that lost the race against a fill', async () => {
    await manager.reconcile(quote(100, 100.1));
    venue.fillOrder('dydx_1', 1);

    const result = await manager.reconcile(quote(100.5, 100.1));

    expect(result.actions.BUY).toBe('cancel_raced_fill');
    expect(state.get('BUY')?.cancelRequested).toBe(true);
    expect(audit.getEventsByType('ORDER_CANCEL_RACED_FILL')[0].details).toEqual({
      orderId: 'dydx_1',
      side: 'BUY',
      trigger: 'reprice'
    });
  });

  it('should leave the order live when the cancel request fails', async () => {
    await manager.reconcile(quote(100, 100.1));
    venue.simulateOutage('cancelOrder', 3);

    const result = await manager.reconcile(quote(100.5, 100.1));

    expect(result.actions.BUY).toBe('cancel_failed');
    expect(state.get('BUY')?.cancelRequested).toBe(false);
    expect(audit.getEventsByType('ORDER_CANCEL_FAILED')[0].details).toEqual({
      orderId: 'dydx_1',
      side: 'BUY',
      trigger: 'reprice',
      error: 'cancelOrder on Paper dydx failed after retries: Simulated network outage during cancelOrder on dydx'
    });
  });

  it('should record a failed placement and carry on with the other side', async () => {
    venue.simulateOutage('placeOrder', 1);

    const result = await manager.reconcile(quote(100, 100.1));

    expect(result.actions).toEqual({ BUY: 'placement_rejected', SELL: 'placed' });
    expect(audit.getEventsByType('ORDER_REJECTED')[0].details).toEqual({
      side: 'BUY',
      price: 100,
      size: 1,
      reason: 'TRANSPORT',
      error: 'placeOrder on Paper dydx failed after retries: Simulated network outage during placeOrder on dydx'
    });
    expect(state.get('SELL')?.record.id).toBe('dydx_1');
    expect(riskGuard.getSnapshot().tradesToday).toBe(1);
  });

  it('should ask the risk guard before every placement', async () => {
    build({ ...limits, maxDailyTrades: 1 });

    const result = await manager.reconcile(quote(100, 100.1));

    expect(result.actions).toEqual({ BUY: 'placed', SELL: 'risk_rejected' });
    expect(audit.getEventsByType('RISK_REJECTED')[0].details).toEqual({
      side: 'SELL',
      price: 100.1,
      size: 1,
      reason: 'MAX_DAILY_TRADES',
      message: 'Daily trade cap reached: 1/1'
    });
    expect(venue.getOrders()).toHaveLength(1);
  });

  it('should place nothing while placements are disabled', async () => {
    manager.setPlacementsEnabled(false);

    const result = await manager.reconcile(quote(100, 100.1));

    expect(result.actions).toEqual({ BUY: 'placement_suppressed', SELL: 'placement_suppressed' });
    expect(venue.getOrders()).toEqual([]);
    expect(manager.arePlacementsEnabled()).toBe(false);
  });

  it('should cancel every resting order once on shutdown', async () => {
    await manager.reconcile(quote(100, 100.1));

    expect(await manager.cancelAll('shutdown')).toEqual({ dydx_1: 'canceled', dydx_2: 'canceled' });
    // already requested, nothing left to ask for
    expect(await manager.cancelAll('shutdown')).toEqual({});
    expect(venue.getOrders().map(order => order.status)).toEqual(['CANCELED', 'CANCELED']);
  });

  describe('Property-Based Tests', () => {
    it('should never holds more than one resting order per side', async () => {
      await fc.assert(
        fc.asyncProperty(
          fc.array(fc.record({ bidCents: fc.integer({ min: 9_000, max: 11_000 }), gapCents: fc.integer({ min: 1, max: 50 }) }), {
            minLength: 1,
            maxLength: 15
          }),
          async (quotes) => {
            build();
            const detector = new FillDetector(state, venue, audit);
            for (const { bidCents, gapCents } of quotes) {
              await manager.reconcile(quote(bidCents / 100, (bidCents + gapCents) / 100));
              await detector.detectFills();

              const live = venue.getOrders().filter(order => order.status === 'OPEN');
              expect(live.filter(order => order.side === 'BUY').length).toBeLessThanOrEqual(1);
              expect(live.filter(order => order.side === 'SELL').length).toBeLessThanOrEqual(1);
              expect(state.size()).toBeLessThanOrEqual(2);
            }
          }
        ),
        { numRuns: 50 }
      );
    });

    it('should measure deviation relative to the resting price', () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 1_000_000 }), fc.integer({ min: -1000, max: 1000 }), (oldCents, moveCents) => {
          const oldPrice = oldCents / 100;
          const newPrice = (oldCents + moveCents) / 100;
          expect(priceDeviation(oldPrice, newPrice)).toBeCloseTo(Math.abs(moveCents) / oldCents, 9);
        }),
        { numRuns: 100 }
      );
    });
  });
});
