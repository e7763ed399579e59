import { describe, it, expect, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import { FillDetector } from './FillDetector';
import { RestingOrderState } from './RestingOrderState';
import { AuditService } from './AuditService';
import { PaperVenueConnector } from '../connectors/venues/PaperVenueConnector';
import { OrderSide } from '../models/Order';

const noSleep = async (): Promise<void> => undefined;

describe('FillDetector', () => {
  let venue: PaperVenueConnector;
  let state: RestingOrderState;
  let audit: AuditService;
  let detector: FillDetector;

  beforeEach(() => {
    venue = new PaperVenueConnector('dydx', 'primary', { sleep: noSleep });
    state = new RestingOrderState();
    audit = new AuditService({ signingKey: Buffer.from('test-secret') });
    detector = new FillDetector(state, venue, audit);
  });

  async function rest(side: OrderSide, price: number, size = 2): Promise<string> {
    const record = await venue.placeOrder({ instrument: 'BRETT-USD', side, type: 'LIMIT', size, price });
    state.track(record);
    return record.id;
  }

  it('should return nothing when no order rests', async () => {
    expect(await detector.detectFills()).toEqual([]);
  });

  it('should report each partial fill increment once', async () => {
    const id = await rest('BUY', 100);
    venue.fillOrder(id, 0.5);

    const first = await detector.detectFills();
    expect(first).toHaveLength(1);
    expect(first[0]).toMatchObject({
      orderId: 'dydx_1',
      side: 'BUY',
      incrementalSize: 0.5,
      cumulativeFilledSize: 0.5,
      price: 100,
      terminal: false
    });
    expect(await detector.detectFills()).toEqual([]);
    expect(state.get('BUY')?.observedFilledSize).toBe(0.5);

    venue.fillOrder(id, 1.5);
    const second = await detector.detectFills();
    expect(second).toHaveLength(1);
    expect(second[0]).toMatchObject({ incrementalSize: 1.5, cumulativeFilledSize: 2, terminal: true });
    expect(state.has('BUY')).toBe(false);
  });

  it('should see fills from the book trading through a resting order', async () => {
    await rest('BUY', 100);
    await rest('SELL', 101);
    venue.setOrderBook({
      instrument: 'BRETT-USD',
      bids: [{ price: 99.5, size: 10 }],
      asks: [{ price: 99.9, size: 10 }],
      timestamp: new Date('2024-05-01T10:00:00Z')
    });

    const fills = await detector.detectFills();

    expect(fills.map(fill => [fill.orderId, fill.side, fill.incrementalSize])).toEqual([['dydx_1', 'BUY', 2]]);
    expect(state.has('BUY')).toBe(false);
    expect(state.get('SELL')?.record.id).toBe('dydx_2');
    expect(audit.getEventsByType('ORDER_FILLED')[0].details).toEqual({
      orderId: 'dydx_1',
      side: 'BUY',
      incrementalSize: 2,
      cumulativeFilledSize: 2,
      price: 100,
      status: 'FILLED'
    });
    expect(audit.getEventsByType('ORDER_CLOSED')[0].details).toEqual({
      orderId: 'dydx_1',
      side: 'BUY',
      status: 'FILLED',
      filledSize: 2
    });
  });

  it('should drop a cancelled order without a fill', async () => {
    const id = await rest('SELL', 101);
    await venue.cancelOrder(id);

    expect(await detector.detectFills()).toEqual([]);
    expect(state.size()).toBe(0);
    expect(audit.getEventsByType('ORDER_CLOSED')[0].details.status).toBe('CANCELED');
  });

  it('should report the fill of an order cancelled after a partial fill', async () => {
    const id = await rest('SELL', 101);
    venue.fillOrder(id, 0.75);
    await venue.cancelOrder(id);

    const fills = await detector.detectFills();

    expect(fills).toHaveLength(1);
    expect(fills[0]).toMatchObject({ side: 'SELL', incrementalSize: 0.75, terminal: true });
  });

  it('should forget orders the venue does not know', async () => {
    const at = new Date('2024-05-01T10:00:00Z');
    state.track({
      id: 'ghost',
      instrument: 'BRETT-USD',
      side: 'BUY',
      type: 'LIMIT',
      requestedSize: 1,
      filledSize: 0,
      price: 100,
      status: 'OPEN',
      venue: 'dydx',
      createdAt: at,
      updatedAt: at
    });

    expect(await detector.detectFills()).toEqual([]);
    expect(state.has('BUY')).toBe(false);
    expect(audit.getEventsByType('ORDER_CLOSED')[0].details).toEqual({
      orderId: 'ghost',
      side: 'BUY',
      status: 'NOT_FOUND',
      filledSize: 0
    });
    expect(audit.getEventsByType('ORDER_LOST')[0].details).toMatchObject({
      orderId: 'ghost',
      side: 'BUY',
      lastKnownFilledSize: 0,
      unconfirmedSize: 1
    });
  });

  it('should hand over a known fill when the venue no longer knows the order', async () => {
    const at = new Date('2024-05-01T10:00:00Z');
    state.track({
      id: 'filled-on-placement',
      instrument: 'BRETT-USD',
      side: 'SELL',
      type: 'LIMIT',
      requestedSize: 1,
      filledSize: 1,
      price: 101,
      status: 'FILLED',
      venue: 'dydx',
      createdAt: at,
      updatedAt: at
    });

    const fills = await detector.detectFills();

    expect(fills).toHaveLength(1);
    expect(fills[0]).toMatchObject({
      orderId: 'filled-on-placement',
      side: 'SELL',
      incrementalSize: 1,
      cumulativeFilledSize: 1,
      price: 101,
      terminal: true
    });
    expect(state.has('SELL')).toBe(false);
    expect(audit.getEventsByType('ORDER_LOST')).toEqual([]);
    expect(await detector.detectFills()).toEqual([]);
  });

  it('should keep tracking an order whose status could not be read', async () => {
    await rest('BUY', 100);
    venue.simulateOutage('getOrderStatus', 3);

    expect(await detector.detectFills()).toEqual([]);
    expect(state.get('BUY')?.record.id).toBe('dydx_1');
    expect(audit.getEventsByType('ORDER_STATUS_FAILED')[0].details).toEqual({
      orderId: 'dydx_1',
      side: 'BUY',
      error: 'getOrderStatus on Paper dydx failed after retries: Simulated network outage during getOrderStatus on dydx'
    });
  });

  describe('Property-Based Tests', () => {
    it('should report exactly the filled quantity, however the fills are split', async () => {
      await fc.assert(
        fc.asyncProperty(fc.array(fc.integer({ min: 1, max: 4 }), { minLength: 1, maxLength: 10 }), async (chunks) => {
          const propertyVenue = new PaperVenueConnector('dydx', 'primary', { sleep: noSleep });
          const propertyState = new RestingOrderState();
          const propertyDetector = new FillDetector(propertyState, propertyVenue, new AuditService());
          const order = await propertyVenue.placeOrder({ instrument: 'BRETT-USD', side: 'SELL', type: 'LIMIT', size: 20, price: 1 });
          propertyState.track(order);

          let reported = 0;
          let filled = 0;
          for (const chunk of chunks) {
            if (filled >= 20) break;
            filled = propertyVenue.fillOrder(order.id, chunk).filledSize;
            for (const fill of await propertyDetector.detectFills()) {
              reported += fill.incrementalSize;
            }
          }
          expect(reported).toBe(filled);
          expect(propertyState.has('SELL')).toBe(filled < 20);
        }),
        { numRuns: 100 }
      );
    });
  });
});
