/**
 * Paper venue: an in-process simulated venue implementing both connector contracts.
 * Resting orders fill when the book trades through them; market orders walk the book.
 */

import {
  BaseConnectorOptions,
  BaseVenueConnector,
  IPrimaryVenueConnector,
  ISecondaryVenueConnector
} from '../VenueConnector';
import { MarketOrderParams, OrderRecord, OrderSide, PlaceOrderParams, isLiveStatus } from '../../models/Order';
import { OrderBookLevel, OrderBookSnapshot } from '../../models/OrderBook';
import { VenueRole } from '../../models/ConnectorStatus';
import { OrderRejectedError, SnapshotError } from '../../utils/ErrorHandler';

export type PaperOperation = 'fetchOrderBook' | 'placeOrder' | 'cancelOrder' | 'getOrderStatus' | 'placeMarketOrder';

export class PaperVenueConnector extends BaseVenueConnector implements IPrimaryVenueConnector, ISecondaryVenueConnector {
  private books: Map<string, OrderBookSnapshot> = new Map();
  private orders: Map<string, OrderRecord> = new Map();
  private outages: Map<PaperOperation, number> = new Map();
  private rejectMarketOrders = false;
  private nextOrderId = 1;

  constructor(venueId: string, role: VenueRole, options: BaseConnectorOptions = {}) {
    super(venueId, `Paper ${venueId}`, role, {
      rateLimiter: { requestsPerSecond: 1000 },
      ...options
    });
  }

  /**
   * Replaces the book for an instrument and fills resting orders the new book trades through
   */
  setOrderBook(book: OrderBookSnapshot): void {
    this.books.set(book.instrument, {
      ...book,
      bids: [...book.bids].sort((a, b) => b.price - a.price),
      asks: [...book.asks].sort((a, b) => a.price - b.price)
    });
    this.matchRestingOrders(book.instrument);
  }

  /**
   * Makes the next `count` calls of an operation fail with a transport error
   */
  simulateOutage(operation: PaperOperation, count: number): void {
    this.outages.set(operation, count);
  }

  setRejectMarketOrders(reject: boolean): void {
    this.rejectMarketOrders = reject;
  }

  /**
   * Fills part or all of a resting order, as a counterparty would
   */
  fillOrder(orderId: string, size: number): OrderRecord {
    const order = this.orders.get(orderId);
    if (!order || !isLiveStatus(order.status)) {
      throw new Error(`Paper order ${orderId} is not live`);
    }

    order.filledSize = Math.min(order.requestedSize, order.filledSize + size);
    order.status = order.filledSize >= order.requestedSize ? 'FILLED' : 'PARTIALLY_FILLED';
    order.updatedAt = new Date();
    return { ...order };
  }

  getOrders(): OrderRecord[] {
    return Array.from(this.orders.values()).map(order => ({ ...order }));
  }

  async fetchOrderBook(instrument: string): Promise<OrderBookSnapshot> {
    return this.executeWithProtection(async () => {
      this.consumeOutage('fetchOrderBook');
      const book = this.books.get(instrument);
      if (!book) {
        throw new SnapshotError(`No paper order book for ${instrument}`, {
          operation: 'fetchOrderBook',
          component: 'PaperVenueConnector',
          venueId: this.venueId,
          timestamp: new Date()
        });
      }
      return {
        ...book,
        bids: book.bids.map(level => ({ ...level })),
        asks: book.asks.map(level => ({ ...level })),
        timestamp: new Date()
      };
    }, 'fetchOrderBook', { idempotent: true });
  }

  async placeOrder(params: PlaceOrderParams): Promise<OrderRecord> {
    return this.executeWithProtection(async () => {
      this.consumeOutage('placeOrder');
      if (params.type === 'LIMIT' && (params.price === undefined || params.price <= 0)) {
        throw this.rejection(`Limit order requires a positive price`, 'REJECTED', 'placeOrder');
      }
      if (params.type === 'MARKET') {
        return this.executeMarket(params.instrument, params.side, params.size);
      }

      const order = this.newOrder(params.instrument, params.side, 'LIMIT', params.size, params.price);
      order.status = 'OPEN';
      this.orders.set(order.id, order);
      this.matchRestingOrders(params.instrument);
      return { ...order };
    }, 'placeOrder', { idempotent: false });
  }

  async cancelOrder(orderId: string): Promise<boolean> {
    return this.executeWithProtection(async () => {
      this.consumeOutage('cancelOrder');
      const order = this.orders.get(orderId);
      if (!order || !isLiveStatus(order.status)) {
        return false;
      }
      order.status = 'CANCELED';
      order.updatedAt = new Date();
      return true;
    }, 'cancelOrder', { idempotent: true });
  }

  async getOrderStatus(orderId: string): Promise<OrderRecord> {
    return this.executeWithProtection(async () => {
      this.consumeOutage('getOrderStatus');
      const order = this.orders.get(orderId);
      if (!order) {
        throw this.rejection(`Unknown paper order ${orderId}`, 'NOT_FOUND', 'getOrderStatus');
      }
      return { ...order };
    }, 'getOrderStatus', { idempotent: true });
  }

  async placeMarketOrder(params: MarketOrderParams): Promise<OrderRecord> {
    return this.executeWithProtection(async () => {
      this.consumeOutage('placeMarketOrder');
      if (this.rejectMarketOrders) {
        throw this.rejection(`Market orders are disabled on ${this.venueId}`, 'REJECTED', 'placeMarketOrder');
      }
      return this.executeMarket(params.instrument, params.side, params.size);
    }, 'placeMarketOrder', { idempotent: false });
  }

  private executeMarket(instrument: string, side: OrderSide, size: number): OrderRecord {
    const book = this.books.get(instrument);
    const levels: OrderBookLevel[] = book ? (side === 'BUY' ? book.asks : book.bids) : [];

    let remaining = size;
    let notional = 0;
    for (const level of levels) {
      if (remaining <= 0) break;
      const take = Math.min(remaining, level.size);
      notional += take * level.price;
      remaining -= take;
    }
    // depth beyond the book is filled at the last level
    if (remaining > 0 && levels.length > 0) {
      notional += remaining * levels[levels.length - 1].price;
      remaining = 0;
    }

    const order = this.newOrder(instrument, side, 'MARKET', size, levels.length > 0 ? notional / size : undefined);
    order.filledSize = size;
    order.status = 'FILLED';
    this.orders.set(order.id, order);
    return { ...order };
  }

  private matchRestingOrders(instrument: string): void {
    const book = this.books.get(instrument);
    if (!book) return;

    const bestBid = book.bids[0]?.price;
    const bestAsk = book.asks[0]?.price;

    for (const order of this.orders.values()) {
      if (order.instrument !== instrument || order.type !== 'LIMIT' || !isLiveStatus(order.status)) continue;
      const price = order.price ?? 0;

      const tradedThrough = order.side === 'BUY'
        ? (bestAsk !== undefined && bestAsk <= price) || (bestBid !== undefined && bestBid < price)
        : (bestBid !== undefined && bestBid >= price) || (bestAsk !== undefined && bestAsk > price);

      if (tradedThrough) {
        order.filledSize = order.requestedSize;
        order.status = 'FILLED';
        order.updatedAt = new Date();
      }
    }
  }

  private newOrder(
    instrument: string,
    side: OrderSide,
    type: OrderRecord['type'],
    size: number,
    price?: number
  ): OrderRecord {
    const now = new Date();
    return {
      id: `${this.venueId}_${this.nextOrderId++}`,
      instrument,
      side,
      type,
      requestedSize: size,
      filledSize: 0,
      price,
      status: 'PENDING',
      venue: this.venueId,
      createdAt: now,
      updatedAt: now
    };
  }

  private consumeOutage(operation: PaperOperation): void {
    const remaining = this.outages.get(operation) ?? 0;
    if (remaining > 0) {
      this.outages.set(operation, remaining - 1);
      throw new Error(`Simulated network outage during ${operation} on ${this.venueId}`);
    }
  }

  private rejection(message: string, reason: OrderRejectedError['reason'], operation: string): OrderRejectedError {
    return new OrderRejectedError(message, reason, {
      operation,
      component: 'PaperVenueConnector',
      venueId: this.venueId,
      timestamp: new Date()
    });
  }
}
