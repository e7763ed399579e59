/**
 * Resting-order state for one instrument on the primary venue: at most one live order per side
 */

import { OrderRecord, OrderSide, isLiveStatus } from '../models/Order';

export interface RestingOrder {
  record: OrderRecord;
  /** filledSize already handed to hedge dispatch */
  observedFilledSize: number;
  cancelRequested: boolean;
  cancelRequestedAt?: Date;
}

export class RestingOrderState {
  private readonly orders: Map<OrderSide, RestingOrder> = new Map();

  get(side: OrderSide): RestingOrder | undefined {
    return this.orders.get(side);
  }

  has(side: OrderSide): boolean {
    return this.orders.has(side);
  }

  /**
   * Starts tracking a freshly placed order. A side already occupied is a programming error.
   */
  track(record: OrderRecord): RestingOrder {
    const existing = this.orders.get(record.side);
    if (existing) {
      throw new Error(
        `Resting ${record.side} order ${existing.record.id} already tracked; refusing to track ${record.id}`
      );
    }

    const entry: RestingOrder = {
      record: { ...record },
      // fills reported in the placement response are hedged on the first poll
      observedFilledSize: 0,
      cancelRequested: false
    };
    this.orders.set(record.side, entry);
    return entry;
  }

  markCancelRequested(side: OrderSide, at: Date = new Date()): void {
    const entry = this.orders.get(side);
    if (entry && !entry.cancelRequested) {
      entry.cancelRequested = true;
      entry.cancelRequestedAt = at;
    }
  }

  /**
   * Applies a status observation and returns the newly filled quantity (0 when nothing new).
   * The entry is removed in the same step when the status is terminal.
   */
  applyStatus(side: OrderSide, status: OrderRecord): { increment: number; removed: boolean } {
    const entry = this.orders.get(side);
    if (!entry || entry.record.id !== status.id) {
      return { increment: 0, removed: false };
    }

    const increment = Math.max(0, status.filledSize - entry.observedFilledSize);
    entry.observedFilledSize = Math.max(entry.observedFilledSize, status.filledSize);
    entry.record = { ...entry.record, ...status, price: status.price ?? entry.record.price };

    if (!isLiveStatus(status.status)) {
      this.orders.delete(side);
      return { increment, removed: true };
    }

    return { increment, removed: false };
  }

  remove(side: OrderSide, orderId: string): boolean {
    const entry = this.orders.get(side);
    if (entry && entry.record.id === orderId) {
      this.orders.delete(side);
      return true;
    }
    return false;
  }

  all(): RestingOrder[] {
    return Array.from(this.orders.values());
  }

  size(): number {
    return this.orders.size;
  }
}
