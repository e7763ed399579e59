/**
 * Pricing algorithms: order book snapshot in, bid/ask quote levels out
 */

import { OrderBookSnapshot, Quote } from '../models/OrderBook';
import { ConfigurationError, InvalidSnapshotError } from '../utils/ErrorHandler';

export const DEFAULT_MID_OFFSET = 0.0001;

export interface PricingAlgorithm {
  readonly name: string;
  quote(snapshot: OrderBookSnapshot, size: number): Quote;
}

export interface TopOfBook {
  bestBid: number;
  bestAsk: number;
  mid: number;
}

/**
 * Reads top-of-book, rejecting snapshots that cannot be priced
 */
export function topOfBook(snapshot: OrderBookSnapshot): TopOfBook {
  if (snapshot.bids.length === 0 || snapshot.asks.length === 0) {
    throw new InvalidSnapshotError(
      `Order book for ${snapshot.instrument} has no ${snapshot.bids.length === 0 ? 'bids' : 'asks'}`
    );
  }

  const bestBid = snapshot.bids[0].price;
  const bestAsk = snapshot.asks[0].price;
  if (bestBid >= bestAsk) {
    throw new InvalidSnapshotError(`Order book for ${snapshot.instrument} is crossed: bid ${bestBid} >= ask ${bestAsk}`);
  }

  return { bestBid, bestAsk, mid: (bestBid + bestAsk) / 2 };
}

/**
 * (ask - bid) / mid of a snapshot's top of book
 */
export function relativeSpread(snapshot: OrderBookSnapshot): number {
  const { bestBid, bestAsk, mid } = topOfBook(snapshot);
  return (bestAsk - bestBid) / mid;
}

/**
 * Quotes at the current best bid and best ask
 */
export class BestBidAskPricing implements PricingAlgorithm {
  readonly name = 'BestBidAsk';

  quote(snapshot: OrderBookSnapshot, size: number): Quote {
    const { bestBid, bestAsk } = topOfBook(snapshot);
    return {
      bidPrice: bestBid,
      askPrice: bestAsk,
      size,
      strategy: this.name,
      timestamp: snapshot.timestamp
    };
  }
}

/**
 * Quotes symmetrically around the mid price. The offset is a fraction, 0.0001 being one basis point.
 */
export class MidOffsetPricing implements PricingAlgorithm {
  readonly name: string;
  readonly offset: number;

  constructor(offset: number = DEFAULT_MID_OFFSET) {
    if (!Number.isFinite(offset) || offset <= 0 || offset >= 1) {
      throw new ConfigurationError(`MidOffset offset must be in (0, 1), got ${offset}`);
    }
    this.offset = offset;
    this.name = `MidOffset(${offset})`;
  }

  quote(snapshot: OrderBookSnapshot, size: number): Quote {
    const { mid } = topOfBook(snapshot);
    return {
      bidPrice: mid * (1 - this.offset),
      askPrice: mid * (1 + this.offset),
      size,
      strategy: this.name,
      timestamp: snapshot.timestamp
    };
  }
}

const MID_OFFSET_PATTERN = /^MidOffset\(\s*([0-9]*\.?[0-9]+(?:e-?[0-9]+)?)\s*\)$/i;

/**
 * Resolves a configured strategy name. Unknown names fail here, never at quote time.
 */
export function createPricingAlgorithm(strategy: string): PricingAlgorithm {
  const name = strategy.trim();

  if (name === 'BestBidAsk' || name === 'best_bid_ask') {
    return new BestBidAskPricing();
  }
  if (name === 'MidOffset' || name === 'mid_price_offset') {
    return new MidOffsetPricing(DEFAULT_MID_OFFSET);
  }

  const match = MID_OFFSET_PATTERN.exec(name);
  if (match) {
    return new MidOffsetPricing(Number(match[1]));
  }

  throw new ConfigurationError(`Unknown pricing strategy: ${strategy}`);
}
