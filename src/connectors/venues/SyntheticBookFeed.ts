/**
 * Drifting synthetic order books for paper trading. Each tick moves the mid by a
 * bounded random step and rebuilds both venues' books around it.
 */

import { OrderBookLevel, OrderBookSnapshot } from '../../models/OrderBook';
import { PaperVenueConnector } from './PaperVenueConnector';

export interface SyntheticBookOptions {
  initialMid: number;
  /** Largest relative mid move per tick, 0.0005 = 5 bps */
  maxStep: number;
  /** Relative half-spread on the primary venue */
  primaryHalfSpread: number;
  /** Relative half-spread on the secondary venue */
  secondaryHalfSpread: number;
  levels: number;
  levelSize: number;
  random?: () => number;
}

export const DEFAULT_SYNTHETIC_BOOK: SyntheticBookOptions = {
  initialMid: 0.05,
  maxStep: 0.0005,
  primaryHalfSpread: 0.001,
  secondaryHalfSpread: 0.0004,
  levels: 5,
  levelSize: 500
};

export function buildBook(instrument: string, mid: number, halfSpread: number, levels: number, levelSize: number): OrderBookSnapshot {
  const bids: OrderBookLevel[] = [];
  const asks: OrderBookLevel[] = [];
  for (let i = 0; i < levels; i++) {
    const offset = halfSpread * (i + 1);
    bids.push({ price: mid * (1 - offset), size: levelSize * (i + 1) });
    asks.push({ price: mid * (1 + offset), size: levelSize * (i + 1) });
  }
  return { instrument, bids, asks, timestamp: new Date() };
}

export class SyntheticBookFeed {
  private readonly options: SyntheticBookOptions;
  private readonly random: () => number;
  private mid: number;

  constructor(options: Partial<SyntheticBookOptions> = {}) {
    this.options = { ...DEFAULT_SYNTHETIC_BOOK, ...options };
    this.random = this.options.random ?? Math.random;
    this.mid = this.options.initialMid;
  }

  getMid(): number {
    return this.mid;
  }

  /**
   * Advances the mid one step and publishes fresh books to both paper venues
   */
  tick(
    primary: PaperVenueConnector,
    primarySymbol: string,
    secondary: PaperVenueConnector,
    secondarySymbol: string
  ): void {
    const step = (this.random() * 2 - 1) * this.options.maxStep;
    this.mid = this.mid * (1 + step);

    const { primaryHalfSpread, secondaryHalfSpread, levels, levelSize } = this.options;
    secondary.setOrderBook(buildBook(secondarySymbol, this.mid, secondaryHalfSpread, levels, levelSize));
    primary.setOrderBook(buildBook(primarySymbol, this.mid, primaryHalfSpread, levels, levelSize));
  }
}
