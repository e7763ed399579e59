/**
 * Order book snapshot and quote models
 */

export interface OrderBookLevel {
  price: number;
  size: number;
}

/**
 * Bids are sorted by descending price, asks by ascending price
 */
export interface OrderBookSnapshot {
  instrument: string;
  bids: OrderBookLevel[];
  asks: OrderBookLevel[];
  timestamp: Date;
}

export interface Quote {
  bidPrice: number;
  askPrice: number;
  size: number;
  strategy: string;
  timestamp: Date;
}
