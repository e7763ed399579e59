/**
 * Order and fill data models
 */

export type OrderSide = 'BUY' | 'SELL';
export type OrderType = 'LIMIT' | 'MARKET';
export type OrderStatus =
  | 'PENDING'
  | 'OPEN'
  | 'PARTIALLY_FILLED'
  | 'FILLED'
  | 'CANCELED'
  | 'REJECTED';

export const ORDER_SIDES: readonly OrderSide[] = ['BUY', 'SELL'];

export interface OrderRecord {
  id: string;
  instrument: string;
  side: OrderSide;
  type: OrderType;
  requestedSize: number;
  filledSize: number;
  /** Limit price, or the average fill price of a market order when the venue reports one */
  price?: number;
  status: OrderStatus;
  venue: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface PlaceOrderParams {
  instrument: string;
  side: OrderSide;
  type: OrderType;
  size: number;
  price?: number;
}

export interface MarketOrderParams {
  instrument: string;
  side: OrderSide;
  size: number;
}

/**
 * A fill observed on the primary venue, sized to what is new since the last observation
 */
export interface FillEvent {
  orderId: string;
  side: OrderSide;
  incrementalSize: number;
  cumulativeFilledSize: number;
  price?: number;
  terminal: boolean;
  detectedAt: Date;
}

export function oppositeSide(side: OrderSide): OrderSide {
  return side === 'BUY' ? 'SELL' : 'BUY';
}

/**
 * Live statuses occupy a side of the resting-order set
 */
export function isLiveStatus(status: OrderStatus): boolean {
  return status === 'PENDING' || status === 'OPEN' || status === 'PARTIALLY_FILLED';
}

export function isTerminalStatus(status: OrderStatus): boolean {
  return !isLiveStatus(status);
}
