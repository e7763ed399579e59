/**
 * Risk Guard enforces position, trade count and stop-loss caps before every placement
 */

import { FillEvent, OrderSide, oppositeSide } from '../models/Order';

export interface RiskLimits {
  maxPositionSize: number;
  maxDailyTrades: number;
  /** Fraction of primary notional, 0.05 = 5% */
  stopLossPercentage: number;
}

export type RiskRejectionReason = 'MAX_POSITION' | 'MAX_UNHEDGED_EXPOSURE' | 'MAX_DAILY_TRADES' | 'STOP_LOSS';

export type RiskDecision =
  | { allowed: true }
  | { allowed: false; reason: RiskRejectionReason; message: string };

export interface RiskSnapshot {
  primaryPosition: number;
  secondaryPosition: number;
  unhedgedExposure: number;
  tradesToday: number;
  tradingDay: string;
  realizedPnl: number;
  primaryNotional: number;
  stopLossTriggered: boolean;
}

const EPSILON = 1e-9;

function signed(side: OrderSide, size: number): number {
  return side === 'BUY' ? size : -size;
}

function utcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export class RiskGuard {
  private readonly limits: RiskLimits;
  private readonly now: () => Date;
  private primaryPosition = 0;
  private secondaryPosition = 0;
  private tradesToday = 0;
  private tradingDay: string;
  private realizedPnl = 0;
  private primaryNotional = 0;
  private stopLossTriggered = false;

  constructor(limits: RiskLimits, now: () => Date = () => new Date()) {
    this.limits = limits;
    this.now = now;
    this.tradingDay = utcDay(now());
  }

  /**
   * Decides whether a primary-venue order may be placed. Synchronous by contract.
   */
  checkPlacement(side: OrderSide, size: number): RiskDecision {
    this.rollTradingDay();

    if (this.stopLossTriggered) {
      return {
        allowed: false,
        reason: 'STOP_LOSS',
        message: `Stop-loss triggered: realized PnL ${this.realizedPnl.toFixed(6)} on notional ${this.primaryNotional.toFixed(6)}`
      };
    }

    if (this.tradesToday >= this.limits.maxDailyTrades) {
      return {
        allowed: false,
        reason: 'MAX_DAILY_TRADES',
        message: `Daily trade cap reached: ${this.tradesToday}/${this.limits.maxDailyTrades}`
      };
    }

    const delta = signed(side, size);
    const projectedPosition = this.primaryPosition + delta;
    if (Math.abs(projectedPosition) > this.limits.maxPositionSize + EPSILON) {
      return {
        allowed: false,
        reason: 'MAX_POSITION',
        message: `Projected primary position ${projectedPosition} exceeds cap ${this.limits.maxPositionSize}`
      };
    }

    const projectedExposure = this.primaryPosition + this.secondaryPosition + delta;
    if (Math.abs(projectedExposure) > this.limits.maxPositionSize + EPSILON) {
      return {
        allowed: false,
        reason: 'MAX_UNHEDGED_EXPOSURE',
        message: `Projected unhedged exposure ${projectedExposure} exceeds cap ${this.limits.maxPositionSize}`
      };
    }

    return { allowed: true };
  }

  recordPlacement(): void {
    this.rollTradingDay();
    this.tradesToday++;
  }

  recordFill(fill: FillEvent): void {
    this.primaryPosition += signed(fill.side, fill.incrementalSize);
    if (fill.price !== undefined) {
      this.primaryNotional += fill.price * fill.incrementalSize;
    }
  }

  /**
   * Records a hedge of a primary fill and books the spread captured when both prices are known
   */
  recordHedge(fill: FillEvent, hedgeSide: OrderSide, hedgeSize: number, hedgePrice?: number): void {
    this.secondaryPosition += signed(hedgeSide, hedgeSize);

    if (fill.price === undefined || hedgePrice === undefined) {
      return;
    }

    // a bought fill is sold on the secondary venue and vice versa
    const pnl = fill.side === 'BUY'
      ? (hedgePrice - fill.price) * hedgeSize
      : (fill.price - hedgePrice) * hedgeSize;
    this.realizedPnl += pnl;

    if (this.primaryNotional > 0 && -this.realizedPnl >= this.limits.stopLossPercentage * this.primaryNotional) {
      this.stopLossTriggered = true;
    }
  }

  /**
   * Books unhedged fills the operator offset by hand; no PnL is known for them
   */
  recordFlattened(fills: FillEvent[]): void {
    for (const fill of fills) {
      this.secondaryPosition += signed(oppositeSide(fill.side), fill.incrementalSize);
    }
  }

  /**
   * Operator reset of the stop-loss latch
   */
  resetStopLoss(): void {
    this.stopLossTriggered = false;
    this.realizedPnl = 0;
    this.primaryNotional = 0;
  }

  getSnapshot(): RiskSnapshot {
    this.rollTradingDay();
    return {
      primaryPosition: this.primaryPosition,
      secondaryPosition: this.secondaryPosition,
      unhedgedExposure: this.primaryPosition + this.secondaryPosition,
      tradesToday: this.tradesToday,
      tradingDay: this.tradingDay,
      realizedPnl: this.realizedPnl,
      primaryNotional: this.primaryNotional,
      stopLossTriggered: this.stopLossTriggered
    };
  }

  getLimits(): RiskLimits {
    return { ...this.limits };
  }

  private rollTradingDay(): void {
    const today = utcDay(this.now());
    if (today !== this.tradingDay) {
      this.tradingDay = today;
      this.tradesToday = 0;
    }
  }
}
