/**
 * Hyperliquid secondary venue connector.
 * The L2 book comes from the public info endpoint; market orders go through the order gateway.
 */

import { GatewayVenueConnector, GatewayVenueOptions, isJsonObject, parseLevels } from './GatewayVenueConnector';
import { ISecondaryVenueConnector } from '../VenueConnector';
import { MarketOrderParams, OrderRecord } from '../../models/Order';
import { OrderBookSnapshot } from '../../models/OrderBook';
import { ApplicationError, SnapshotError, errorMessage } from '../../utils/ErrorHandler';

export const HYPERLIQUID_INFO_URL = 'https://api.hyperliquid.xyz/info';

export interface HyperliquidConnectorOptions extends GatewayVenueOptions {
  infoUrl?: string;
}

export class HyperliquidConnector extends GatewayVenueConnector implements ISecondaryVenueConnector {
  private readonly infoUrl: string;

  constructor(options: HyperliquidConnectorOptions) {
    super('hyperliquid', 'Hyperliquid', 'secondary', options);
    this.infoUrl = options.infoUrl ?? HYPERLIQUID_INFO_URL;
  }

  /**
   * Instruments are coin names such as BRETT
   */
  async fetchOrderBook(instrument: string): Promise<OrderBookSnapshot> {
    try {
      return await this.executeWithProtection(async () => {
        const data = await this.publicRequest(this.infoUrl, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ type: 'l2Book', coin: instrument })
        });
        if (!isJsonObject(data) || !Array.isArray(data.levels) || data.levels.length !== 2) {
          throw new Error('Invalid venue response: l2Book levels missing');
        }
        const [bids, asks] = data.levels;
        return {
          instrument,
          bids: parseLevels(bids, 'px', 'sz').sort((a, b) => b.price - a.price),
          asks: parseLevels(asks, 'px', 'sz').sort((a, b) => a.price - b.price),
          timestamp: new Date()
        };
      }, 'fetchOrderBook', { idempotent: true });
    } catch (error) {
      if (error instanceof ApplicationError) throw error;
      throw new SnapshotError(`Failed to fetch Hyperliquid book for ${instrument}: ${errorMessage(error)}`, {
        operation: 'fetchOrderBook',
        component: 'HyperliquidConnector',
        venueId: this.venueId,
        timestamp: new Date()
      }, error instanceof Error ? error : undefined);
    }
  }

  async placeMarketOrder(params: MarketOrderParams): Promise<OrderRecord> {
    return this.executeWithProtection(async () => {
      const { status, data } = await this.signedRequest('POST', '/orders', {
        instrument: params.instrument,
        side: params.side,
        type: 'MARKET',
        size: params.size
      });
      if (status >= 400) {
        throw this.rejectionFrom(status, data, 'placeMarketOrder');
      }
      return this.parseGatewayOrder(data);
    }, 'placeMarketOrder', { idempotent: false });
  }
}
