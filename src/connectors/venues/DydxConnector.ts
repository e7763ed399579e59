/**
 * dYdX v4 primary venue connector.
 * Public order book reads go to the indexer; order writes and status go through the order gateway.
 */

import { GatewayVenueConnector, GatewayVenueOptions, isJsonObject, parseLevels } from './GatewayVenueConnector';
import { IPrimaryVenueConnector } from '../VenueConnector';
import { OrderRecord, PlaceOrderParams } from '../../models/Order';
import { OrderBookSnapshot } from '../../models/OrderBook';
import { ApplicationError, SnapshotError, errorMessage } from '../../utils/ErrorHandler';

export const DYDX_INDEXER_URL = 'https://indexer.dydx.trade/v4';

export interface DydxConnectorOptions extends GatewayVenueOptions {
  indexerUrl?: string;
}

export class DydxConnector extends GatewayVenueConnector implements IPrimaryVenueConnector {
  private readonly indexerUrl: string;

  constructor(options: DydxConnectorOptions) {
    super('dydx', 'dYdX', 'primary', options);
    this.indexerUrl = (options.indexerUrl ?? DYDX_INDEXER_URL).replace(/\/+$/, '');
  }

  /**
   * Instruments are perpetual tickers such as BRETT-USD
   */
  async fetchOrderBook(instrument: string): Promise<OrderBookSnapshot> {
    try {
      return await this.executeWithProtection(async () => {
        const data = await this.publicRequest(
          `${this.indexerUrl}/orderbooks/perpetualMarket/${encodeURIComponent(instrument)}`
        );
        if (!isJsonObject(data)) {
          throw new Error('Invalid venue response: order book is not an object');
        }
        return {
          instrument,
          bids: parseLevels(data.bids, 'price', 'size').sort((a, b) => b.price - a.price),
          asks: parseLevels(data.asks, 'price', 'size').sort((a, b) => a.price - b.price),
          timestamp: new Date()
        };
      }, 'fetchOrderBook', { idempotent: true });
    } catch (error) {
      if (error instanceof ApplicationError) throw error;
      throw new SnapshotError(`Failed to fetch dYdX order book for ${instrument}: ${errorMessage(error)}`, {
        operation: 'fetchOrderBook',
        component: 'DydxConnector',
        venueId: this.venueId,
        timestamp: new Date()
      }, error instanceof Error ? error : undefined);
    }
  }

  async placeOrder(params: PlaceOrderParams): Promise<OrderRecord> {
    return this.executeWithProtection(async () => {
      const { status, data } = await this.signedRequest('POST', '/orders', {
        instrument: params.instrument,
        side: params.side,
        type: params.type,
        size: params.size,
        price: params.price,
        timeInForce: params.type === 'LIMIT' ? 'GTT' : 'IOC',
        postOnly: params.type === 'LIMIT'
      });
      if (status >= 400) {
        throw this.rejectionFrom(status, data, 'placeOrder');
      }
      return this.parseGatewayOrder(data);
    }, 'placeOrder', { idempotent: false });
  }

  async cancelOrder(orderId: string): Promise<boolean> {
    return this.executeWithProtection(async () => {
      const { status, data } = await this.signedRequest('DELETE', `/orders/${encodeURIComponent(orderId)}`);
      if (status === 409) {
        // already filled or already gone
        return false;
      }
      if (status >= 400) {
        throw this.rejectionFrom(status, data, 'cancelOrder');
      }
      return !(isJsonObject(data) && data.canceled === false);
    }, 'cancelOrder', { idempotent: true });
  }

  async getOrderStatus(orderId: string): Promise<OrderRecord> {
    return this.executeWithProtection(async () => {
      const { status, data } = await this.signedRequest('GET', `/orders/${encodeURIComponent(orderId)}`);
      if (status >= 400) {
        throw this.rejectionFrom(status, data, 'getOrderStatus');
      }
      return this.parseGatewayOrder(data);
    }, 'getOrderStatus', { idempotent: true });
  }
}
