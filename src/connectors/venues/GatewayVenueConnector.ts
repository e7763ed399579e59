/**
 * Shared plumbing for live venues: HMAC-signed JSON requests to an order gateway
 * and parsing of the gateway's order representation
 */

import { createHmac } from 'crypto';
import { BaseConnectorOptions, BaseVenueConnector, VenueCredentials } from '../VenueConnector';
import { OrderRecord, OrderSide, OrderStatus, OrderType } from '../../models/Order';
import { OrderBookLevel } from '../../models/OrderBook';
import { VenueRole } from '../../models/ConnectorStatus';
import {
  ApplicationError,
  ConfigurationError,
  ErrorCategory,
  ErrorSeverity,
  OrderRejectedError,
  SnapshotError
} from '../../utils/ErrorHandler';

export interface GatewayVenueOptions extends BaseConnectorOptions {
  gatewayUrl: string;
  credentials: VenueCredentials;
  requestTimeoutMs?: number;
}

type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readNumber(value: unknown, field: string): number {
  const parsed = typeof value === 'string' ? parseFloat(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
    throw new Error(`Invalid venue response: ${field} is not a number`);
  }
  return parsed;
}

function readOptionalNumber(value: unknown, field: string): number | undefined {
  return value === undefined || value === null || value === '' ? undefined : readNumber(value, field);
}

function readString(value: unknown, field: string): string {
  if (typeof value === 'string' && value.length > 0) return value;
  if (typeof value === 'number') return value.toString();
  throw new Error(`Invalid venue response: ${field} is missing`);
}

function readDate(value: unknown): Date {
  if (typeof value === 'number') return new Date(value);
  if (typeof value === 'string') {
    const parsed = new Date(value);
    if (!Number.isNaN(parsed.getTime())) return parsed;
  }
  return new Date();
}

function parseJsonBody(text: string): unknown {
  return text.length > 0 ? JSON.parse(text) : {};
}

/**
 * Error bodies from proxies are often plain text; they become `{ message }`
 */
function parseErrorBody(text: string): unknown {
  try {
    return parseJsonBody(text);
  } catch {
    return { message: text.trim() };
  }
}

/**
 * Parses `[{ price, size }]`-shaped levels, dropping empty ones
 */
export function parseLevels(value: unknown, priceKey: string, sizeKey: string): OrderBookLevel[] {
  if (!Array.isArray(value)) {
    throw new Error('Invalid venue response: book side is not an array');
  }
  return value
    .filter(isJsonObject)
    .map(level => ({
      price: readNumber(level[priceKey], priceKey),
      size: readNumber(level[sizeKey], sizeKey)
    }))
    .filter(level => level.price > 0 && level.size > 0);
}

export function mapGatewayStatus(status: string): OrderStatus {
  switch (status.toLowerCase()) {
    case 'pending':
    case 'untriggered':
    case 'best_effort_opened':
      return 'PENDING';
    case 'open':
    case 'live':
      return 'OPEN';
    case 'partially_filled':
    case 'partial':
      return 'PARTIALLY_FILLED';
    case 'filled':
      return 'FILLED';
    case 'canceled':
    case 'cancelled':
    case 'best_effort_canceled':
      return 'CANCELED';
    case 'rejected':
      return 'REJECTED';
    default:
      return 'PENDING';
  }
}

function readSide(value: unknown): OrderSide {
  const side = readString(value, 'side').toUpperCase();
  if (side === 'BUY' || side === 'SELL') return side;
  throw new Error(`Invalid venue response: unknown side ${side}`);
}

function readType(value: unknown): OrderType {
  return readString(value, 'type').toUpperCase() === 'MARKET' ? 'MARKET' : 'LIMIT';
}

/**
 * Base class for venues whose writes go through the order gateway
 */
export abstract class GatewayVenueConnector extends BaseVenueConnector {
  protected readonly gatewayUrl: string;
  private readonly credentials: VenueCredentials;
  private readonly requestTimeoutMs: number;

  constructor(venueId: string, name: string, role: VenueRole, options: GatewayVenueOptions) {
    super(venueId, name, role, options);
    if (!options.credentials.apiKey || !options.credentials.secret) {
      throw new ConfigurationError(`Missing credentials for venue ${venueId}`);
    }
    this.gatewayUrl = options.gatewayUrl.replace(/\/+$/, '');
    this.credentials = options.credentials;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 5000;
  }

  /**
   * Sends a signed request to the gateway and returns the parsed JSON body
   */
  protected async signedRequest(method: 'GET' | 'POST' | 'DELETE', path: string, body?: JsonObject): Promise<{ status: number; data: unknown }> {
    const timestamp = this.now().toString();
    const payload = body ? JSON.stringify(body) : '';
    const signature = createHmac('sha256', this.credentials.secret)
      .update(`${timestamp}${method}${path}${payload}`)
      .digest('hex');

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'X-HEDGER-APIKEY': this.credentials.apiKey,
      'X-HEDGER-TIMESTAMP': timestamp,
      'X-HEDGER-SIGNATURE': signature
    };
    if (this.credentials.passphrase) {
      headers['X-HEDGER-PASSPHRASE'] = this.credentials.passphrase;
    }

    const response = await fetch(`${this.gatewayUrl}${path}`, {
      method,
      headers,
      body: body ? payload : undefined,
      signal: AbortSignal.timeout(this.requestTimeoutMs)
    });

    if (response.status >= 500) {
      throw new ApplicationError(
        `Gateway ${method} ${path} failed with HTTP ${response.status}`,
        'GATEWAY_UNAVAILABLE',
        ErrorCategory.NETWORK,
        ErrorSeverity.MEDIUM,
        { operation: path, component: this.constructor.name, venueId: this.venueId, timestamp: new Date() }
      );
    }

    const text = await response.text();
    const data = response.status >= 400 ? parseErrorBody(text) : parseJsonBody(text);

    return { status: response.status, data };
  }

  /**
   * Fetches JSON from a public endpoint; failures become SnapshotErrors
   */
  protected async publicRequest(url: string, init: RequestInit = {}): Promise<unknown> {
    const response = await fetch(url, { ...init, signal: AbortSignal.timeout(this.requestTimeoutMs) });
    if (!response.ok) {
      throw new SnapshotError(`Public request to ${this.name} failed with HTTP ${response.status}`, {
        operation: 'fetchOrderBook',
        component: this.constructor.name,
        venueId: this.venueId,
        timestamp: new Date()
      });
    }
    return response.json();
  }

  protected rejectionFrom(status: number, data: unknown, operation: string): OrderRejectedError {
    const message = isJsonObject(data) && typeof data.message === 'string' ? data.message : `HTTP ${status}`;
    const reason = status === 404
      ? 'NOT_FOUND'
      : status === 409 || /filled/i.test(message) ? 'ALREADY_FILLED' : 'REJECTED';

    return new OrderRejectedError(`${this.name} refused ${operation}: ${message}`, reason, {
      operation,
      component: this.constructor.name,
      venueId: this.venueId,
      timestamp: new Date()
    });
  }

  protected parseGatewayOrder(data: unknown): OrderRecord {
    const order = isJsonObject(data) && isJsonObject(data.order) ? data.order : data;
    if (!isJsonObject(order)) {
      throw new Error('Invalid venue response: order is not an object');
    }

    return {
      id: readString(order.id, 'id'),
      instrument: readString(order.instrument, 'instrument'),
      side: readSide(order.side),
      type: readType(order.type),
      requestedSize: readNumber(order.size, 'size'),
      filledSize: readOptionalNumber(order.filledSize, 'filledSize') ?? 0,
      price: readOptionalNumber(order.avgFillPrice, 'avgFillPrice') ?? readOptionalNumber(order.price, 'price'),
      status: mapGatewayStatus(readString(order.status, 'status')),
      venue: this.venueId,
      createdAt: readDate(order.createdAt),
      updatedAt: readDate(order.updatedAt ?? order.createdAt)
    };
  }
}
