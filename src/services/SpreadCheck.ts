/**
 * Pre-flight spread check: reads both venues' books and compares their relative spreads
 */

import { IPrimaryVenueConnector, ISecondaryVenueConnector } from '../connectors/VenueConnector';
import { OrderBookSnapshot } from '../models/OrderBook';
import { TopOfBook, topOfBook } from './PricingAlgorithm';
import { ConfigurationError } from '../utils/ErrorHandler';

export interface VenueSpread extends TopOfBook {
  venueId: string;
  instrument: string;
  /** (ask - bid) / mid */
  spread: number;
}

export interface SpreadCheckResult {
  primary: VenueSpread;
  secondary: VenueSpread;
  /** primary spread minus secondary spread; positive means quoting the primary has room */
  differential: number;
}

function venueSpread(venueId: string, snapshot: OrderBookSnapshot): VenueSpread {
  const top = topOfBook(snapshot);
  return {
    venueId,
    instrument: snapshot.instrument,
    ...top,
    spread: (top.bestAsk - top.bestBid) / top.mid
  };
}

export async function checkSpreads(
  primary: IPrimaryVenueConnector,
  primaryInstrument: string,
  secondary: ISecondaryVenueConnector,
  secondaryInstrument: string
): Promise<SpreadCheckResult> {
  if (!secondary.fetchOrderBook) {
    throw new ConfigurationError(`Secondary venue ${secondary.venueId} does not publish an order book`);
  }

  const [primaryBook, secondaryBook] = await Promise.all([
    primary.fetchOrderBook(primaryInstrument),
    secondary.fetchOrderBook(secondaryInstrument)
  ]);

  const primarySpread = venueSpread(primary.venueId, primaryBook);
  const secondarySpread = venueSpread(secondary.venueId, secondaryBook);

  return {
    primary: primarySpread,
    secondary: secondarySpread,
    differential: primarySpread.spread - secondarySpread.spread
  };
}

function formatVenue(venue: VenueSpread): string {
  return `${venue.venueId} ${venue.instrument}: bid ${venue.bestBid} ask ${venue.bestAsk} spread ${(venue.spread * 100).toFixed(4)}%`;
}

export function formatSpreadCheck(result: SpreadCheckResult): string[] {
  return [
    formatVenue(result.primary),
    formatVenue(result.secondary),
    `Spread difference: ${result.differential.toFixed(6)}`
  ];
}
