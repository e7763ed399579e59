import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { SyntheticBookFeed, buildBook } from './SyntheticBookFeed';
import { PaperVenueConnector } from './PaperVenueConnector';
import { relativeSpread } from '../../services/PricingAlgorithm';

const noSleep = async (): Promise<void> => undefined;

function venues(): { primary: PaperVenueConnector; secondary: PaperVenueConnector } {
  return {
    primary: new PaperVenueConnector('dydx', 'primary', { sleep: noSleep }),
    secondary: new PaperVenueConnector('hyperliquid', 'secondary', { sleep: noSleep })
  };
}

describe('SyntheticBookFeed', () => {
  it('should build symmetric levels around the mid', () => {
    const book = buildBook('BRETT', 100, 0.01, 2, 10);

    expect(book.instrument).toBe('BRETT');
    expect(book.bids.map(level => level.size)).toEqual([10, 20]);
    expect(book.bids[0].price).toBeCloseTo(99, 9);
    expect(book.bids[1].price).toBeCloseTo(98, 9);
    expect(book.asks[0].price).toBeCloseTo(101, 9);
    expect(book.asks[1].price).toBeCloseTo(102, 9);
  });

  it('should move the mid by at most one step per tick', async () => {
    const { primary, secondary } = venues();
    const feed = new SyntheticBookFeed({ initialMid: 0.05, random: () => 1 });

    feed.tick(primary, 'BRETT-USD', secondary, 'BRETT');

    expect(feed.getMid()).toBeCloseTo(0.050025, 12);
    const primaryBook = await primary.fetchOrderBook('BRETT-USD');
    const secondaryBook = await secondary.fetchOrderBook('BRETT');
    expect(primaryBook.bids).toHaveLength(5);
    expect(primaryBook.bids[0].price).toBeCloseTo(0.050025 * 0.999, 12);
    expect(secondaryBook.asks[0].price).toBeCloseTo(0.050025 * 1.0004, 12);
  });

  it('should hold the mid when the draw is centred', () => {
    const { primary, secondary } = venues();
    const feed = new SyntheticBookFeed({ initialMid: 2, random: () => 0.5 });

    feed.tick(primary, 'BRETT-USD', secondary, 'BRETT');

    expect(feed.getMid()).toBe(2);
  });

  describe('Property-Based Tests', () => {
    it('should keep both books uncrossed with the wider spread on the primary venue', async () => {
      await fc.assert(
        fc.asyncProperty(fc.array(fc.double({ min: 0, max: 1, noNaN: true }), { minLength: 1, maxLength: 30 }), async (draws) => {
          const { primary, secondary } = venues();
          let i = 0;
          const feed = new SyntheticBookFeed({ random: () => draws[i++ % draws.length] });

          for (let tick = 0; tick < draws.length; tick++) {
            feed.tick(primary, 'BRETT-USD', secondary, 'BRETT');
          }

          const primaryBook = await primary.fetchOrderBook('BRETT-USD');
          const secondaryBook = await secondary.fetchOrderBook('BRETT');
          expect(relativeSpread(primaryBook)).toBeGreaterThan(relativeSpread(secondaryBook));
          expect(feed.getMid()).toBeGreaterThan(0);
        }),
        { numRuns: 50 }
      );
    });
  });
});
