import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { HyperliquidConnector } from './HyperliquidConnector';
import { SnapshotError } from '../../utils/ErrorHandler';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('HyperliquidConnector', () => {
  let fetchMock: Mock<[string, RequestInit?], Promise<Response>>;
  let connector: HyperliquidConnector;

  beforeEach(() => {
    fetchMock = vi.fn<[string, RequestInit?], Promise<Response>>();
    vi.stubGlobal('fetch', fetchMock);
    connector = new HyperliquidConnector({
      gatewayUrl: 'http://gateway.test',
      infoUrl: 'https://info.test/info',
      credentials: { apiKey: 'test-key', secret: 'test-secret' },
      sleep: async () => undefined,
      now: () => 1714557600000
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should read the L2 book from the info endpoint', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({
      coin: 'BRETT',
      levels: [
        [{ px: '0.0501', sz: '100', n: 2 }, { px: '0.05', sz: '300', n: 4 }],
        [{ px: '0.0503', sz: '50', n: 1 }]
      ]
    }));

    const book = await connector.fetchOrderBook('BRETT');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://info.test/info');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"type":"l2Book","coin":"BRETT"}');
    expect(book.bids).toEqual([{ price: 0.0501, size: 100 }, { price: 0.05, size: 300 }]);
    expect(book.asks).toEqual([{ price: 0.0503, size: 50 }]);
  });

  it('should do not retry a public endpoint that answered with an error', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({}, 404));

    const error = await connector.fetchOrderBook('NOPE').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SnapshotError);
    expect(error).toHaveProperty('message', 'Public request to Hyperliquid failed with HTTP 404');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should reject a book without both sides', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ coin: 'BRETT', levels: [[]] }));

    await expect(connector.fetchOrderBook('BRETT')).rejects.toThrow(
      'Failed to fetch Hyperliquid book for BRETT: fetchOrderBook on Hyperliquid failed after retries: Invalid venue response: l2Book levels missing'
    );
  });

  it('should submit market orders and read the average fill price', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({
      order: {
        id: 9001,
        instrument: 'BRETT',
        side: 'SELL',
        type: 'MARKET',
        size: 1,
        filledSize: 1,
        price: null,
        avgFillPrice: '0.0502',
        status: 'filled',
        createdAt: 1714557600000
      }
    }));

    const record = await connector.placeMarketOrder({ instrument: 'BRETT', side: 'SELL', size: 1 });

    expect(JSON.parse(String(fetchMock.mock.calls[0][1]?.body))).toEqual({ instrument: 'BRETT', side: 'SELL', type: 'MARKET', size: 1 });
    expect(record).toMatchObject({
      id: '9001',
      side: 'SELL',
      type: 'MARKET',
      filledSize: 1,
      price: 0.0502,
      status: 'FILLED',
      venue: 'hyperliquid',
      createdAt: new Date(1714557600000)
    });
  });

  it('should attempt a market order once, even through an outage', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({}, 502));

    await expect(connector.placeMarketOrder({ instrument: 'BRETT', side: 'BUY', size: 1 })).rejects.toThrow(
      'placeMarketOrder on Hyperliquid failed after retries: Gateway POST /orders failed with HTTP 502'
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should report venue refusals as order rejections', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ message: 'insufficient margin' }, 422));

    await expect(connector.placeMarketOrder({ instrument: 'BRETT', side: 'BUY', size: 1 })).rejects.toMatchObject({
      reason: 'REJECTED',
      message: 'Hyperliquid refused placeMarketOrder: insufficient margin'
    });
  });
});
