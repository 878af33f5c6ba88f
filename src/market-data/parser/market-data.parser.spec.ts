import { ProviderError } from '@/infra/errors';
import { MarketDataParser } from './market-data.parser';

// 09:30 New York (UTC-5) 的 epoch 秒
const nyOpen = (y: number, m: number, d: number) =>
  Date.UTC(y, m - 1, d, 14, 30) / 1000;

describe('MarketDataParser', () => {
  const parser = new MarketDataParser();

  it('parses daily rows into exchange-dated bars', () => {
    const bars = parser.parseChart(
      {
        chart: {
          result: [
            {
              meta: { symbol: 'ACME', gmtoffset: -18000 },
              timestamp: [nyOpen(2025, 11, 20), nyOpen(2025, 11, 21)],
              indicators: {
                quote: [
                  {
                    open: [10, 11],
                    high: [12, 13],
                    low: [9, 10],
                    close: [11, 12.5],
                    volume: [1000, null],
                  },
                ],
              },
            },
          ],
          error: null,
        },
      },
      'ACME',
    );

    expect(bars).toEqual([
      { date: '2025-11-20', open: 10, high: 12, low: 9, close: 11, volume: 1000 },
      { date: '2025-11-21', open: 11, high: 13, low: 10, close: 12.5, volume: 0 },
    ]);
  });

  it('drops rows with a missing price', () => {
    const bars = parser.parseChart(
      {
        chart: {
          result: [
            {
              meta: { gmtoffset: -18000 },
              timestamp: [nyOpen(2025, 11, 20), nyOpen(2025, 11, 21)],
              indicators: {
                quote: [
                  {
                    open: [10, 11],
                    high: [12, 13],
                    low: [9, 10],
                    close: [null, 12],
                    volume: [1, 2],
                  },
                ],
              },
            },
          ],
        },
      },
      'ACME',
    );
    expect(bars.map((b) => b.date)).toEqual(['2025-11-21']);
  });

  it('returns no bars when the range has no timestamps', () => {
    const bars = parser.parseChart(
      {
        chart: {
          result: [{ meta: { gmtoffset: 0 }, indicators: { quote: [{}] } }],
          error: null,
        },
      },
      'ACME',
    );
    expect(bars).toEqual([]);
  });

  it('reports a provider error payload as not_found', () => {
    let caught: unknown;
    try {
      parser.parseChart(
        {
          chart: {
            result: null,
            error: { code: 'Not Found', description: 'No data found' },
          },
        },
        'NOPE',
      );
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ProviderError);
    expect(caught).toMatchObject({
      reason: 'not_found',
      message: 'NOPE: Not Found No data found',
    });
  });

  it('rejects a malformed payload', () => {
    expect(() => parser.parseChart({ foo: 1 }, 'ACME')).toThrow(ProviderError);
    expect(() => parser.parseChart({ chart: { result: [] } }, 'ACME')).toThrow(
      'ACME: empty chart result',
    );
  });
});
