export default () => ({
  market: {
    baseUrl: process.env.MARKET_BASE ?? 'https://query1.finance.yahoo.com',
    timeoutMs: Number(process.env.MARKET_TIMEOUT_MS ?? 10000),
    retry: Number(process.env.MARKET_RETRY ?? 3),
    retryBackoffMs: Number(process.env.MARKET_RETRY_BACKOFF_MS ?? 500),
    timeZone: process.env.MARKET_TZ ?? 'America/New_York',
  },
});
