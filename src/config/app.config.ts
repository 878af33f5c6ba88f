export default () => ({
  app: {
    env: process.env.NODE_ENV,
    port: Number(process.env.PORT ?? 3000),
    enableRefreshCron: (process.env.ENABLE_REFRESH_CRON ?? 'true') === 'true',

    // 回溯多少个自然日的日线（指标预热需要 ≥ 78 根）
    historyLookbackDays: Number(process.env.HISTORY_LOOKBACK_DAYS ?? 730),
    // 批量刷新时每个 instrument 之间的停顿
    refreshRateLimitMs: Number(process.env.REFRESH_RATE_LIMIT_MS ?? 500),

    cronRefresh: process.env.CRON_REFRESH ?? '0 30 17 * * 1-5',
  },
});
