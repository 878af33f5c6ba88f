export const MACD_SETTINGS = { fast: 12, slow: 26, signal: 9 } as const;
export const RSI_SETTINGS = { period: 14, maPeriod: 14 } as const;
export const SUPERTREND_SETTINGS = { period: 10, multiplier: 3.0 } as const;
export const ICHIMOKU_SETTINGS = {
  conversion: 9,
  base: 26,
  spanB: 52,
  displacement: 26,
} as const;
export const GANN_HILO_SETTINGS = { fast: 13, slow: 21 } as const;
