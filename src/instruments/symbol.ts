export const MAX_SYMBOL_LENGTH = 10;

const SYMBOL_RE = /^[A-Z0-9.\-^]+$/;

export type SymbolCheck =
  | { ok: true; symbol: string }
  | { ok: false; symbol: string; reason: string };

export function normalizeSymbol(raw: string): string {
  return raw.trim().toUpperCase();
}

/** 字母数字加 `.` `-` `^`（BRK.B、BRK-A、^GSPC），分隔符不计入长度 */
export function checkSymbol(raw: string): SymbolCheck {
  const symbol = normalizeSymbol(raw);
  if (!symbol) return { ok: false, symbol, reason: 'symbol cannot be empty' };

  const bare = symbol.replace(/[.\-^]/g, '');
  if (bare.length < 1) return { ok: false, symbol, reason: 'symbol too short' };
  if (bare.length > MAX_SYMBOL_LENGTH) {
    return {
      ok: false,
      symbol,
      reason: `symbol too long (max ${MAX_SYMBOL_LENGTH} characters excluding . - ^)`,
    };
  }
  if (!SYMBOL_RE.test(symbol)) {
    return {
      ok: false,
      symbol,
      reason: 'symbol may only contain letters, digits, ".", "-" and "^"',
    };
  }
  return { ok: true, symbol };
}

/** 逗号分隔或数组输入 → 规范化、去空、按首次出现去重 */
export function parseSymbols(input: string | readonly string[]): string[] {
  const parts = typeof input === 'string' ? input.split(',') : input;
  const seen = new Set<string>();
  for (const p of parts) {
    const s = normalizeSymbol(p);
    if (s) seen.add(s);
  }
  return [...seen];
}
