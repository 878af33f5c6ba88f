/** 把长度较短的指标输出右对齐到 n 根 bar，前面补 null */
export function alignTail(
  n: number,
  values: ReadonlyArray<number | undefined>,
): Array<number | null> {
  const pad = n - values.length;
  const out: Array<number | null> = [];
  for (let i = 0; i < n; i++) {
    const v = i >= pad ? values[i - pad] : undefined;
    out.push(v === undefined || !Number.isFinite(v) ? null : v);
  }
  return out;
}

/** 第 i 根往前 period 根（含 i）的最高/最低中点；不足 period 根为 null */
export function rollingMidpoint(
  highs: readonly number[],
  lows: readonly number[],
  period: number,
): Array<number | null> {
  return highs.map((_, i) => {
    if (i + 1 < period) return null;
    let hi = -Infinity;
    let lo = Infinity;
    for (let j = i + 1 - period; j <= i; j++) {
      if (highs[j] > hi) hi = highs[j];
      if (lows[j] < lo) lo = lows[j];
    }
    return (hi + lo) / 2;
  });
}

export function shiftForward<T>(
  values: ReadonlyArray<T | null>,
  by: number,
): Array<T | null> {
  return values.map((_, i) => (i >= by ? values[i - by] : null));
}
