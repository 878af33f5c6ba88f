import { Test } from '@nestjs/testing';

import { weekdayBars } from '@/testing/bars.fixture';
import { IndicatorService } from './indicator.service';

describe('IndicatorService', () => {
  let service: IndicatorService;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [IndicatorService],
    }).compile();
    service = moduleRef.get(IndicatorService);
  });

  // 2025-03-03 起 120 个工作日
  const bars = weekdayBars('2025-03-03', '2025-08-15');

  it('keeps one output bar per input bar', () => {
    const out = service.compute(bars);

    expect(bars).toHaveLength(120);
    expect(out.map((b) => b.date)).toEqual(bars.map((b) => b.date));
    expect(out[5].close).toBe(bars[5].close);
  });

  it('leaves indicators null until their window is filled', () => {
    const first = service.compute(bars)[0].indicators;

    expect(first).toEqual({
      macd: null,
      macdSignal: null,
      gannHilo: 100,
      rsi: null,
      rsiMa: null,
      supertrend: null,
      cloudA: null,
      cloudB: null,
    });
  });

  it('defines the displaced cloud only after span B history plus displacement', () => {
    const out = service.compute(bars);

    expect(out[76].indicators.cloudB).toBeNull();
    expect(out[77].indicators.cloudB).not.toBeNull();
    expect(out[50].indicators.cloudA).toBeNull();
    expect(out[51].indicators.cloudA).not.toBeNull();
  });

  it('fills every field on the latest bar of a long enough series', () => {
    const last = service.compute(bars)[119].indicators;

    expect(Object.values(last).every((v) => v !== null)).toBe(true);
    expect(last.rsi).toBeCloseTo(100, 5);
  });

  it('returns an empty list for no bars', () => {
    expect(service.compute([])).toEqual([]);
  });
});
