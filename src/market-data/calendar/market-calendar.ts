import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import type { IsoDate } from '@/infra/types/market.types';
import { zonedDate } from './trading-days';

/** “今天”按交易所时区计算；today 之前的 bar 不可变，today 永远视为过期 */
@Injectable()
export class MarketCalendar {
  private readonly timeZone: string;

  constructor(config: ConfigService) {
    this.timeZone = config.get<string>('market.timeZone') ?? 'America/New_York';
  }

  today(now: number = Date.now()): IsoDate {
    return zonedDate(now, this.timeZone);
  }
}
