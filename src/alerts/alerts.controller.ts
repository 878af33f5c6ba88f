import { Controller, Get, NotFoundException, Param, Query } from '@nestjs/common';
import { z } from 'zod';

import { parseInput } from '@/infra/http/parse-input';
import { InstrumentsService } from '@/instruments/instruments.service';
import { AlertsRepository } from './store/alerts.repository';

const pageQuery = z.object({
  offset: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(200).default(50),
  sort: z.enum(['asc', 'desc']).default('desc'),
});

@Controller('v1/alerts')
export class AlertsController {
  constructor(
    private readonly alerts: AlertsRepository,
    private readonly instruments: InstrumentsService,
  ) {}

  @Get()
  async page(@Query() query: unknown) {
    const { offset, limit, sort } = parseInput(pageQuery, query);
    const { items, total } = await this.alerts.getPage(offset, limit, sort);
    return { items, total, offset, limit };
  }

  @Get(':instrumentId')
  async byInstrument(@Param('instrumentId') instrumentId: string) {
    const instrument = await this.instruments.findById(instrumentId);
    if (!instrument) {
      throw new NotFoundException(`instrument ${instrumentId} not found`);
    }
    const items = await this.alerts.findByInstrument(instrument.id);
    return { instrument, items };
  }
}
