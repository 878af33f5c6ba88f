import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { z } from 'zod';

import { parseInput } from '@/infra/http/parse-input';
import { InstrumentsService } from './instruments.service';

const addSchema = z.object({ symbol: z.string().min(1) });
const bulkSchema = z.object({
  symbols: z.union([z.string(), z.array(z.string()).max(500)]),
});
const bulkRemoveSchema = z.object({
  ids: z.array(z.string().min(1)).min(1).max(500),
});
const listSchema = z.object({ q: z.string().max(32).optional() });

@Controller('v1/instruments')
export class InstrumentsController {
  constructor(private readonly instruments: InstrumentsService) {}

  @Get()
  async list(@Query() query: unknown) {
    const { q } = parseInput(listSchema, query);
    const items = q
      ? await this.instruments.search(q)
      : await this.instruments.listActive();
    return { items, total: items.length };
  }

  @Post()
  add(@Body() body: unknown) {
    const { symbol } = parseInput(addSchema, body);
    return this.instruments.add(symbol);
  }

  @Post('bulk')
  addMany(@Body() body: unknown) {
    const { symbols } = parseInput(bulkSchema, body);
    return this.instruments.addMany(symbols);
  }

  @Delete()
  removeMany(@Body() body: unknown) {
    const { ids } = parseInput(bulkRemoveSchema, body);
    return this.instruments.removeMany(ids);
  }

  @Delete(':id')
  async remove(@Param('id') id: string) {
    const removed = await this.instruments.remove(id);
    return { removed };
  }
}
