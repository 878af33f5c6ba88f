import {
  ConflictException,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
} from '@nestjs/common';

import { RedisService } from '@/infra/redis/redis.service';
import { RefreshService } from './refresh.service';
import { REFRESH_STATUS_KEY } from './refresh-progress.listener';

@Controller('v1/alerts/refresh')
export class RefreshController {
  private readonly logger = new Logger(RefreshController.name);

  constructor(
    private readonly refresh: RefreshService,
    private readonly redis: RedisService,
  ) {}

  /** 后台启动批量刷新，立即返回 202；进度看 /status */
  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  start() {
    if (this.refresh.isRunning()) {
      throw new ConflictException('a batch refresh is already running');
    }
    void this.refresh.refreshActive().then(
      (r) =>
        this.logger.log(
          `[http] refresh done: ok=${r.succeeded}/${r.total} failed=${r.failed.length}`,
        ),
      (err: unknown) =>
        this.logger.error(
          `[http] refresh failed: ${err instanceof Error ? err.message : String(err)}`,
        ),
    );
    return { started: true };
  }

  @Get('status')
  async status() {
    return {
      running: this.refresh.isRunning(),
      last: await this.redis.getJson(REFRESH_STATUS_KEY),
    };
  }
}
