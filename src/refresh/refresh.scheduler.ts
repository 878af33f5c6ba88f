import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron } from '@nestjs/schedule';

import { RefreshService } from './refresh.service';

@Injectable()
export class RefreshScheduler {
  private readonly logger = new Logger(RefreshScheduler.name);
  private readonly enabled: boolean;

  constructor(
    private readonly refresh: RefreshService,
    config: ConfigService,
  ) {
    this.enabled = config.get<boolean>('app.enableRefreshCron') ?? true;
    const cron = config.get<string>('app.cronRefresh') ?? '0 30 17 * * 1-5';
    this.logger.log(`refresh cron "${cron}" ${this.enabled ? 'enabled' : 'disabled'}`);
  }

  // 默认美股收盘后，工作日 17:30（服务器时区）
  @Cron(process.env.CRON_REFRESH ?? '0 30 17 * * 1-5')
  async tick() {
    if (!this.enabled) return;
    if (this.refresh.isRunning()) {
      this.logger.warn('[cron] previous batch still running, skip');
      return;
    }

    try {
      const r = await this.refresh.refreshActive();
      this.logger.log(
        `[cron] refresh done: ok=${r.succeeded}/${r.total} failed=${r.failed.length}`,
      );
    } catch (err: unknown) {
      this.logger.error(
        `[cron] refresh failed: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
}
