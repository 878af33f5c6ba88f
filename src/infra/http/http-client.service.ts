import { Injectable, Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import { ConfigService } from '@nestjs/config';
import * as https from 'https';

import { toProviderError } from '@/infra/errors';

export type QueryParams = Record<string, string | number | boolean>;

@Injectable()
export class HttpClientService {
  private readonly client: AxiosInstance;
  private readonly logger = new Logger(HttpClientService.name);
  private readonly retry: number;
  private readonly backoffMs: number;

  constructor(private readonly config: ConfigService) {
    const baseUrl =
      this.config.get<string>('market.baseUrl') ??
      'https://query1.finance.yahoo.com';
    const timeout = Number(this.config.get<number>('market.timeoutMs') ?? 10000);
    this.retry = Number(this.config.get<number>('market.retry') ?? 3);
    this.backoffMs = Number(
      this.config.get<number>('market.retryBackoffMs') ?? 500,
    );

    const httpsAgent = new https.Agent({
      keepAlive: true,
      maxSockets: 16,
      keepAliveMsecs: 1000,
    });

    this.client = axios.create({
      baseURL: baseUrl,
      timeout,
      httpsAgent,
      headers: {
        'User-Agent': 'Mozilla/5.0 (compatible; signal-alert-engine/0.1)',
        Accept: 'application/json',
      },
    });

    this.logger.log(`✅ HTTP client ready: ${baseUrl} (timeout=${timeout}ms)`);
  }

  /**
   * GET 请求：超时 / 限流 / 5xx / 网络错误按指数退避重试，
   * 最终失败统一抛 ProviderError
   */
  async get<T>(path: string, params?: QueryParams): Promise<T> {
    const attempts = this.retry + 1;
    for (let attempt = 1; ; attempt++) {
      try {
        const res = await this.client.get<T>(path, { params });
        return res.data;
      } catch (err: unknown) {
        const pe = toProviderError(err);
        this.logger.warn(
          `GET ${path} failed (try ${attempt}/${attempts}): reason=${pe.reason} status=${pe.status ?? '-'} msg=${pe.message}`,
        );

        if (!pe.retriable || attempt >= attempts) throw pe;
        await this.sleep(
          this.backoffMs * 2 ** (attempt - 1) + Math.random() * 250,
        );
      }
    }
  }

  private sleep(ms: number) {
    return new Promise((r) => setTimeout(r, ms));
  }
}
