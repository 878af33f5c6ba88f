import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import Redis, { RedisOptions } from 'ioredis';
import { ConfigService } from '@nestjs/config';

@Injectable()
export class RedisService implements OnModuleDestroy, OnModuleInit {
  private client?: Redis;
  private readonly logger = new Logger(RedisService.name);
  private prefix = 'alerts';
  private ttlSeconds = 7 * 86400;

  constructor(private config: ConfigService) {}

  onModuleInit() {
    const url =
      this.config.get<string>('redis.url') ?? 'redis://127.0.0.1:6379/0';
    const ttlDays = this.config.get<number>('redis.ttlDays', 7);
    this.prefix = this.config.get<string>('redis.namespace') ?? 'alerts';
    this.ttlSeconds = ttlDays * 86400;

    const options: RedisOptions = {
      maxRetriesPerRequest: null,
      lazyConnect: true,
      connectTimeout: 5000,
    };
    this.client = new Redis(url, options);
    this.logger.log(
      `✅ Redis client ready: ${this.prefix} (ttl=${ttlDays} days)`,
    );
  }

  onModuleDestroy() {
    this.client?.disconnect();
  }

  private get redis(): Redis {
    if (!this.client) throw new Error('Redis client used before init');
    return this.client;
  }

  /** 统一加上命名空间前缀 */
  private k(...parts: string[]): string {
    return [this.prefix, ...parts].join(':');
  }

  async set(ns: string, value: string, ttlSeconds?: number) {
    await this.redis.set(this.k(ns), value, 'EX', ttlSeconds ?? this.ttlSeconds);
  }

  async get(ns: string): Promise<string | null> {
    return this.redis.get(this.k(ns));
  }

  async setJson(ns: string, value: unknown, ttlSeconds?: number) {
    await this.set(ns, JSON.stringify(value), ttlSeconds);
  }

  async getJson(ns: string): Promise<unknown> {
    const raw = await this.get(ns);
    return raw === null ? null : JSON.parse(raw);
  }
}
