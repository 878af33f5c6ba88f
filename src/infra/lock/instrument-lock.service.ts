import { Injectable } from '@nestjs/common';

/**
 * 按 instrument 串行化的临界区。
 * 同一个 key 的任务按到达顺序排队，不同 key 之间互不等待。
 */
@Injectable()
export class InstrumentLockService {
  // key -> 队尾（永不 reject）
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    const run = prev.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  isBusy(key: string): boolean {
    return this.tails.has(key);
  }
}
