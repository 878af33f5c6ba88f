/** 存储写入失败；调用方可以确信之前的数据仍然完整 */
export class PersistenceError extends Error {
  constructor(
    readonly operation: string,
    cause: unknown,
  ) {
    super(
      `${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = 'PersistenceError';
  }
}
