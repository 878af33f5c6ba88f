import { AxiosError } from 'axios';

export type ProviderErrorReason =
  | 'timeout'
  | 'not_found'
  | 'rate_limited'
  | 'network'
  | 'bad_response';

const RETRIABLE_STATUS = [408, 429, 500, 502, 503, 504];
const RETRIABLE_CODES = ['ECONNRESET', 'ETIMEDOUT', 'EAI_AGAIN', 'ECONNABORTED'];
const TIMEOUT_CODES = ['ETIMEDOUT', 'ECONNABORTED'];

/** 上游行情源失败（超时 / 不存在 / 限流 / 网络 / 响应异常） */
export class ProviderError extends Error {
  constructor(
    readonly reason: ProviderErrorReason,
    message: string,
    readonly status?: number,
    readonly retriable = false,
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

/** 把 axios / 未知错误统一映射成 ProviderError */
export function toProviderError(err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;

  if (err instanceof AxiosError) {
    const status = err.response?.status;
    const code = err.code ?? '';
    const retriable =
      (status !== undefined && RETRIABLE_STATUS.includes(status)) ||
      RETRIABLE_CODES.includes(code);

    if (status === 404) {
      return new ProviderError('not_found', err.message, status, false);
    }
    if (status === 429) {
      return new ProviderError('rate_limited', err.message, status, true);
    }
    if (TIMEOUT_CODES.includes(code)) {
      return new ProviderError('timeout', err.message, status, true);
    }
    if (status !== undefined) {
      return new ProviderError('bad_response', err.message, status, retriable);
    }
    return new ProviderError('network', err.message, undefined, retriable);
  }

  const msg = err instanceof Error ? err.message : String(err);
  return new ProviderError('network', msg);
}
