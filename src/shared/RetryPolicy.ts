function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  isRetryable: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown) => void;
  /** 測試時可替換，避免真的等待 */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * 帶指數退避和 jitter 的重試策略
 * 總嘗試次數 = 1（初始） + maxRetries；不可重試的錯誤立即拋出
 */
export async function withRetry<T>(
  operation: () => T | Promise<T>,
  opts: RetryOptions,
): Promise<T> {
  const sleep = opts.sleep ?? defaultSleep;
  let attempt = 0;

  for (;;) {
    try {
      return await operation();
    } catch (err) {
      if (attempt >= opts.maxRetries || !opts.isRetryable(err)) throw err;

      const delay = opts.baseDelayMs * 2 ** attempt + Math.random() * opts.baseDelayMs;
      attempt++;
      opts.onRetry?.(attempt, err);
      await sleep(delay);
    }
  }
}
