export interface RetryOptions {
  retries?: number;
  delayMs?: number;
  onRetry?: (error: unknown, attempt: number) => void | Promise<void>;
}

export async function retry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { retries = 2, delayMs = 0, onRetry } = options;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= retries) {
        throw error;
      }
      await onRetry?.(error, attempt + 1);
      if (delayMs > 0) {
        await new Promise<void>((resolve) => {
          setTimeout(resolve, delayMs);
        });
      }
    }
  }
}
