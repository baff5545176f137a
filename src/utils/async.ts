import { AgentTimeoutError } from "../errors";

export const withTimeout = async <T>(promise: Promise<T>, ms: number, label: string): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timer = setTimeout(() => reject(new AgentTimeoutError(label, ms)), ms);
      })
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
};

export const withRetries = async <T>(
  operation: () => Promise<T>,
  retries: number,
  onRetry?: (error: unknown, attempt: number) => void
): Promise<T> => {
  let attempt = 0;
  for (;;) {
    try {
      return await operation();
    } catch (error: unknown) {
      if (attempt >= retries) throw error;
      attempt += 1;
      onRetry?.(error, attempt);
    }
  }
};
