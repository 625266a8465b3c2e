import { DeviceTimeoutError } from "../errors";

/**
 * Race a device call against a deadline.
 * The timer is always cleared; the losing promise is left to settle on its own.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  context: { operation: string; deviceId?: string | number },
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | null = null;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new DeviceTimeoutError(timeoutMs, context)),
      timeoutMs,
    );
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}

export function delay(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}
