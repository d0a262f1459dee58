/**
 * Race a store operation against a timer.
 *
 * The operation itself is not aborted (pg has no per-query cancel through
 * TypeORM), but the caller stops waiting and gets the error built by
 * `onTimeout`, so a hung connection surfaces as `*Unavailable`.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
