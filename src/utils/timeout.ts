/**
 * Wait for a task with an upper bound. Resolves `true` when the task settled in
 * time, `false` when the bound expired first (the task is left running).
 * A rejected task counts as settled; its error is handed to `onError`.
 */
export async function settleWithin(
  task: Promise<unknown>,
  timeoutMs: number,
  onError: (err: unknown) => void
): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });

  const settled = task.then(
    () => true as const,
    (err: unknown) => {
      onError(err);
      return true as const;
    }
  );

  try {
    return await Promise.race([settled, expired]);
  } finally {
    clearTimeout(timer);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
