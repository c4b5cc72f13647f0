/**
 * Run `task` with a wall-clock deadline. The task receives an AbortSignal that
 * fires when the deadline passes, so in-flight HTTP calls are torn down too.
 * The returned promise rejects with `message` on timeout.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  ms: number,
  message: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | null = null;
  try {
    return await Promise.race([
      task(controller.signal),
      new Promise<T>((_, reject) => {
        timer = setTimeout(() => {
          const err = new Error(message);
          controller.abort(err);
          reject(err);
        }, ms);
        timer.unref?.();
      }),
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
