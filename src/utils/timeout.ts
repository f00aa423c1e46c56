/**
 * Run an abortable task with a deadline. The task receives a signal that
 * aborts when the deadline passes or when the parent signal aborts.
 */
export async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  options: { signal?: AbortSignal; onTimeout: () => Error }
): Promise<T> {
  const controller = new AbortController();
  const parent = options.signal;
  const forwardAbort = () => controller.abort(parent?.reason);

  if (parent?.aborted) {
    forwardAbort();
  } else {
    parent?.addEventListener("abort", forwardAbort, { once: true });
  }

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = options.onTimeout();
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", forwardAbort);
  }
}
