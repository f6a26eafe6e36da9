type FetchOptions = Parameters<typeof fetch>[1];

export async function fetchWithTimeout(url: string, opts: FetchOptions & { timeoutMs?: number } = {}) {
  const { timeoutMs = 10_000, signal, ...rest } = opts;

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(new Error("timeout")), timeoutMs);

  // A caller-supplied signal (logger cancellation) aborts the request too.
  const onAbort = () => controller.abort(signal?.reason);
  if (signal) {
    if (signal.aborted) controller.abort(signal.reason);
    else signal.addEventListener("abort", onAbort, { once: true });
  }

  try {
    return await fetch(url, { ...rest, signal: controller.signal });
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener("abort", onAbort);
  }
}
