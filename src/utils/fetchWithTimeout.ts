type FetchOptions = NonNullable<Parameters<typeof fetch>[1]>;

export async function fetchWithTimeout(
  url: string | URL,
  opts: FetchOptions & { timeoutMs?: number } = {}
): Promise<Response> {
  const { timeoutMs = 10_000, signal, ...rest } = opts;

  const controller = new AbortController();
  const timeout = setTimeout(
    () => controller.abort(new Error(`Request to ${new URL(url).host} timed out after ${timeoutMs}ms`)),
    timeoutMs
  );

  try {
    return await fetch(url, { ...rest, signal: signal ?? controller.signal });
  } finally {
    clearTimeout(timeout);
  }
}
