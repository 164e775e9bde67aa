/**
 * fetch wrapper that aborts after `timeoutMs`. An abort from the caller's own
 * signal is forwarded as well.
 */
export function createTimeoutFetch(timeoutMs: number, baseFetch: typeof fetch = fetch): typeof fetch {
  return async (input, init) => {
    const controller = new AbortController()
    const timer = setTimeout(() => controller.abort(), timeoutMs)
    const upstream = init?.signal
    const forward = () => controller.abort(upstream?.reason)
    if (upstream?.aborted) forward()
    else upstream?.addEventListener('abort', forward)

    try {
      return await baseFetch(input, { ...init, signal: controller.signal })
    } finally {
      clearTimeout(timer)
      upstream?.removeEventListener('abort', forward)
    }
  }
}
