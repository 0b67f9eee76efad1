/**
 * Timing utilities
 */

/**
 * Waits `ms` milliseconds, or less if the signal aborts first.
 * Resolves `true` when the full delay elapsed, `false` when cut short.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Formats a duration in seconds to a human-readable string
 * @param sec - Duration in seconds
 * @returns Formatted duration string (e.g., "1h30m45s")
 */
export function formatDuration(sec: number): string {
  const s = Math.max(0, Math.floor(sec));
  const h = Math.floor(s / 3600);
  const m = Math.floor((s % 3600) / 60);
  const ss = s % 60;
  return (h ? `${h}h` : "") + (h || m ? `${m}m` : "") + `${ss}s`;
}
