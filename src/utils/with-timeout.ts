/**
 * Build an abort signal that fires after `timeout` ms or when the parent
 * signal aborts, whichever comes first. Call `clear()` once the request is done.
 */
export function withTimeout(
  timeout: number,
  parent?: AbortSignal,
): { signal: AbortSignal; clear: () => void } {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    clear: () => {
      clearTimeout(timeoutId);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}
