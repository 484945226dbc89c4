import { CancelledError, ProviderTimeoutError } from "../errors.js";

/**
 * Run `task` with its own abort signal. The signal fires when `timeoutMs`
 * elapses or when `parent` aborts; either way the returned promise rejects
 * right away, even if the task ignores its signal.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) throw abortReason(parent);

  const controller = new AbortController();
  const onParentAbort = () => controller.abort(abortReason(parent));
  parent?.addEventListener("abort", onParentAbort, { once: true });

  const timer = setTimeout(() => controller.abort(new ProviderTimeoutError(timeoutMs)), timeoutMs);

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
  });

  try {
    return await Promise.race([task(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}

export function abortReason(signal?: AbortSignal): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) return reason;
  return new CancelledError(reason === undefined ? undefined : String(reason));
}
