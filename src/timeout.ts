import { CancelledError } from './errors.js';

/**
 * Runs `work` with a hard wall-clock limit. The signal handed to `work` is
 * aborted when the limit elapses or when `parent` aborts, so the caller can
 * kill whatever process or stream it started. The returned promise settles
 * as soon as either happens, even if `work` ignores the signal.
 */
export const withTimeout = async <T>(
  timeoutMs: number,
  work: (signal: AbortSignal) => Promise<T>,
  onTimeout: () => Error,
  parent?: AbortSignal,
): Promise<T> => {
  const cancelled = (): Error => (parent?.reason instanceof Error ? parent.reason : new CancelledError());
  if (parent?.aborted) {
    throw cancelled();
  }

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const interrupted = new Promise<never>((_resolve, reject) => {
    const stop = (error: Error): void => {
      controller.abort(error);
      reject(error);
    };
    onParentAbort = () => stop(cancelled());
    parent?.addEventListener('abort', onParentAbort, { once: true });
    timer = setTimeout(() => stop(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([work(controller.signal), interrupted]);
  } finally {
    clearTimeout(timer);
    if (onParentAbort) {
      parent?.removeEventListener('abort', onParentAbort);
    }
  }
};
