export interface Deadline {
  signal: AbortSignal;
  didTimeout: () => boolean;
  cleanup: () => void;
}

/**
 * Signal that aborts when `parent` aborts or `timeoutMs` elapses, whichever comes first.
 * A non-positive or non-finite timeout disables the timer.
 */
export function withDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  let timedOut = false;

  const propagateAbort = () => {
    controller.abort(parent?.reason);
  };

  if (parent) {
    if (parent.aborted) {
      propagateAbort();
    } else {
      parent.addEventListener('abort', propagateAbort, { once: true });
    }
  }

  let timer: NodeJS.Timeout | null = null;
  if (Number.isFinite(timeoutMs) && timeoutMs > 0) {
    timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    timer.unref?.();
  }

  return {
    signal: controller.signal,
    didTimeout: () => timedOut,
    cleanup: () => {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener('abort', propagateAbort);
    },
  };
}
