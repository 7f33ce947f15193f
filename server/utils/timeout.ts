import { CallTimeoutError, QueryAbortedError } from "../routing/errors";

export interface ScopedSignal {
  signal: AbortSignal;
  didTimeOut: () => boolean;
  dispose: () => void;
}

/**
 * A signal that aborts when the parent aborts or after `ms`, whichever
 * comes first. Always call dispose() once the guarded call settles.
 */
export function scopedSignal(parent: AbortSignal | undefined, ms: number, label: string): ScopedSignal {
  const controller = new AbortController();
  let timedOut = false;

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort(new CallTimeoutError(label, ms));
  }, ms);

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent) {
    if (parent.aborted) {
      controller.abort(parent.reason);
    } else {
      parent.addEventListener("abort", onParentAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    didTimeOut: () => timedOut,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

/**
 * Run one external call under its own timeout.
 *
 * The call receives a signal to forward to fetch/SDK calls; the race below
 * also settles when a collaborator ignores that signal.
 * Rejects with QueryAbortedError when the parent aborted and with
 * CallTimeoutError when the timeout fired; other errors pass through.
 */
export async function runWithTimeout<T>(
  label: string,
  ms: number,
  parent: AbortSignal | undefined,
  call: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  if (parent?.aborted) {
    throw new QueryAbortedError(label);
  }

  const scoped = scopedSignal(parent, ms, label);
  try {
    return await Promise.race([call(scoped.signal), rejectOnAbort(scoped.signal)]);
  } catch (error) {
    if (parent?.aborted) {
      throw new QueryAbortedError(label);
    }
    if (scoped.didTimeOut()) {
      throw new CallTimeoutError(label, ms);
    }
    throw error;
  } finally {
    scoped.dispose();
  }
}
