import { CancelledError, TransportTimeoutError } from './errors';

/**
 * The error an aborted signal should surface: its own reason when that is
 * already a CancelledError (a passed deadline, say), otherwise a plain one.
 */
export function cancellationFrom(signal: AbortSignal | undefined): CancelledError {
  return signal?.reason instanceof CancelledError ? signal.reason : new CancelledError();
}

/**
 * Sleeps for `ms`, rejecting with CancelledError as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(cancellationFrom(signal));
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(cancellationFrom(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs `operation` under its own deadline. The operation receives a signal
 * that aborts on timeout or when `parent` aborts.
 */
export function runWithTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    return Promise.reject(cancellationFrom(parent));
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let timer: ReturnType<typeof setTimeout> | undefined;

    const onParentAbort = () => {
      const cancelled = cancellationFrom(parent);
      cleanup();
      controller.abort(cancelled);
      reject(cancelled);
    };

    function cleanup(): void {
      if (timer !== undefined) {
        clearTimeout(timer);
      }
      parent?.removeEventListener('abort', onParentAbort);
    }

    timer = setTimeout(() => {
      const timeoutError = new TransportTimeoutError(timeoutMs);
      cleanup();
      controller.abort(timeoutError);
      reject(timeoutError);
    }, timeoutMs);

    parent?.addEventListener('abort', onParentAbort, { once: true });

    let pending: Promise<T>;
    try {
      pending = operation(controller.signal);
    } catch (error) {
      cleanup();
      reject(error);
      return;
    }

    pending.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      }
    );
  });
}

export interface ScopedSignal {
  signal: AbortSignal | undefined;
  dispose(): void;
}

/**
 * Combines a caller signal with an absolute deadline. The returned signal
 * aborts with `CancelledError('Deadline exceeded')` once `deadlineMs` passes.
 * Call `dispose` when the guarded work settles.
 */
export function withDeadline(parent: AbortSignal | undefined, deadlineMs: number | undefined): ScopedSignal {
  if (deadlineMs === undefined) {
    return { signal: parent, dispose: () => undefined };
  }

  const controller = new AbortController();
  const onParentAbort = () => {
    controller.abort(cancellationFrom(parent));
  };

  const timer = setTimeout(() => {
    controller.abort(new CancelledError('Deadline exceeded'));
  }, Math.max(0, deadlineMs - Date.now()));

  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}
