/**
 * Raised when the caller's signal aborts before the operation could proceed.
 * Never retried by the transport.
 */
export class RequestCancelledError extends Error {
  constructor(message = 'Request cancelled by caller', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RequestCancelledError';
  }
}

/**
 * Raised when a deadline attached to the operation elapses first.
 * Never retried by the transport.
 */
export class DeadlineExceededError extends Error {
  constructor(
    public readonly timeoutMs?: number,
    options?: { cause?: unknown },
  ) {
    super(
      timeoutMs === undefined ? 'Deadline exceeded' : `Deadline exceeded after ${timeoutMs}ms`,
      options,
    );
    this.name = 'DeadlineExceededError';
  }
}

export type WaitAbortedError = RequestCancelledError | DeadlineExceededError;

export function isWaitAbortedError(error: unknown): error is WaitAbortedError {
  return error instanceof RequestCancelledError || error instanceof DeadlineExceededError;
}

function isTimeoutReason(reason: unknown): boolean {
  return (
    typeof reason === 'object' &&
    reason !== null &&
    'name' in reason &&
    reason.name === 'TimeoutError'
  );
}

/**
 * Map an aborted signal to the cancellation taxonomy.
 * `AbortSignal.timeout()` aborts with a `TimeoutError`, which counts as a deadline.
 */
export function toWaitError(signal: AbortSignal): WaitAbortedError {
  const reason: unknown = signal.reason;

  if (isWaitAbortedError(reason)) {
    return reason;
  }

  if (isTimeoutReason(reason)) {
    return new DeadlineExceededError(undefined, { cause: reason });
  }

  return new RequestCancelledError(undefined, { cause: reason });
}

/**
 * Create a signal that aborts with a {@link DeadlineExceededError} after `timeoutMs`,
 * or with the parent's reason if the parent aborts first.
 */
export function createDeadlineSignal(timeoutMs: number, parent?: AbortSignal): AbortSignal {
  const controller = new AbortController();

  if (parent?.aborted) {
    controller.abort(parent.reason);
    return controller.signal;
  }

  const timer = setTimeout(() => {
    controller.abort(new DeadlineExceededError(timeoutMs));
  }, timeoutMs);
  // The deadline alone must not keep the process alive
  timer.unref();

  const onParentAbort = (): void => {
    clearTimeout(timer);
    controller.abort(parent?.reason);
  };
  parent?.addEventListener('abort', onParentAbort, { once: true });

  controller.signal.addEventListener(
    'abort',
    () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
    { once: true },
  );

  return controller.signal;
}
