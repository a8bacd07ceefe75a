import { CancelledError, TimedOutError } from './errors';

/** Largest delay `setTimeout` honours, longer ones fire after 1 ms. */
export const MAX_TIMEOUT_MS = 2 ** 31 - 1;

/**
 * Joins a caller's abort signal and an optional timeout into a single signal,
 * and races work against it so a provider that ignores the signal still cannot
 * hold the caller past the deadline. Call `dispose` once the work settles.
 */
export class Deadline {
  private readonly controller = new AbortController();
  private readonly timer?: ReturnType<typeof setTimeout>;
  private timedOut = false;

  constructor(
    private readonly parent?: AbortSignal,
    private readonly timeoutMs?: number,
  ) {
    if (timeoutMs !== undefined && (!Number.isFinite(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMEOUT_MS)) {
      throw new RangeError(`Timeout must be a positive number of at most ${MAX_TIMEOUT_MS} ms, got ${timeoutMs}`);
    }
    if (parent?.aborted) {
      this.controller.abort(parent.reason);
      return;
    }
    parent?.addEventListener('abort', this.onParentAbort, { once: true });
    if (timeoutMs !== undefined) {
      this.timer = setTimeout(() => {
        this.timedOut = true;
        this.controller.abort(new TimedOutError(timeoutMs));
      }, timeoutMs);
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  async run<T>(work: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const signal = this.controller.signal;
    if (signal.aborted) {
      throw this.abortError();
    }

    let onAbort: (() => void) | undefined;
    const aborted = new Promise<never>((_, reject) => {
      onAbort = () => reject(this.abortError());
      signal.addEventListener('abort', onAbort, { once: true });
    });

    try {
      return await Promise.race([work(signal), aborted]);
    } catch (error) {
      if (signal.aborted) {
        throw this.abortError();
      }
      throw error;
    } finally {
      if (onAbort) {
        signal.removeEventListener('abort', onAbort);
      }
    }
  }

  dispose(): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
    }
    this.parent?.removeEventListener('abort', this.onParentAbort);
  }

  private readonly onParentAbort = (): void => {
    this.controller.abort(this.parent?.reason);
  };

  private abortError(): CancelledError | TimedOutError {
    if (this.timedOut && this.timeoutMs !== undefined) {
      return new TimedOutError(this.timeoutMs);
    }
    return new CancelledError(this.parent?.reason);
  }
}
