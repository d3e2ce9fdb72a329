/**
 * Cooperative shutdown flag shared by a driver, its scheduler and any nested
 * drivers. Requesting shutdown never cancels in-flight items; it stops new
 * waves and new dispatches, and cuts backoff waits short.
 */
export class ShutdownSignal {
  private reasonText: string | undefined;
  private readonly controller = new AbortController();
  private readonly children = new Set<ShutdownSignal>();

  get requested(): boolean {
    return this.reasonText !== undefined;
  }

  get reason(): string | undefined {
    return this.reasonText;
  }

  /** Aborted once shutdown is requested. For waits, not for work items. */
  get abortSignal(): AbortSignal {
    return this.controller.signal;
  }

  request(reason = 'shutdown requested'): void {
    if (this.requested) return;
    this.reasonText = reason;
    this.controller.abort();
    for (const child of this.children) {
      child.request(reason);
    }
  }

  /** A signal that is requested whenever this one is, but not the other way round. */
  child(): ShutdownSignal {
    const child = new ShutdownSignal();
    if (this.requested) {
      child.request(this.reasonText);
    } else {
      this.children.add(child);
    }
    return child;
  }

  release(child: ShutdownSignal): void {
    this.children.delete(child);
  }

  /** Request shutdown when `signal` aborts. Returns the unlink function. */
  link(signal: AbortSignal, reason = 'aborted'): () => void {
    if (signal.aborted) {
      this.request(reason);
      return () => undefined;
    }
    const onAbort = () => this.request(reason);
    signal.addEventListener('abort', onAbort, { once: true });
    return () => signal.removeEventListener('abort', onAbort);
  }
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** setTimeout-based sleep that resolves early (without error) on abort. */
export const interruptibleSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted || ms <= 0) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
