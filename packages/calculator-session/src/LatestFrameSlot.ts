/**
 * Single-slot hand-off between a capture producer and the frame loop. The
 * consumer always takes the newest complete frame; frames it never read are
 * dropped. One consumer at a time.
 */
export class LatestFrameSlot<T> {
  private latest: T | undefined;
  private waiter: ((value: T | undefined) => void) | null = null;
  private closed = false;
  private dropped = 0;

  publish(value: T): void {
    if (this.closed) return;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(value);
      return;
    }
    if (this.latest !== undefined) this.dropped += 1;
    this.latest = value;
  }

  /** Swap-on-read: returns the pending frame and empties the slot. */
  take(): T | undefined {
    const value = this.latest;
    this.latest = undefined;
    return value;
  }

  /** Resolves with the next frame, or `undefined` once closed and drained. */
  read(): Promise<T | undefined> {
    const value = this.take();
    if (value !== undefined || this.closed) {
      return Promise.resolve(value);
    }
    if (this.waiter) {
      return Promise.reject(new Error("LatestFrameSlot already has a pending reader"));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  close(): void {
    this.closed = true;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(undefined);
    }
  }

  get droppedFrames(): number {
    return this.dropped;
  }
}
