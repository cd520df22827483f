/**
 * Shared frame clock for every running label animation.
 *
 * Instead of each animator owning its own timer, animators subscribe to
 * this clock and receive a callback on every frame with the current
 * timestamp. All keys on the device therefore repaint in the same sweep.
 *
 * The clock uses `setTimeout` (not `setInterval`) so the frame rate can be
 * changed mid-flight, and it only runs while somebody is subscribed.
 *
 * @author Pedro Fuentes <git@pedrofuent.es>
 * @copyright Pedro Pablo Fuentes Schuster
 * @license MIT
 */

// ── Frame Rate ─────────────────────────────────────────────────────────────

/**
 * Allowed frame rates (frames per second).
 */
export type FramesPerSecond = 5 | 10 | 15 | 20 | 30;

/**
 * Default frame rate when none is configured.
 */
export const DEFAULT_FRAMES_PER_SECOND: FramesPerSecond = 10;

// ── Clock ──────────────────────────────────────────────────────────────────

export type FrameCallback = (now: number) => void;

/**
 * Receives errors thrown by frame subscribers.
 */
export type FrameErrorHandler = (subscriberId: string, error: unknown) => void;

export class FrameClock {
  private subscribers = new Map<string, FrameCallback>();
  private timeout: ReturnType<typeof setTimeout> | null = null;
  private _framesPerSecond: number;
  private errorHandler: FrameErrorHandler | null = null;

  constructor(framesPerSecond: number = DEFAULT_FRAMES_PER_SECOND) {
    this._framesPerSecond = framesPerSecond;
  }

  get framesPerSecond(): number {
    return this._framesPerSecond;
  }

  /** Delay between frames in milliseconds. */
  get frameIntervalMs(): number {
    return 1000 / this._framesPerSecond;
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  /** Whether a frame is currently scheduled. */
  get isRunning(): boolean {
    return this.timeout !== null;
  }

  /**
   * Update the frame rate. A running clock is rescheduled immediately.
   * Values that are not positive and finite fall back to the default.
   */
  setFramesPerSecond(framesPerSecond: number): void {
    this._framesPerSecond =
      Number.isFinite(framesPerSecond) && framesPerSecond > 0
        ? framesPerSecond
        : DEFAULT_FRAMES_PER_SECOND;
    if (this.timeout) {
      this.stop();
      this.start();
    }
  }

  /**
   * Route subscriber errors to `handler` instead of rethrowing them.
   */
  setErrorHandler(handler: FrameErrorHandler | null): void {
    this.errorHandler = handler;
  }

  /**
   * Subscribe to frame callbacks.
   *
   * @param id - Unique subscriber ID
   * @returns Unsubscribe function
   */
  subscribe(id: string, callback: FrameCallback): () => void {
    this.subscribers.set(id, callback);
    if (!this.timeout) {
      this.start();
    }
    return () => this.unsubscribe(id);
  }

  /**
   * Remove a subscriber. Stops the clock when no subscribers remain.
   */
  unsubscribe(id: string): void {
    this.subscribers.delete(id);
    if (this.subscribers.size === 0) {
      this.stop();
    }
  }

  start(): void {
    if (this.timeout) return;
    if (this.subscribers.size === 0) return;
    this.scheduleNextFrame();
  }

  stop(): void {
    if (this.timeout) {
      clearTimeout(this.timeout);
      this.timeout = null;
    }
  }

  /**
   * Deliver one frame to every subscriber.
   *
   * Subscribers added during the frame are first called on the next one;
   * subscribers removed during the frame are skipped. A throwing subscriber
   * does not prevent the others from running.
   *
   * @throws {AggregateError} When subscribers failed and no error handler is set.
   */
  tick(now: number = Date.now()): void {
    const failures: Array<{ id: string; error: unknown }> = [];

    for (const [id, callback] of [...this.subscribers]) {
      if (this.subscribers.get(id) !== callback) continue;
      try {
        callback(now);
      } catch (error) {
        failures.push({ id, error });
      }
    }

    if (failures.length === 0) return;
    const handler = this.errorHandler;
    if (handler) {
      for (const { id, error } of failures) handler(id, error);
      return;
    }
    throw new AggregateError(
      failures.map((f) => f.error),
      `${failures.length} frame subscriber(s) failed: ${failures.map((f) => f.id).join(", ")}`,
    );
  }

  // ── Private ────────────────────────────────────────────────────────────

  private scheduleNextFrame(): void {
    this.timeout = setTimeout(() => {
      this.timeout = null;
      try {
        this.tick();
      } finally {
        if (this.subscribers.size > 0 && !this.timeout) {
          this.scheduleNextFrame();
        }
      }
    }, this.frameIntervalMs);
  }
}

// ── Module-level Singleton ─────────────────────────────────────────────────

let clock: FrameClock | null = null;

/**
 * Returns the shared frame clock singleton.
 */
export function getFrameClock(): FrameClock {
  if (!clock) {
    clock = new FrameClock();
  }
  return clock;
}

/**
 * Resets the singleton (for testing). Stops any running timer.
 */
export function resetFrameClock(): void {
  clock?.stop();
  clock = null;
}
