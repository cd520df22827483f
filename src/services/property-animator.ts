/**
 * Linear property animator driven by the shared frame clock.
 *
 * An animator interpolates a single numeric property from `from` to `to`
 * over `duration` seconds, after an optional start `delay`. On every frame
 * it hands the interpolated value to `apply`.
 *
 * Lifecycle:
 *   inactive ──start──▶ waiting ──delay elapsed──▶ running ──end──▶ finished
 *                          │                         │
 *                          └────────stop─────────────┴──▶ stopped
 *
 * `completion("end")` fires only when the animation reaches its end.
 * `stopAnimation()` discards the animation without calling `completion`
 * unless asked to finish at the current position.
 *
 * @author Pedro Fuentes <git@pedrofuent.es>
 * @copyright Pedro Pablo Fuentes Schuster
 * @license MIT
 */
import { getFrameClock, type FrameClock } from "./frame-clock";

/** Where the animated property was left when the animator ended. */
export type AnimatingPosition = "end" | "current";

export type AnimatorState = "inactive" | "waiting" | "running" | "finished" | "stopped";

export type PropertyAnimatorOptions = {
  /** Animation length in seconds */
  duration: number;
  /** Seconds to wait before the value starts moving (default: 0) */
  delay?: number;
  from: number;
  to: number;
  apply: (value: number) => void;
  completion?: (position: AnimatingPosition) => void;
  /** Clock driving the frames (default: shared singleton) */
  clock?: FrameClock;
};

export class PropertyAnimator {
  private static sequence = 0;

  readonly id: string;
  readonly duration: number;
  readonly delay: number;
  private readonly from: number;
  private readonly to: number;
  private readonly apply: (value: number) => void;
  private readonly completion: ((position: AnimatingPosition) => void) | null;
  private readonly clock: FrameClock;

  private _state: AnimatorState = "inactive";
  private _fractionComplete = 0;
  private startedAt = 0;
  private unsubscribe: (() => void) | null = null;

  constructor(options: PropertyAnimatorOptions) {
    this.id = `property-animator-${++PropertyAnimator.sequence}`;
    const delay = options.delay ?? 0;
    this.duration = Number.isFinite(options.duration) && options.duration > 0 ? options.duration : 0;
    this.delay = Number.isFinite(delay) && delay > 0 ? delay : 0;
    this.from = options.from;
    this.to = options.to;
    this.apply = options.apply;
    this.completion = options.completion ?? null;
    this.clock = options.clock ?? getFrameClock();
  }

  get state(): AnimatorState {
    return this._state;
  }

  /** Whether the animator is waiting out its delay or moving. */
  get isRunning(): boolean {
    return this._state === "waiting" || this._state === "running";
  }

  /** Progress of the value between `from` (0) and `to` (1). */
  get fractionComplete(): number {
    return this._fractionComplete;
  }

  /**
   * Starts the animation. Has no effect once started or stopped.
   */
  startAnimation(): void {
    if (this._state !== "inactive") return;
    this._state = "waiting";
    this.startedAt = Date.now();
    this.unsubscribe = this.clock.subscribe(this.id, (now) => this.step(now));
  }

  /**
   * Stops the animation.
   *
   * @param withoutFinishing - When `true` (default) the animation is
   *   discarded silently; when `false`, `completion("current")` is called.
   */
  stopAnimation(withoutFinishing = true): void {
    if (!this.isRunning) return;
    this.detach();
    this._state = "stopped";
    if (!withoutFinishing) {
      this.completion?.("current");
    }
  }

  // ── Private ────────────────────────────────────────────────────────────

  private step(now: number): void {
    const elapsed = (now - this.startedAt) / 1000;
    if (elapsed < this.delay) return;

    this._state = "running";
    const fraction = this.duration === 0 ? 1 : Math.min(1, (elapsed - this.delay) / this.duration);
    this._fractionComplete = fraction;
    this.apply(this.from + (this.to - this.from) * fraction);

    // `apply` may have stopped us
    if (fraction < 1 || this._state !== "running") return;
    this.detach();
    this._state = "finished";
    this.completion?.("end");
  }

  private detach(): void {
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }
  }
}

/**
 * Creates an animator and starts it immediately.
 */
export function runningPropertyAnimator(options: PropertyAnimatorOptions): PropertyAnimator {
  const animator = new PropertyAnimator(options);
  animator.startAnimation();
  return animator;
}
