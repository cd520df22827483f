/**
 * Auto-scrolling marquee label.
 *
 * When the text is wider than the label, it is duplicated into two adjacent
 * copies that scroll left in a continuous loop, pausing at rest before each
 * cycle, with a fade mask over both edges. Text that fits is shown centred
 * and static with no mask.
 *
 * The widget only holds view state. Hosts feed it bounds and text, supply a
 * text measurer and a frame clock, and draw the snapshots it publishes
 * through `onDisplay`.
 *
 * Usage:
 *   const label = new ScrollingLabel({ scrollSpeed: 40 }, { onDisplay: draw });
 *   label.setBounds({ width: 128, height: 40 });
 *   label.setText("Now playing: a rather long track title");
 *
 * @author Pedro Fuentes <git@pedrofuent.es>
 * @copyright Pedro Pablo Fuentes Schuster
 * @license MIT
 */
import { buildFadeMask } from "../services/fade-mask";
import type { FrameClock } from "../services/frame-clock";
import { runningPropertyAnimator, type PropertyAnimator } from "../services/property-animator";
import { computeScrollLayout, maxX, scrollDuration } from "../services/scroll-layout";
import { getDefaultMeasurer, type TextMeasurer } from "../services/text-metrics";
import type {
  AnimationState,
  FadeMask,
  FontDescriptor,
  LabelViewState,
  Rect,
  ScrollCycle,
  ScrollViewState,
  ScrollingLabelOptions,
  ScrollingLabelSnapshot,
  Size,
} from "../types/scrolling-label";

// ── Defaults ───────────────────────────────────────────────────────────────

export const DEFAULT_LABEL_SPACING = 30;
export const DEFAULT_PAUSE_INTERVAL = 2;
export const DEFAULT_SCROLL_SPEED = 25;
export const DEFAULT_FADE_RATIO = 0.1;
export const DEFAULT_FONT: FontDescriptor = {
  family: "Arial,Helvetica,sans-serif",
  size: 15,
  weight: "normal",
};
export const DEFAULT_TEXT_COLOR = "#ffffff";

// ── Errors ─────────────────────────────────────────────────────────────────

/**
 * Thrown when a widget is requested through a construction path it does
 * not support. Not recoverable.
 */
export class UnsupportedConstructionError extends Error {
  constructor(path: string) {
    super(`ScrollingLabel cannot be constructed via ${path}; create it with new ScrollingLabel()`);
    this.name = "UnsupportedConstructionError";
  }
}

// ── Host ───────────────────────────────────────────────────────────────────

/**
 * Primitives the embedding host provides. All optional.
 */
export type ScrollingLabelHost = {
  /** Intrinsic width measurement (default: Helvetica tables) */
  measurer?: TextMeasurer;
  /** Clock driving the scroll animation (default: shared singleton) */
  clock?: FrameClock;
  /** Defers the coalesced recompute (default: `queueMicrotask`) */
  scheduleRecompute?: (run: () => void) => void;
  /** Called with a fresh snapshot whenever the widget needs redrawing */
  onDisplay?: (snapshot: ScrollingLabelSnapshot) => void;
};

// ── Widget ─────────────────────────────────────────────────────────────────

export class ScrollingLabel {
  private readonly spacing: number;
  private readonly pauseInterval: number;
  private readonly scrollSpeed: number;
  private readonly fadeRatio: number;
  private readonly font: FontDescriptor;
  private readonly textColor: string;

  private readonly measurer: TextMeasurer;
  private readonly clock: FrameClock | undefined;
  private readonly scheduler: (run: () => void) => void;
  private readonly onDisplay: ((snapshot: ScrollingLabelSnapshot) => void) | null;

  private readonly scrollView: ScrollViewState;
  private readonly firstLabel: LabelViewState;
  private readonly secondLabel: LabelViewState;
  private mask: FadeMask | null = null;

  private bounds: Size | null = null;
  private text: string | null = null;
  private overflow = false;

  private currentAnimator: PropertyAnimator | null = null;
  private cycle: ScrollCycle | null = null;
  /** Incremented whenever a cycle starts or is abandoned. */
  private cycleToken = 0;

  private boundsChanged = false;
  private textChanged = false;
  private recomputeScheduled = false;
  private disposed = false;

  constructor(options: ScrollingLabelOptions = {}, host: ScrollingLabelHost = {}) {
    this.spacing = options.spacing ?? DEFAULT_LABEL_SPACING;
    this.pauseInterval = options.pauseInterval ?? DEFAULT_PAUSE_INTERVAL;
    this.scrollSpeed = options.scrollSpeed ?? DEFAULT_SCROLL_SPEED;
    this.fadeRatio = options.fadeRatio ?? DEFAULT_FADE_RATIO;
    this.font = { ...(options.font ?? DEFAULT_FONT) };
    this.textColor = options.textColor ?? DEFAULT_TEXT_COLOR;

    this.measurer = host.measurer ?? getDefaultMeasurer();
    this.clock = host.clock;
    this.scheduler = host.scheduleRecompute ?? ((run) => queueMicrotask(run));
    this.onDisplay = host.onDisplay ?? null;

    const views = createViewHierarchy(this.font, this.textColor);
    this.scrollView = views.scrollView;
    this.firstLabel = views.firstLabel;
    this.secondLabel = views.secondLabel;
  }

  /**
   * Labels are rebuilt from their settings, never revived from serialized
   * state.
   */
  static fromJSON(_json: unknown): never {
    throw new UnsupportedConstructionError("fromJSON");
  }

  get animationState(): AnimationState {
    switch (this.currentAnimator?.state) {
      case "waiting":
        return "paused";
      case "running":
        return "scrolling";
      default:
        return "idle";
    }
  }

  get isOverflowing(): boolean {
    return this.overflow;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Replaces the text on both copies and schedules a recompute. May be
   * called mid-cycle; the running cycle is discarded and a new one starts
   * after the pause.
   */
  setText(text: string): void {
    if (this.disposed) return;
    this.text = text;
    this.firstLabel.text = text;
    this.secondLabel.text = text;
    this.textChanged = true;
    this.scheduleRecompute();
  }

  /**
   * Layout hook: the host reports the label's current size. Repeated
   * reports of the same size are ignored so intermediate layout passes do
   * not restart the scroll.
   */
  setBounds(size: Size): void {
    if (this.disposed) return;
    if (this.bounds && this.bounds.width === size.width && this.bounds.height === size.height) return;
    this.bounds = { width: size.width, height: size.height };
    this.scrollView.frame = { x: 0, y: 0, width: size.width, height: size.height };
    this.boundsChanged = true;
    this.scheduleRecompute();
  }

  /**
   * Runs the pending recompute now. Does nothing until both text and
   * bounds are known, or when nothing changed since the last run.
   */
  layoutIfNeeded(): void {
    if (this.disposed) return;
    if (!this.boundsChanged && !this.textChanged) return;
    if (this.text === null || this.bounds === null) return;

    this.boundsChanged = false;
    this.textChanged = false;
    this.recompute(this.bounds, this.text);
  }

  /**
   * Returns a copy of the current view state.
   */
  snapshot(): ScrollingLabelSnapshot {
    const snapshot: ScrollingLabelSnapshot = {
      bounds: this.bounds ?? { width: 0, height: 0 },
      overflow: this.overflow,
      scrollView: this.scrollView,
      labels: [this.firstLabel, this.secondLabel],
      mask: this.mask,
      animationState: this.animationState,
      cycle: this.cycle,
    };
    return structuredClone(snapshot);
  }

  /**
   * Stops scrolling for good. Pending recomputes and animation callbacks
   * become no-ops.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.stopCurrentAnimation();
    this.cycle = null;
  }

  // ── Private ────────────────────────────────────────────────────────────

  private scheduleRecompute(): void {
    if (this.recomputeScheduled) return;
    this.recomputeScheduled = true;
    this.scheduler(() => {
      this.recomputeScheduled = false;
      this.layoutIfNeeded();
    });
  }

  private recompute(bounds: Size, text: string): void {
    this.stopCurrentAnimation();
    this.updateLayout(bounds, text);
    this.updateMask(bounds);
    this.scrollLabelIfNeeded();
    this.display();
  }

  private updateLayout(bounds: Size, text: string): void {
    const layout = computeScrollLayout({
      bounds,
      firstWidth: this.measurer.measure(text, this.font),
      secondWidth: this.measurer.measure(this.secondLabel.text, this.font),
      spacing: this.spacing,
    });

    this.overflow = layout.overflow;
    this.firstLabel.frame = layout.firstFrame;
    this.secondLabel.frame = layout.secondFrame;
    this.secondLabel.hidden = layout.secondHidden;
    this.scrollView.isScrollEnabled = layout.overflow;
    this.scrollView.contentSize = layout.contentSize;
    this.scrollView.contentOffset = { x: 0, y: 0 };
  }

  private updateMask(bounds: Size): void {
    this.mask = this.overflow ? buildFadeMask(bounds, this.fadeRatio) : null;
  }

  /**
   * Starts a new cycle from the left edge if the text still overflows.
   * Called after every recompute and at the end of every cycle.
   */
  private scrollLabelIfNeeded(): void {
    this.stopCurrentAnimation();
    this.scrollView.contentOffset = { x: 0, y: 0 };
    this.cycle = null;
    if (!this.overflow) return;

    const endOffset = maxX(this.secondLabel.frame);
    const duration = scrollDuration(endOffset, this.scrollSpeed);
    if (duration === null) return;

    const token = ++this.cycleToken;
    const animator = runningPropertyAnimator({
      duration,
      delay: this.pauseInterval,
      from: 0,
      to: endOffset,
      clock: this.clock,
      apply: (x) => {
        if (!this.isCurrentCycle(token)) return;
        this.scrollView.contentOffset = { x, y: 0 };
        this.display();
      },
      completion: (position) => {
        if (position !== "end" || !this.isCurrentCycle(token)) return;
        this.scrollLabelIfNeeded();
        this.display();
      },
    });
    this.currentAnimator = animator;
    this.cycle = { endOffset, duration: animator.duration, delay: animator.delay };
  }

  private isCurrentCycle(token: number): boolean {
    return !this.disposed && token === this.cycleToken;
  }

  private stopCurrentAnimation(): void {
    if (this.currentAnimator) {
      this.currentAnimator.stopAnimation(true);
      this.currentAnimator = null;
      this.cycleToken++;
    }
  }

  private display(): void {
    if (this.disposed || !this.onDisplay) return;
    this.onDisplay(this.snapshot());
  }
}

// ── View hierarchy ─────────────────────────────────────────────────────────

const ZERO_FRAME: Rect = { x: 0, y: 0, width: 0, height: 0 };

/**
 * Builds the clipping container and the two text copies. Copy B starts
 * hidden until the text overflows.
 */
function createViewHierarchy(
  font: FontDescriptor,
  textColor: string,
): { scrollView: ScrollViewState; firstLabel: LabelViewState; secondLabel: LabelViewState } {
  const makeLabel = (hidden: boolean): LabelViewState => ({
    text: "",
    frame: { ...ZERO_FRAME },
    hidden,
    font: { ...font },
    textColor,
    textAlignment: "center",
  });

  return {
    scrollView: {
      frame: { ...ZERO_FRAME },
      contentOffset: { x: 0, y: 0 },
      contentSize: { width: 0, height: 0 },
      isScrollEnabled: false,
      isUserInteractionEnabled: false,
      showsScrollIndicators: false,
    },
    firstLabel: makeLabel(false),
    secondLabel: makeLabel(true),
  };
}
