/**
 * Types for the scrolling label widget and its view state.
 *
 * @author Pedro Fuentes <git@pedrofuent.es>
 * @copyright Pedro Pablo Fuentes Schuster
 * @license MIT
 */

// ── Geometry ───────────────────────────────────────────────────────────────

export type Point = {
  x: number;
  y: number;
};

export type Size = {
  width: number;
  height: number;
};

export type Rect = Point & Size;

// ── Configuration ──────────────────────────────────────────────────────────

export type FontWeight = "normal" | "bold";

/**
 * Font used for both text copies and for measuring intrinsic width.
 */
export type FontDescriptor = {
  /** CSS/SVG font-family list */
  family: string;
  /** Font size in pixels */
  size: number;
  weight: FontWeight;
};

/**
 * Widget configuration. Fixed once the widget is constructed.
 */
export type ScrollingLabelOptions = {
  /** Gap in pixels between the two text copies (default: 30) */
  spacing?: number;
  /** Pause in seconds before every scroll cycle (default: 2) */
  pauseInterval?: number;
  /** Scroll speed in pixels per second (default: 25) */
  scrollSpeed?: number;
  /** Portion of the width faded at each edge, 0–1 (default: 0.1) */
  fadeRatio?: number;
  font?: FontDescriptor;
  /** Text color (hex, default: white) */
  textColor?: string;
};

// ── View state ─────────────────────────────────────────────────────────────

export type LabelViewState = {
  text: string;
  frame: Rect;
  hidden: boolean;
  font: FontDescriptor;
  textColor: string;
  textAlignment: "center";
};

export type ScrollViewState = {
  frame: Rect;
  contentOffset: Point;
  contentSize: Size;
  isScrollEnabled: boolean;
  isUserInteractionEnabled: false;
  showsScrollIndicators: false;
};

export type GradientStop = {
  /** Fractional position along the gradient axis (0–1) */
  offset: number;
  /** Alpha at this stop (0 = transparent, 1 = opaque) */
  opacity: number;
};

/**
 * Horizontal alpha mask laid over the whole widget while it scrolls.
 */
export type FadeMask = {
  frame: Rect;
  startPoint: Point;
  endPoint: Point;
  stops: GradientStop[];
};

export type AnimationState = "idle" | "paused" | "scrolling";

/**
 * Parameters of the cycle currently in flight.
 */
export type ScrollCycle = {
  /** Target content offset (the scrollable width) */
  endOffset: number;
  /** Scroll duration in seconds */
  duration: number;
  /** Pause before motion starts, in seconds */
  delay: number;
};

/**
 * Immutable copy of everything a renderer needs to draw the widget.
 */
export type ScrollingLabelSnapshot = {
  bounds: Size;
  overflow: boolean;
  scrollView: ScrollViewState;
  labels: [LabelViewState, LabelViewState];
  mask: FadeMask | null;
  animationState: AnimationState;
  cycle: ScrollCycle | null;
};
