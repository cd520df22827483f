/**
 * Layout engine for the scrolling label.
 *
 * Decides whether the text overflows its container and computes the frames
 * of the two text copies and the scrollable content width.
 *
 *   ┌──────── container ────────┐
 *   │[ copy A ......... ]<gap>[ copy B ......... ]
 *   └───────────────────────────┘
 *   0                  wA   wA+gap            wA+gap+wB  ← scrollable width
 *
 * @author Pedro Fuentes <git@pedrofuent.es>
 * @copyright Pedro Pablo Fuentes Schuster
 * @license MIT
 */
import type { Rect, Size } from "../types/scrolling-label";

export type ScrollLayoutInput = {
  bounds: Size;
  /** Intrinsic width of copy A */
  firstWidth: number;
  /** Intrinsic width of copy B (same text, so normally equal to copy A's) */
  secondWidth: number;
  spacing: number;
};

export type ScrollLayout = {
  overflow: boolean;
  firstFrame: Rect;
  secondFrame: Rect;
  secondHidden: boolean;
  contentSize: Size;
  scrollableWidth: number;
};

export const ZERO_RECT: Rect = { x: 0, y: 0, width: 0, height: 0 };

/**
 * Returns `true` when the measured text is wider than the container.
 *
 * Unusable measurements (NaN, infinite, negative) and empty containers
 * never overflow.
 */
export function isOverflowing(bounds: Size, textWidth: number): boolean {
  if (!Number.isFinite(textWidth) || textWidth < 0) return false;
  if (!(bounds.width > 0) || !(bounds.height > 0)) return false;
  return textWidth > bounds.width;
}

/**
 * Computes the frames of both text copies for the given bounds.
 */
export function computeScrollLayout(input: ScrollLayoutInput): ScrollLayout {
  const { bounds, firstWidth, spacing } = input;
  const height = bounds.height;

  if (!isOverflowing(bounds, firstWidth)) {
    return {
      overflow: false,
      firstFrame: { x: 0, y: 0, width: bounds.width, height },
      secondFrame: { ...ZERO_RECT },
      secondHidden: true,
      contentSize: { width: bounds.width, height },
      scrollableWidth: bounds.width,
    };
  }

  const secondWidth = Number.isFinite(input.secondWidth) ? input.secondWidth : firstWidth;
  const firstFrame: Rect = { x: 0, y: 0, width: firstWidth, height };
  const secondFrame: Rect = {
    x: maxX(firstFrame) + spacing,
    y: 0,
    width: secondWidth,
    height,
  };

  return {
    overflow: true,
    firstFrame,
    secondFrame,
    secondHidden: false,
    contentSize: { width: maxX(secondFrame), height },
    scrollableWidth: maxX(secondFrame),
  };
}

/**
 * Duration in seconds of one scroll cycle at constant speed.
 *
 * @returns `null` when the speed cannot produce a finite, positive duration
 */
export function scrollDuration(scrollableWidth: number, scrollSpeed: number): number | null {
  if (!Number.isFinite(scrollSpeed) || scrollSpeed <= 0) return null;
  if (!Number.isFinite(scrollableWidth) || scrollableWidth < 0) return null;
  return scrollableWidth / scrollSpeed;
}

/** Right edge of a frame. */
export function maxX(rect: Rect): number {
  return rect.x + rect.width;
}
