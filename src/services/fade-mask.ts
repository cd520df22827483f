/**
 * Builds the horizontal edge-fade mask laid over an overflowing label.
 *
 * @author Pedro Fuentes <git@pedrofuent.es>
 * @copyright Pedro Pablo Fuentes Schuster
 * @license MIT
 */
import type { FadeMask, Size } from "../types/scrolling-label";

/**
 * Returns a transparent → opaque → opaque → transparent gradient whose
 * opaque band spans `[fadeRatio, 1 - fadeRatio]` of the width.
 *
 * The frame always matches the bounds passed in, so callers rebuild the
 * mask on every layout pass.
 */
export function buildFadeMask(bounds: Size, fadeRatio: number): FadeMask {
  return {
    frame: { x: 0, y: 0, width: bounds.width, height: bounds.height },
    startPoint: { x: 0, y: 0.5 },
    endPoint: { x: 1, y: 0.5 },
    stops: [
      { offset: 0, opacity: 0 },
      { offset: fadeRatio, opacity: 1 },
      { offset: 1 - fadeRatio, opacity: 1 },
      { offset: 1, opacity: 0 },
    ],
  };
}
