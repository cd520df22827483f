/**
 * Intrinsic text width measurement.
 *
 * Stream Deck renders key images from SVG with Arial/Helvetica, so widths
 * are computed from the standard Helvetica advance-width tables rather than
 * from a live rendering context. Characters outside the table use the
 * table's fallback advance (the width of a digit).
 *
 * @author Pedro Fuentes <git@pedrofuent.es>
 * @copyright Pedro Pablo Fuentes Schuster
 * @license MIT
 */
import helveticaWidths from "../data/helvetica-widths.json";
import type { FontDescriptor, FontWeight } from "../types/scrolling-label";

/**
 * Measures the width text would occupy if unconstrained.
 */
export interface TextMeasurer {
  measure(text: string, font: FontDescriptor): number;
}

export type AdvanceWidthTable = {
  /** Font design units per em */
  unitsPerEm: number;
  /** Advance used for characters missing from the table */
  fallback: number;
} & Record<FontWeight, Record<string, number>>;

const HELVETICA: AdvanceWidthTable = helveticaWidths;

/**
 * Measures text from per-character advance widths.
 */
export class AdvanceWidthMeasurer implements TextMeasurer {
  private readonly table: AdvanceWidthTable;

  constructor(table: AdvanceWidthTable = HELVETICA) {
    this.table = table;
  }

  measure(text: string, font: FontDescriptor): number {
    if (!(font.size > 0)) return 0;
    const advances = this.table[font.weight];
    let units = 0;
    for (const char of text) {
      units += advances[char] ?? this.table.fallback;
    }
    return (units * font.size) / this.table.unitsPerEm;
  }
}

let defaultMeasurer: AdvanceWidthMeasurer | null = null;

/**
 * Returns the shared Helvetica measurer.
 */
export function getDefaultMeasurer(): TextMeasurer {
  if (!defaultMeasurer) {
    defaultMeasurer = new AdvanceWidthMeasurer();
  }
  return defaultMeasurer;
}
