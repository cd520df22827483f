/**
 * Tests for intrinsic text width measurement.
 *
 * @author Pedro Fuentes <git@pedrofuent.es>
 * @copyright Pedro Pablo Fuentes Schuster
 * @license MIT
 */
import { describe, it, expect } from "vitest";
import {
  AdvanceWidthMeasurer,
  getDefaultMeasurer,
  type AdvanceWidthTable,
} from "../../src/services/text-metrics";
import type { FontDescriptor } from "../../src/types/scrolling-label";

const regular = (size: number): FontDescriptor => ({ family: "Arial", size, weight: "normal" });
const bold = (size: number): FontDescriptor => ({ family: "Arial", size, weight: "bold" });

describe("AdvanceWidthMeasurer", () => {
  const measurer = new AdvanceWidthMeasurer();

  it("should measure an empty string as zero", () => {
    expect(measurer.measure("", regular(15))).toBe(0);
  });

  it("should sum Helvetica advances scaled by font size", () => {
    // H 722 + e 556 + l 222 + l 222 + o 556 = 2278 units
    expect(measurer.measure("Hello", regular(10))).toBeCloseTo(22.78, 10);
  });

  it("should use the bold table for bold fonts", () => {
    // H 722 + e 556 + l 278 + l 278 + o 611 = 2445 units
    expect(measurer.measure("Hello", bold(10))).toBeCloseTo(24.45, 10);
  });

  it("should scale linearly with font size", () => {
    const small = measurer.measure("Scrolling", regular(10));
    const large = measurer.measure("Scrolling", regular(20));
    expect(large).toBeCloseTo(small * 2, 10);
  });

  it("should use the fallback advance for characters outside the table", () => {
    // fallback 556 units per character
    expect(measurer.measure("éü", regular(10))).toBeCloseTo(11.12, 10);
  });

  it("should count astral characters once", () => {
    expect(measurer.measure("🎵", regular(10))).toBeCloseTo(5.56, 10);
  });

  it("should return zero for a non-positive font size", () => {
    expect(measurer.measure("Hello", regular(0))).toBe(0);
  });

  it("should accept a custom table", () => {
    const table: AdvanceWidthTable = {
      unitsPerEm: 100,
      fallback: 50,
      normal: { a: 10 },
      bold: { a: 20 },
    };
    const custom = new AdvanceWidthMeasurer(table);
    expect(custom.measure("aab", regular(10))).toBe(7);
    expect(custom.measure("a", bold(10))).toBe(2);
  });
});

describe("getDefaultMeasurer", () => {
  it("should return the same instance on every call", () => {
    expect(getDefaultMeasurer()).toBe(getDefaultMeasurer());
  });
});
