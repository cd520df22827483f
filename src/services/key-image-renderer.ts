/**
 * SVG-based key image renderer for Stream Deck.
 *
 * Draws a scrolling label snapshot into a 144×144 SVG image:
 * - the label sits in a horizontal band across the middle of the key
 * - the band clips the scroll content, which is translated by the
 *   current content offset
 * - an alpha gradient mask fades both edges while the label scrolls
 * - safe XML escaping
 *
 * Usage:
 *   const dataUri = renderLabelImage(label.snapshot());
 *   await ev.action.setImage(dataUri);
 *
 * @author Pedro Fuentes <git@pedrofuent.es>
 * @copyright Pedro Pablo Fuentes Schuster
 * @license MIT
 */
import type { FadeMask, LabelViewState, Rect, ScrollingLabelSnapshot, Size } from "../types/scrolling-label";

// ── Colors & Layout ────────────────────────────────────────────────────────

export const BG_COLOR = "#0d1117";
export const TEXT_SECONDARY = "#9ca3af";

export const KEY_SIZE = 144;

/**
 * Area of the key occupied by the label.
 *
 *   ┌────────────────────────┐
 *   │                        │
 *   │ ┌────────────────────┐ │  ← y = 52
 *   │ │  label  (128×40)   │ │
 *   │ └────────────────────┘ │
 *   │                        │
 *   └────────────────────────┘
 */
export const LABEL_BAND: Rect = { x: 8, y: 52, width: 128, height: 40 };

/** Bounds handed to the widget on a key. */
export const LABEL_BOUNDS: Size = { width: LABEL_BAND.width, height: LABEL_BAND.height };

/** Baseline offset below the vertical centre, as a fraction of font size. */
const BASELINE_SHIFT = 0.35;

// ── Types ──────────────────────────────────────────────────────────────────

export type LabelImageOptions = {
  /** Background color (default: dark navy) */
  bgColor?: string;
};

// ── Renderer ───────────────────────────────────────────────────────────────

/**
 * Renders a data URI for a 144×144 SVG key image of the label snapshot.
 */
export function renderLabelImage(snapshot: ScrollingLabelSnapshot, options: LabelImageOptions = {}): string {
  const bg = options.bgColor ?? BG_COLOR;
  const offset = snapshot.scrollView.contentOffset;
  const maskDefs = snapshot.mask ? renderMaskDefs(snapshot.mask) : "";
  const maskAttr = snapshot.mask ? ` mask="url(#fade-mask)"` : "";
  const texts = snapshot.labels
    .filter((label) => !label.hidden)
    .map(renderLabelText)
    .join("\n      ");

  const svg = `<svg xmlns="http://www.w3.org/2000/svg" width="${KEY_SIZE}" height="${KEY_SIZE}" viewBox="0 0 ${KEY_SIZE} ${KEY_SIZE}">
  <defs>
    <clipPath id="label-clip"><rect x="${LABEL_BAND.x}" y="${LABEL_BAND.y}" width="${LABEL_BAND.width}" height="${LABEL_BAND.height}"/></clipPath>${maskDefs}
  </defs>
  <rect width="${KEY_SIZE}" height="${KEY_SIZE}" rx="16" fill="${escapeXml(bg)}"/>
  <g clip-path="url(#label-clip)"${maskAttr}>
    <g transform="translate(${fmt(LABEL_BAND.x - offset.x)} ${fmt(LABEL_BAND.y - offset.y)})">
      ${texts}
    </g>
  </g>
</svg>`;

  return `data:image/svg+xml,${encodeURIComponent(svg)}`;
}

/**
 * Renders a minimal placeholder key (e.g., for a label with no text yet).
 */
export function renderPlaceholderImage(text = "..."): string {
  const svg = `<svg xmlns="http://www.w3.org/2000/svg" width="144" height="144" viewBox="0 0 144 144">
  <rect width="144" height="144" rx="16" fill="${BG_COLOR}"/>
  <text x="72" y="80" text-anchor="middle" fill="${TEXT_SECONDARY}" font-size="20" font-family="Arial,Helvetica,sans-serif">${escapeXml(text)}</text>
</svg>`;

  return `data:image/svg+xml,${encodeURIComponent(svg)}`;
}

/**
 * Escapes special XML characters in a string for safe SVG embedding.
 */
export function escapeXml(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/**
 * Formats a coordinate with at most two decimals.
 */
export function fmt(value: number): string {
  return String(Math.round(value * 100) / 100);
}

// ── Private ────────────────────────────────────────────────────────────────

function renderLabelText(label: LabelViewState): string {
  const { frame, font } = label;
  const x = frame.x + frame.width / 2;
  const y = frame.y + frame.height / 2 + font.size * BASELINE_SHIFT;
  return `<text x="${fmt(x)}" y="${fmt(y)}" text-anchor="middle" fill="${escapeXml(label.textColor)}" font-size="${fmt(font.size)}" font-weight="${font.weight}" font-family="${escapeXml(font.family)}">${escapeXml(label.text)}</text>`;
}

/**
 * Luminance mask: white stops with varying opacity, laid over the band.
 */
function renderMaskDefs(mask: FadeMask): string {
  const stops = mask.stops
    .map((s) => `<stop offset="${fmt(s.offset)}" stop-color="#ffffff" stop-opacity="${fmt(s.opacity)}"/>`)
    .join("");
  const { frame, startPoint, endPoint } = mask;
  return `
    <linearGradient id="fade-gradient" x1="${fmt(startPoint.x)}" y1="${fmt(startPoint.y)}" x2="${fmt(endPoint.x)}" y2="${fmt(endPoint.y)}">${stops}</linearGradient>
    <mask id="fade-mask"><rect x="${fmt(LABEL_BAND.x + frame.x)}" y="${fmt(LABEL_BAND.y + frame.y)}" width="${fmt(frame.width)}" height="${fmt(frame.height)}" fill="url(#fade-gradient)"/></mask>`;
}
