/**
 * Scrolling Label action for Stream Deck.
 *
 * Shows a text label on the key. Text that does not fit scrolls
 * continuously with a pause between cycles and faded edges; short text is
 * shown centred and still. Press the key to restart the scroll from the
 * beginning.
 *
 * Each key gets its own ScrollingLabel widget. Appearance settings are
 * fixed per widget, so changing them rebuilds the key's widget, while a
 * text-only change is passed through to the running one.
 *
 * @author Pedro Fuentes <git@pedrofuent.es>
 * @copyright Pedro Pablo Fuentes Schuster
 * @license MIT
 */
import streamDeck, {
  action,
  SingletonAction,
  type DidReceiveSettingsEvent,
  type KeyDownEvent,
  type WillAppearEvent,
  type WillDisappearEvent,
} from "@elgato/streamdeck";

import type { FrameClock } from "../services/frame-clock";
import {
  LABEL_BOUNDS,
  renderLabelImage,
  renderPlaceholderImage,
  type LabelImageOptions,
} from "../services/key-image-renderer";
import type { ScrollingLabelOptions, ScrollingLabelSnapshot } from "../types/scrolling-label";
import {
  DEFAULT_FADE_RATIO,
  DEFAULT_FONT,
  DEFAULT_LABEL_SPACING,
  DEFAULT_PAUSE_INTERVAL,
  DEFAULT_SCROLL_SPEED,
  DEFAULT_TEXT_COLOR,
  ScrollingLabel,
} from "../widgets/scrolling-label";

/** Font size used on keys unless configured. */
export const KEY_FONT_SIZE = 22;

/** Shown on keys that have no text configured. */
export const PLACEHOLDER_TEXT = "No text";

/**
 * Settings for the Scrolling Label action (per key).
 *
 * Numeric fields arrive as strings from text inputs in the property
 * inspector and are parsed on use.
 */
export type ScrollingLabelSettings = {
  /** Text to display */
  text?: string;
  /** Scroll speed in pixels per second (default: 25) */
  scrollSpeed?: number | string;
  /** Pause before each scroll cycle, in seconds (default: 2) */
  pauseSeconds?: number | string;
  /** Gap between the repeated text, in pixels (default: 30) */
  spacing?: number | string;
  /** Portion of the width faded at each edge, 0–0.5 (default: 0.1) */
  fadeRatio?: number | string;
  /** Font size in pixels (default: 22) */
  fontSize?: number | string;
  bold?: boolean;
  /** Text color (hex) */
  textColor?: string;
  /** Key background color (hex) */
  backgroundColor?: string;
};

/**
 * Widget configuration derived from a key's settings.
 */
export type ResolvedLabelConfig = {
  text: string;
  options: ScrollingLabelOptions;
  image: LabelImageOptions;
  /** Equal for settings that need no widget rebuild */
  configKey: string;
};

/** Minimal view of a key the action draws onto. */
type KeyTarget = {
  readonly id: string;
  setImage(image: string): Promise<void>;
};

type KeyEntry = {
  target: KeyTarget;
  label: ScrollingLabel;
  config: ResolvedLabelConfig;
  lastImage: string | null;
};

@action({ UUID: "com.scrollinglabel.deck.label" })
export class ScrollingLabelAction extends SingletonAction<ScrollingLabelSettings> {
  private keys = new Map<string, KeyEntry>();
  private readonly clock: FrameClock | undefined;

  constructor(clock?: FrameClock) {
    super();
    this.clock = clock;
  }

  /** Number of keys currently showing a label. */
  get visibleKeyCount(): number {
    return this.keys.size;
  }

  /**
   * Returns the widget shown on a key, if any.
   */
  getLabel(contextId: string): ScrollingLabel | undefined {
    return this.keys.get(contextId)?.label;
  }

  /**
   * Called when the action appears on the Stream Deck.
   * Builds the key's widget and draws it immediately.
   */
  override onWillAppear(ev: WillAppearEvent<ScrollingLabelSettings>): void {
    this.mount(ev.action, ev.payload.settings);
  }

  /**
   * Called when settings change from the Property Inspector.
   */
  override onDidReceiveSettings(ev: DidReceiveSettingsEvent<ScrollingLabelSettings>): void {
    const entry = this.keys.get(ev.action.id);
    const config = resolveLabelConfig(ev.payload.settings);

    if (!entry || entry.config.configKey !== config.configKey) {
      this.mount(ev.action, ev.payload.settings);
      return;
    }

    entry.config = config;
    entry.label.setText(config.text);
    entry.label.layoutIfNeeded();
  }

  /**
   * Called when the key is pressed. Restarts the scroll cycle.
   */
  override onKeyDown(ev: KeyDownEvent<ScrollingLabelSettings>): void {
    const entry = this.keys.get(ev.action.id);
    if (!entry) return;
    entry.label.setText(entry.config.text);
    entry.label.layoutIfNeeded();
  }

  /**
   * Called when the action disappears from the Stream Deck.
   * Stops the key's animation and forgets it.
   */
  override onWillDisappear(ev: WillDisappearEvent<ScrollingLabelSettings>): void {
    this.unmount(ev.action.id);
  }

  // ── Private ────────────────────────────────────────────────────────────

  private mount(target: KeyTarget, settings: ScrollingLabelSettings): void {
    this.unmount(target.id);

    const config = resolveLabelConfig(settings);
    const entry: KeyEntry = {
      target,
      config,
      lastImage: null,
      label: new ScrollingLabel(config.options, {
        clock: this.clock,
        onDisplay: (snapshot) => this.draw(entry, snapshot),
      }),
    };
    this.keys.set(target.id, entry);

    entry.label.setBounds(LABEL_BOUNDS);
    entry.label.setText(config.text);
    entry.label.layoutIfNeeded();

    streamDeck.logger.debug(
      `Scrolling label mounted on ${target.id} (${entry.label.isOverflowing ? "scrolling" : "static"})`,
    );
  }

  private unmount(contextId: string): void {
    const entry = this.keys.get(contextId);
    if (!entry) return;
    entry.label.dispose();
    this.keys.delete(contextId);
  }

  /**
   * Pushes a new key image unless it is identical to the last one.
   */
  private draw(entry: KeyEntry, snapshot: ScrollingLabelSnapshot): void {
    if (this.keys.get(entry.target.id) !== entry) return;

    const image = entry.config.text
      ? renderLabelImage(snapshot, entry.config.image)
      : renderPlaceholderImage(PLACEHOLDER_TEXT);
    if (image === entry.lastImage) return;
    entry.lastImage = image;

    entry.target.setImage(image).catch((error: unknown) => {
      streamDeck.logger.error(`Failed to update scrolling label on ${entry.target.id}:`, error);
    });
  }
}

// ── Settings ───────────────────────────────────────────────────────────────

/**
 * Maps per-key settings onto widget options, falling back to defaults for
 * missing or unparsable values.
 */
export function resolveLabelConfig(settings: ScrollingLabelSettings): ResolvedLabelConfig {
  const options: ScrollingLabelOptions = {
    spacing: parseNumber(settings.spacing, DEFAULT_LABEL_SPACING),
    pauseInterval: parseNumber(settings.pauseSeconds, DEFAULT_PAUSE_INTERVAL),
    scrollSpeed: parseNumber(settings.scrollSpeed, DEFAULT_SCROLL_SPEED),
    fadeRatio: parseNumber(settings.fadeRatio, DEFAULT_FADE_RATIO),
    font: {
      family: DEFAULT_FONT.family,
      size: parseNumber(settings.fontSize, KEY_FONT_SIZE),
      weight: settings.bold ? "bold" : "normal",
    },
    textColor: settings.textColor || DEFAULT_TEXT_COLOR,
  };
  const image: LabelImageOptions = settings.backgroundColor ? { bgColor: settings.backgroundColor } : {};

  return {
    text: settings.text ?? "",
    options,
    image,
    configKey: JSON.stringify({ options, image }),
  };
}

/**
 * Parses a number from a setting value. Blank, missing and non-numeric
 * values yield `fallback`.
 */
export function parseNumber(value: number | string | undefined, fallback: number): number {
  if (typeof value === "number") return Number.isFinite(value) ? value : fallback;
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}
