/**
 * Entry point: registers Stream Deck actions and connects to the SDK.
 *
 * @author Pedro Fuentes <git@pedrofuent.es>
 * @copyright Pedro Pablo Fuentes Schuster
 * @license MIT
 */
import streamDeck, { LogLevel } from "@elgato/streamdeck";

import { ScrollingLabelAction } from "./actions/scrolling-label";
import { DEFAULT_FRAMES_PER_SECOND, getFrameClock } from "./services/frame-clock";

/**
 * Plugin-wide settings shared by every key.
 */
type GlobalSettings = {
  /** Animation frame rate (default: 10); a string when set from a dropdown */
  framesPerSecond?: number | string;
};

// Set the log level for the plugin
streamDeck.logger.setLevel(LogLevel.DEBUG);

getFrameClock().setErrorHandler((subscriberId, error) => {
  streamDeck.logger.error(`Frame callback "${subscriberId}" failed:`, error);
});

// Register actions
streamDeck.actions.registerAction(new ScrollingLabelAction());

// ── Global Settings ────────────────────────────────────────────────────────
// The frame rate applies to every key at once.

streamDeck.settings
  .getGlobalSettings<GlobalSettings>()
  .then((settings) => {
    getFrameClock().setFramesPerSecond(Number(settings?.framesPerSecond ?? DEFAULT_FRAMES_PER_SECOND));
    streamDeck.logger.debug("Global settings loaded");
  })
  .catch((error: unknown) => {
    streamDeck.logger.error("Failed to load global settings:", error);
  });

streamDeck.settings.onDidReceiveGlobalSettings<GlobalSettings>((ev) => {
  getFrameClock().setFramesPerSecond(Number(ev.settings?.framesPerSecond ?? DEFAULT_FRAMES_PER_SECOND));
  streamDeck.logger.debug("Global settings updated");
});

// Connect to Stream Deck
streamDeck.connect().catch((error: unknown) => {
  streamDeck.logger.error("Failed to connect to Stream Deck:", error);
});
