/**
 * Tests for the plugin consistency validator.
 *
 * These tests verify that the validate-consistency script correctly detects
 * when actions, manifest, PI files and their settings, icons, tests, and
 * docs are out of sync.
 *
 * @author Pedro Fuentes <git@pedrofuent.es>
 * @copyright Pedro Pablo Fuentes Schuster
 * @license MIT
 */
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  PLUGIN_DIR_NAME,
  ROOT,
  readPiSettings,
  readSettingsFields,
  validate,
} from "../../scripts/validate-consistency";
import { DEFAULT_FRAMES_PER_SECOND } from "../../src/services/frame-clock";

describe("validate-consistency", () => {
  describe("current project", () => {
    it("should pass with no errors", () => {
      const errors = validate();
      if (errors.length > 0) {
        console.error("Unexpected validation errors:");
        for (const e of errors) {
          console.error(`  [${e.category}] ${e.message}`);
        }
      }
      expect(errors).toEqual([]);
    });

    it("should find every PI setting on the action's settings type", () => {
      const errors = validate();
      expect(errors.filter((e) => e.category === "Settings")).toHaveLength(0);
    });

    it("should verify version sync between package.json and manifest.json", () => {
      const errors = validate();
      expect(errors.filter((e) => e.category === "Version")).toHaveLength(0);
    });

    it("should limit the edge fade in the PI to at most half the width", () => {
      const html = fs.readFileSync(path.join(ROOT, PLUGIN_DIR_NAME, "ui", "scrolling-label.html"), "utf-8");
      const element = html.match(/<sdpi-[a-z]+ setting="fadeRatio"[^>]*>/)?.[0] ?? "";

      expect(element).toMatch(/^<sdpi-range /);
      expect(element).toContain('min="0"');
      expect(element).toContain('max="0.5"');
    });

    it("should default the PI frame rate to the clock's default", () => {
      const html = fs.readFileSync(path.join(ROOT, PLUGIN_DIR_NAME, "ui", "scrolling-label.html"), "utf-8");
      const element = html.match(/<sdpi-select setting="framesPerSecond"[^>]*>/)?.[0] ?? "";

      expect(element).toContain(`default="${DEFAULT_FRAMES_PER_SECOND}"`);
    });
  });

  // ── readPiSettings ─────────────────────────────────────────────────────

  describe("readPiSettings", () => {
    it("should split action and global settings", () => {
      const html = `
        <sdpi-item label="Text"><sdpi-textfield setting="text"></sdpi-textfield></sdpi-item>
        <sdpi-item label="Speed"><sdpi-range setting="scrollSpeed" min="5"></sdpi-range></sdpi-item>
        <sdpi-item label="FPS"><sdpi-select setting="framesPerSecond" global="true"></sdpi-select></sdpi-item>`;

      expect(readPiSettings(html)).toEqual({
        action: ["text", "scrollSpeed"],
        global: ["framesPerSecond"],
      });
    });

    it("should ignore elements without a setting", () => {
      expect(readPiSettings(`<sdpi-item label="Text"></sdpi-item>`)).toEqual({ action: [], global: [] });
    });
  });

  // ── readSettingsFields ─────────────────────────────────────────────────

  describe("readSettingsFields", () => {
    it("should list the optional fields of the settings type", () => {
      const source = [
        "export type DemoSettings = {",
        "  /** Text */",
        "  text?: string;",
        "  speed?: number | string;",
        "};",
      ].join("\n");

      expect(readSettingsFields(source)).toEqual(["text", "speed"]);
    });

    it("should return nothing when no settings type is declared", () => {
      expect(readSettingsFields("export const x = 1;")).toEqual([]);
    });
  });

  // ── Broken projects ────────────────────────────────────────────────────

  describe("broken projects", () => {
    let root: string;

    beforeEach(() => {
      root = fs.mkdtempSync(path.join(os.tmpdir(), "validate-consistency-"));
    });

    afterEach(() => {
      fs.rmSync(root, { recursive: true, force: true });
    });

    function writeFile(relative: string, content: string): void {
      const file = path.join(root, relative);
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(file, content);
    }

    function writeManifest(manifest: unknown): void {
      writeFile(path.join(PLUGIN_DIR_NAME, "manifest.json"), JSON.stringify(manifest));
    }

    const demoAction = {
      Name: "Demo",
      UUID: "com.example.demo",
      Icon: "imgs/demo",
      PropertyInspectorPath: "ui/demo.html",
      UserTitleEnabled: false,
      States: [{ Image: "imgs/demo", ShowTitle: false }],
    };

    /** A project in which the demo action is fully wired up. */
    function writeValidProject(): void {
      writeManifest({ Version: "2.0.0.0", Actions: [demoAction] });
      writeFile(path.join(PLUGIN_DIR_NAME, "imgs", "demo.svg"), "<svg/>");
      writeFile(
        path.join(PLUGIN_DIR_NAME, "ui", "demo.html"),
        `<sdpi-textfield setting="text"></sdpi-textfield>`,
      );
      writeFile(
        path.join("src", "actions", "demo.ts"),
        [`@action({ UUID: "com.example.demo" })`, "export type DemoSettings = {", "  text?: string;", "};"].join("\n"),
      );
      writeFile(path.join("src", "plugin.ts"), `import { Demo } from "./actions/demo";\nregisterAction(new Demo());`);
      writeFile(path.join("tests", "actions", "demo.test.ts"), "");
      writeFile("README.md", "# Demo\n");
      writeFile("package.json", JSON.stringify({ version: "2.0.0" }));
    }

    it("should accept a fully wired project", () => {
      writeValidProject();
      expect(validate(root)).toEqual([]);
    });

    it("should report a missing manifest", () => {
      expect(validate(root)).toEqual([
        {
          category: "Manifest",
          message: `manifest.json not found at ${path.join(root, PLUGIN_DIR_NAME, "manifest.json")}`,
        },
      ]);
    });

    it("should report an unparsable manifest", () => {
      writeFile(path.join(PLUGIN_DIR_NAME, "manifest.json"), "{ nope");
      expect(validate(root)).toEqual([{ category: "Manifest", message: "manifest.json is not valid JSON" }]);
    });

    it("should report a manifest without actions", () => {
      writeManifest({ Version: "1.0.0.0" });
      expect(validate(root)).toEqual([{ category: "Manifest", message: "manifest.json has no Actions array" }]);
    });

    it("should require ShowTitle to be false", () => {
      writeValidProject();
      writeManifest({ Version: "2.0.0.0", Actions: [{ ...demoAction, States: [{ Image: "imgs/demo", ShowTitle: true }] }] });

      const errors = validate(root);
      expect(errors).toHaveLength(1);
      expect(errors[0].message).toContain("ShowTitle must be false");
    });

    it("should report a PI setting the settings type does not declare", () => {
      writeValidProject();
      writeFile(
        path.join(PLUGIN_DIR_NAME, "ui", "demo.html"),
        `<sdpi-textfield setting="text"></sdpi-textfield><sdpi-range setting="speed"></sdpi-range>`,
      );

      expect(validate(root)).toEqual([
        {
          category: "Settings",
          message: `ui/demo.html: setting "speed" is not a field of the action's settings type`,
        },
      ]);
    });

    it("should report a global setting plugin.ts never reads", () => {
      writeValidProject();
      writeFile(
        path.join(PLUGIN_DIR_NAME, "ui", "demo.html"),
        `<sdpi-textfield setting="text"></sdpi-textfield><sdpi-select setting="framesPerSecond" global="true"></sdpi-select>`,
      );

      expect(validate(root)).toEqual([
        {
          category: "Settings",
          message: `ui/demo.html: global setting "framesPerSecond" is never read in plugin.ts`,
        },
      ]);
    });

    it("should report a missing action test", () => {
      writeValidProject();
      fs.rmSync(path.join(root, "tests"), { recursive: true });

      expect(validate(root)).toEqual([
        {
          category: "Tests",
          message: `Action "demo.ts": test file missing: expected tests/actions/demo.test.ts`,
        },
      ]);
    });

    it("should report an undocumented action", () => {
      writeValidProject();
      writeFile("README.md", "# Nothing here\n");

      expect(validate(root)).toEqual([{ category: "README", message: `Action "Demo" not mentioned in README.md` }]);
    });

    it("should report mismatched versions", () => {
      writeValidProject();
      writeFile("package.json", JSON.stringify({ version: "2.1.0" }));

      const errors = validate(root);
      expect(errors).toHaveLength(1);
      expect(errors[0].category).toBe("Version");
    });
  });
});
