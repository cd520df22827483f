/**
 * Plugin consistency validator.
 *
 * Checks that actions, manifest entries, PI files and their settings,
 * icons, tests, plugin registrations, and README documentation are in sync.
 *
 * Run via:  npm run validate:consistency
 *
 * @author Pedro Fuentes <git@pedrofuent.es>
 * @copyright Pedro Pablo Fuentes Schuster
 * @license MIT
 */
import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

// ── Paths ──────────────────────────────────────────────────────────────────

export const ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
export const PLUGIN_DIR_NAME = "com.scrollinglabel.deck.sdPlugin";

// ── Types ──────────────────────────────────────────────────────────────────

interface ManifestAction {
  UUID: string;
  Name: string;
  Icon: string;
  PropertyInspectorPath?: string;
  States: { ShowTitle: boolean; Image: string }[];
  UserTitleEnabled: boolean;
  Tooltip?: string;
}

interface Manifest {
  Actions: ManifestAction[];
  Version: string;
  [key: string]: unknown;
}

export interface ValidationError {
  category: string;
  message: string;
}

// ── Helpers ────────────────────────────────────────────────────────────────

function fileExists(filePath: string): boolean {
  return fs.existsSync(filePath);
}

function readText(filePath: string): string {
  return fs.readFileSync(filePath, "utf-8");
}

function listFiles(dir: string, ext: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs.readdirSync(dir).filter((f) => f.endsWith(ext));
}

function isManifest(value: unknown): value is Manifest {
  return typeof value === "object" && value !== null && "Actions" in value && Array.isArray(value.Actions);
}

/**
 * Names of the `setting="…"` attributes in a PI file, split by scope.
 */
export function readPiSettings(html: string): { action: string[]; global: string[] } {
  const action: string[] = [];
  const global: string[] = [];
  for (const match of html.matchAll(/<sdpi-[a-z]+\b([^>]*)>/g)) {
    const attrs = match[1];
    const name = attrs.match(/\bsetting="([^"]+)"/)?.[1];
    if (!name) continue;
    (/\bglobal="true"/.test(attrs) ? global : action).push(name);
  }
  return { action, global };
}

/**
 * Optional fields of the `…Settings` type declared in an action source file.
 */
export function readSettingsFields(source: string): string[] {
  const body = source.match(/export type \w+Settings = \{([\s\S]*?)\n\};/)?.[1] ?? "";
  return [...body.matchAll(/^\s+(\w+)\?:/gm)].map((m) => m[1]);
}

// ── Validators ─────────────────────────────────────────────────────────────

export function validate(root: string = ROOT): ValidationError[] {
  const errors: ValidationError[] = [];

  const srcActions = path.join(root, "src", "actions");
  const pluginDir = path.join(root, PLUGIN_DIR_NAME);
  const manifestPath = path.join(pluginDir, "manifest.json");
  const testsDir = path.join(root, "tests", "actions");
  const pluginTs = path.join(root, "src", "plugin.ts");
  const readmePath = path.join(root, "README.md");

  // ── 1. Manifest exists and parses ────────────────────────────────────
  if (!fileExists(manifestPath)) {
    errors.push({
      category: "Manifest",
      message: `manifest.json not found at ${manifestPath}`,
    });
    return errors; // Can't continue without manifest
  }

  let manifest: Manifest;
  try {
    const parsed: unknown = JSON.parse(readText(manifestPath));
    if (!isManifest(parsed)) {
      errors.push({ category: "Manifest", message: "manifest.json has no Actions array" });
      return errors;
    }
    manifest = parsed;
  } catch {
    errors.push({
      category: "Manifest",
      message: "manifest.json is not valid JSON",
    });
    return errors;
  }

  const manifestActions = manifest.Actions;

  // ── 2. Source action files ───────────────────────────────────────────
  const srcActionFiles = listFiles(srcActions, ".ts").filter((f) => !f.endsWith(".test.ts"));

  // ── 3. Plugin.ts registrations ───────────────────────────────────────
  const pluginSource = fileExists(pluginTs) ? readText(pluginTs) : "";

  // ── 4. Each manifest action must have required fields ────────────────
  for (const action of manifestActions) {
    const label = action.Name ?? action.UUID;

    if (action.States?.[0]?.ShowTitle !== false) {
      errors.push({
        category: "Manifest",
        message: `Action "${label}": States[0].ShowTitle must be false (found ${action.States?.[0]?.ShowTitle})`,
      });
    }

    if (action.UserTitleEnabled !== false) {
      errors.push({
        category: "Manifest",
        message: `Action "${label}": UserTitleEnabled must be false at Action level (found ${action.UserTitleEnabled})`,
      });
    }

    if (action.PropertyInspectorPath) {
      const piPath = path.join(pluginDir, action.PropertyInspectorPath);
      if (!fileExists(piPath)) {
        errors.push({
          category: "PI",
          message: `Action "${label}": PI file missing: ${action.PropertyInspectorPath}`,
        });
      }
    } else {
      errors.push({
        category: "PI",
        message: `Action "${label}": No PropertyInspectorPath defined in manifest`,
      });
    }

    const iconBase = path.join(pluginDir, action.Icon);
    if (!fileExists(iconBase + ".svg") && !fileExists(iconBase + ".png")) {
      errors.push({
        category: "Icons",
        message: `Action "${label}": Icon not found: expected ${action.Icon}.svg or .png`,
      });
    }

    const stateImage = action.States?.[0]?.Image;
    if (stateImage) {
      const stateImgBase = path.join(pluginDir, stateImage);
      if (!fileExists(stateImgBase + ".svg") && !fileExists(stateImgBase + ".png")) {
        errors.push({
          category: "Icons",
          message: `Action "${label}": State image not found: expected ${stateImage}.svg or .png`,
        });
      }
    }
  }

  // ── 5. Every src action must be in manifest ──────────────────────────
  for (const file of srcActionFiles) {
    const srcContent = readText(path.join(srcActions, file));
    const uuid = srcContent.match(/@action\(\{\s*UUID:\s*"([^"]+)"\s*\}\)/)?.[1];
    if (!uuid) continue; // Not an action file

    if (!manifestActions.some((a) => a.UUID === uuid)) {
      errors.push({
        category: "Manifest",
        message: `Source action "${file}" (UUID: ${uuid}) not found in manifest.json`,
      });
    }
  }

  // ── 6. Every manifest action must be registered in plugin.ts ─────────
  for (const action of manifestActions) {
    const matchingSrc = srcActionFiles.find((f) =>
      readText(path.join(srcActions, f)).includes(`UUID: "${action.UUID}"`),
    );

    if (!matchingSrc) {
      errors.push({
        category: "Source",
        message: `Manifest action "${action.Name}" (UUID: ${action.UUID}): no matching source file in src/actions/`,
      });
      continue;
    }

    const importBase = matchingSrc.replace(/\.ts$/, "");
    if (!pluginSource.includes(`./actions/${importBase}`)) {
      errors.push({
        category: "Registration",
        message: `Action "${action.Name}": not imported in plugin.ts`,
      });
    }
    if (!pluginSource.includes("registerAction")) {
      errors.push({
        category: "Registration",
        message: `plugin.ts does not call registerAction; no actions are registered`,
      });
    }

    // ── 7. PI settings must exist on the action's settings type ────────
    if (action.PropertyInspectorPath) {
      const piPath = path.join(pluginDir, action.PropertyInspectorPath);
      if (fileExists(piPath)) {
        const piSettings = readPiSettings(readText(piPath));
        const fields = readSettingsFields(readText(path.join(srcActions, matchingSrc)));
        for (const name of piSettings.action) {
          if (!fields.includes(name)) {
            errors.push({
              category: "Settings",
              message: `${action.PropertyInspectorPath}: setting "${name}" is not a field of the action's settings type`,
            });
          }
        }
        for (const name of piSettings.global) {
          if (!pluginSource.includes(name)) {
            errors.push({
              category: "Settings",
              message: `${action.PropertyInspectorPath}: global setting "${name}" is never read in plugin.ts`,
            });
          }
        }
      }
    }
  }

  // ── 8. Every src action must have a test file ────────────────────────
  for (const file of srcActionFiles) {
    if (!readText(path.join(srcActions, file)).includes("@action(")) continue;

    const testFile = file.replace(/\.ts$/, ".test.ts");
    if (!fileExists(path.join(testsDir, testFile))) {
      errors.push({
        category: "Tests",
        message: `Action "${file}": test file missing: expected tests/actions/${testFile}`,
      });
    }
  }

  // ── 9. README mentions every manifest action ─────────────────────────
  const readme = fileExists(readmePath) ? readText(readmePath) : "";
  for (const action of manifestActions) {
    if (!readme.includes(action.Name)) {
      errors.push({
        category: "README",
        message: `Action "${action.Name}" not mentioned in README.md`,
      });
    }
  }

  // ── 10. package.json and manifest.json versions are in sync ──────────
  try {
    const pkg: unknown = JSON.parse(readText(path.join(root, "package.json")));
    const pkgVersion =
      typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
        ? pkg.version
        : "";
    const manifestVersion = manifest.Version ?? "";
    // manifest uses x.y.z.0 format; package.json uses x.y.z
    const manifestBase = manifestVersion.replace(/\.0$/, "");
    if (pkgVersion !== manifestBase) {
      errors.push({
        category: "Version",
        message: `Version mismatch: package.json="${pkgVersion}" manifest.json="${manifestVersion}" (expected ${pkgVersion}.0)`,
      });
    }
  } catch {
    errors.push({ category: "Version", message: "Cannot read package.json" });
  }

  return errors;
}

// ── CLI runner ─────────────────────────────────────────────────────────────

if (
  process.argv[1] &&
  (process.argv[1].endsWith("validate-consistency.ts") || process.argv[1].endsWith("validate-consistency.js"))
) {
  const errors = validate();
  if (errors.length === 0) {
    console.log("✅ Plugin consistency check passed: all files are in sync.");
    process.exit(0);
  } else {
    console.error(`❌ Plugin consistency check failed: ${errors.length} error(s):\n`);
    for (const e of errors) {
      console.error(`  [${e.category}] ${e.message}`);
    }
    process.exit(1);
  }
}
