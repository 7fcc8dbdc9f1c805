/**
 * CLI constants
 */

import { createRequire } from "node:module";

const require = createRequire(import.meta.url);

const readVersion = (): string => {
  let manifest: unknown;
  try {
    manifest = require("../../package.json");
  } catch {
    // Built output has no package.json two levels up
    return "0.0.0";
  }
  return typeof manifest === "object" &&
    manifest !== null &&
    "version" in manifest &&
    typeof manifest.version === "string"
    ? manifest.version
    : "0.0.0";
};

export const VERSION = readVersion();
