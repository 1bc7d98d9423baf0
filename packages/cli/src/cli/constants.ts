/**
 * CLI constants
 */

import { createRequire } from "node:module";

const require = createRequire(import.meta.url);

const readVersion = (): string => {
  let manifest: unknown;
  try {
    manifest = require("../../package.json");
  } catch (error) {
    // Compiled output sits under dist/ without the package manifest
    if (error instanceof Error && "code" in error && error.code === "MODULE_NOT_FOUND") {
      return "0.0.0";
    }
    throw error;
  }
  return typeof manifest === "object" &&
    manifest !== null &&
    "version" in manifest &&
    typeof manifest.version === "string"
    ? manifest.version
    : "0.0.0";
};

export const VERSION = readVersion();
