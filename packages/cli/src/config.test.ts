/**
 * Tests for configuration loading and resolution
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { findConfig, loadConfig, resolveConfig, validateConfig } from "./config.js";

const withTempDir = <T>(run: (dir: string) => T): T => {
  const dir = mkdtempSync(join(tmpdir(), "clrcall-config-"));
  try {
    return run(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
};

describe("Config", () => {
  describe("validateConfig", () => {
    it("should accept a complete config", () => {
      const result = validateConfig({
        catalogs: ["shop.yaml"],
        aliases: { item: "Shop.Item" },
        maxRebindAttempts: 5,
      });
      expect(result).to.deep.equal({
        ok: true,
        value: {
          catalogs: ["shop.yaml"],
          aliases: { item: "Shop.Item" },
          maxRebindAttempts: 5,
        },
      });
    });

    it("should reject non-string catalogs", () => {
      const result = validateConfig({ catalogs: ["a.yaml", 3] });
      expect(result).to.deep.equal({
        ok: false,
        error: "clrcall.json: 'catalogs' must be an array of strings",
      });
    });

    it("should reject aliases that are not strings", () => {
      const result = validateConfig({ aliases: { item: 1 } });
      expect(result.ok).to.equal(false);
    });

    it("should reject a zero rebind limit", () => {
      const result = validateConfig({ maxRebindAttempts: 0 });
      expect(result).to.deep.equal({
        ok: false,
        error: "clrcall.json: 'maxRebindAttempts' must be a positive integer",
      });
    });

    it("should reject arrays", () => {
      expect(validateConfig([]).ok).to.equal(false);
    });
  });

  describe("loadConfig", () => {
    it("should load and validate a config file", () => {
      withTempDir((dir) => {
        const path = join(dir, "clrcall.json");
        writeFileSync(path, JSON.stringify({ catalogs: ["shop.yaml"] }));
        const result = loadConfig(path);
        expect(result.ok && result.value.catalogs).to.deep.equal(["shop.yaml"]);
      });
    });

    it("should report a missing file", () => {
      const result = loadConfig("/nonexistent/clrcall.json");
      expect(result).to.deep.equal({
        ok: false,
        error: "Config file not found: /nonexistent/clrcall.json",
      });
    });

    it("should report invalid JSON", () => {
      withTempDir((dir) => {
        const path = join(dir, "clrcall.json");
        writeFileSync(path, "{ not json");
        const result = loadConfig(path);
        expect(result.ok).to.equal(false);
        if (!result.ok) {
          expect(result.error.startsWith("Failed to parse clrcall.json: ")).to.equal(true);
        }
      });
    });
  });

  describe("findConfig", () => {
    it("should walk up to the nearest config", () => {
      withTempDir((dir) => {
        const nested = join(dir, "a", "b");
        mkdirSync(nested, { recursive: true });
        writeFileSync(join(dir, "clrcall.json"), "{}");
        expect(findConfig(nested)).to.equal(join(dir, "clrcall.json"));
      });
    });
  });

  describe("resolveConfig", () => {
    it("should resolve file catalogs against the project root", () => {
      const result = resolveConfig(
        { catalogs: ["catalogs/shop.yaml", "/abs/core.yaml"] },
        {},
        "/project",
        "/work"
      );
      expect(result.catalogs).to.deep.equal([
        "/project/catalogs/shop.yaml",
        "/abs/core.yaml",
      ]);
    });

    it("should append --catalog paths relative to the working directory", () => {
      const result = resolveConfig(
        { catalogs: ["shop.yaml"] },
        { catalogs: ["extra.yaml", "../project/shop.yaml"] },
        "/project",
        "/work"
      );
      expect(result.catalogs).to.deep.equal([
        "/project/shop.yaml",
        "/work/extra.yaml",
      ]);
    });

    it("should default flags and carry aliases", () => {
      const result = resolveConfig({ aliases: { item: "Shop.Item" } }, { verbose: true });
      expect(result.verbose).to.equal(true);
      expect(result.quiet).to.equal(false);
      expect(result.aliases).to.deep.equal({ item: "Shop.Item" });
      expect(result.maxRebindAttempts).to.equal(undefined);
    });
  });
});
