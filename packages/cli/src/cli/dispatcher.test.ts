/**
 * Tests for the CLI dispatcher
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import { mkdtempSync, writeFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { runCli } from "./dispatcher.js";
import { SHOP_CATALOG } from "../test-context.js";

describe("runCli", () => {
  let dir = "";
  let stdout: string[] = [];
  let stderr: string[] = [];
  const originalLog = console.log;
  const originalError = console.error;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "clrcall-cli-"));
    stdout = [];
    stderr = [];
    console.log = (...parts: unknown[]) => {
      stdout.push(parts.map(String).join(" "));
    };
    console.error = (...parts: unknown[]) => {
      stderr.push(parts.map(String).join(" "));
    };
  });

  afterEach(() => {
    console.log = originalLog;
    console.error = originalError;
    rmSync(dir, { recursive: true, force: true });
  });

  it("should reject unknown commands", async () => {
    expect(await runCli(["frobnicate"], dir)).to.equal(2);
    expect(stderr).to.deep.equal([
      "Error: Unknown command 'frobnicate'",
      "Run 'clrcall --help' for usage information",
    ]);
  });

  it("should report option errors before loading anything", async () => {
    expect(await runCli(["members", "Math", "--style", "fancy"], dir)).to.equal(2);
    expect(stderr).to.deep.equal([
      "Error: Invalid style 'fancy': expected one of full, simple, paramBlock",
    ]);
  });

  it("should print usage when arguments are missing", async () => {
    expect(await runCli(["assignable", "int"], dir)).to.equal(2);
    expect(stderr).to.deep.equal([
      "Error: missing arguments",
      "Usage: clrcall assignable <concrete> <generic>",
    ]);
  });

  it("should list types from a --catalog file", async () => {
    expect(await runCli(["types", "Shop.*", "--catalog", SHOP_CATALOG], dir)).to.equal(0);
    expect(stdout).to.deep.equal(["class     Shop.Item", "class     Shop.Pricing"]);
  });

  it("should read catalogs and aliases from clrcall.json", async () => {
    writeFileSync(
      join(dir, "clrcall.json"),
      JSON.stringify({ catalogs: [SHOP_CATALOG], aliases: { pricing: "Shop.Pricing" } })
    );
    expect(
      await runCli(["call", "pricing", "Discount", "--answer", "2", "--input", "SAVE"], dir)
    ).to.equal(0);
    expect(stdout).to.deep.equal(["discount code SAVE"]);
    expect(stderr[0]?.startsWith("info CLR1003: 2 overloads of 'Discount' match")).to.equal(true);
  });

  it("should keep warnings quiet with -q", async () => {
    expect(
      await runCli(["members", "Shop.Pricing", "new", "-q", "--catalog", SHOP_CATALOG], dir)
    ).to.equal(0);
    expect(stdout).to.deep.equal([]);
    expect(stderr).to.deep.equal([]);
  });

  it("should fail on an invalid config file", async () => {
    writeFileSync(join(dir, "clrcall.json"), JSON.stringify({ catalogs: "shop.yaml" }));
    expect(await runCli(["types"], dir)).to.equal(1);
    expect(stderr).to.deep.equal([
      "Error: clrcall.json: 'catalogs' must be an array of strings",
    ]);
  });

  it("should fail when a catalog cannot be loaded", async () => {
    expect(await runCli(["types", "--catalog", "missing.txt"], dir)).to.equal(3);
    expect(stderr).to.deep.equal([
      `Error: Unsupported catalog file '${join(dir, "missing.txt")}': expected .yaml, .yml, .json, .js or .ts`,
    ]);
  });
});
