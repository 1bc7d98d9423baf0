/**
 * Tests for CLI argument parser
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parseArgs } from "./parser.js";

describe("CLI Parser", () => {
  describe("parseArgs", () => {
    describe("Commands", () => {
      it("should parse the command and its positionals", () => {
        const result = parseArgs(["members", "Demo.Processor", "Proc*"]);
        expect(result.command).to.equal("members");
        expect(result.positionals).to.deep.equal(["Demo.Processor", "Proc*"]);
      });

      it("should parse help command from --help", () => {
        const result = parseArgs(["--help"]);
        expect(result.command).to.equal("help");
      });

      it("should parse help command from -h after other arguments", () => {
        const result = parseArgs(["call", "Math", "-h"]);
        expect(result.command).to.equal("help");
        expect(result.positionals).to.deep.equal([]);
      });

      it("should parse version command from -v", () => {
        const result = parseArgs(["-v"]);
        expect(result.command).to.equal("version");
      });

      it("should handle empty args array", () => {
        const result = parseArgs([]);
        expect(result.command).to.equal("");
        expect(result.positionals).to.deep.equal([]);
        expect(result.options).to.deep.equal({});
        expect(result.errors).to.deep.equal([]);
      });
    });

    describe("Arguments", () => {
      it("should keep negative numbers as positionals", () => {
        const result = parseArgs(["call", "Math", "Abs", "-2.5"]);
        expect(result.positionals).to.deep.equal(["Math", "Abs", "-2.5"]);
        expect(result.errors).to.deep.equal([]);
      });

      it("should treat everything after -- as positional", () => {
        const result = parseArgs(["call", "string", "Concat", "--", "--verbose", "-x"]);
        expect(result.positionals).to.deep.equal(["string", "Concat", "--verbose", "-x"]);
        expect(result.options.verbose).to.be.undefined;
      });
    });

    describe("Options", () => {
      it("should parse -V and -q", () => {
        const result = parseArgs(["types", "-V", "-q"]);
        expect(result.options.verbose).to.be.true;
        expect(result.options.quiet).to.be.true;
      });

      it("should parse -c short option for config", () => {
        const result = parseArgs(["types", "-c", "custom.json"]);
        expect(result.options.config).to.equal("custom.json");
      });

      it("should collect repeated --catalog options", () => {
        const result = parseArgs(["types", "--catalog", "a.yaml", "--catalog", "b.ts"]);
        expect(result.options.catalogs).to.deep.equal(["a.yaml", "b.ts"]);
      });

      it("should parse member listing flags", () => {
        const result = parseArgs([
          "members",
          "List<int>",
          "--style",
          "full",
          "-g",
          "int",
          "--attribute",
          "Obsolete",
          "--force",
          "--non-public",
          "--static",
          "--instance",
          "--no-warn",
        ]);
        expect(result.options).to.deep.equal({
          style: "full",
          genericArgs: ["int"],
          attribute: "Obsolete",
          force: true,
          nonPublic: true,
          static: true,
          instance: true,
          noWarn: true,
        });
      });

      it("should reject an unknown signature style", () => {
        const result = parseArgs(["members", "Math", "--style", "fancy"]);
        expect(result.options.style).to.be.undefined;
        expect(result.errors).to.deep.equal([
          "Invalid style 'fancy': expected one of full, simple, paramBlock",
        ]);
      });

      it("should parse --strict", () => {
        const result = parseArgs(["assignable", "List<int>", "IEnumerable`1", "--strict"]);
        expect(result.options.strict).to.be.true;
        expect(result.positionals).to.deep.equal(["List<int>", "IEnumerable`1"]);
      });

      it("should parse call replay options", () => {
        const result = parseArgs([
          "call",
          "Demo.Circle",
          "Area",
          "--new",
          "2",
          "--answer",
          "2",
          "--answer",
          "1,3",
          "--input",
          "hello",
        ]);
        expect(result.options.newArgs).to.deep.equal(["2"]);
        expect(result.options.answers).to.deep.equal([[1], [0, 2]]);
        expect(result.options.inputs).to.deep.equal(["hello"]);
      });

      it("should take a bare --new as construction without arguments", () => {
        const result = parseArgs(["call", "List<int>", "get_Count", "--new", "--force"]);
        expect(result.options.newArgs).to.deep.equal([]);
        expect(result.options.force).to.be.true;
      });

      it("should take an empty answer as choosing nothing", () => {
        const result = parseArgs(["call", "Math", "Max", "--answer", ""]);
        expect(result.options.answers).to.deep.equal([[]]);
      });

      it("should report bad answers and unknown options", () => {
        const result = parseArgs(["call", "Math", "Max", "--answer", "0", "--frobnicate"]);
        expect(result.errors).to.deep.equal([
          "Invalid answer '0': expected option numbers such as 2 or 1,3",
          "Unknown option '--frobnicate'",
        ]);
      });
    });
  });
});
