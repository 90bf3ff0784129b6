/**
 * Tests for CLI argument parser
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parseArgs } from "./parser.js";

describe("CLI Parser", () => {
  describe("parseArgs", () => {
    describe("Commands", () => {
      it("should parse generate command", () => {
        const result = parseArgs(["generate"]);
        expect(result.command).to.equal("generate");
        expect(result.files).to.deep.equal([]);
      });

      it("should parse help command from --help", () => {
        expect(parseArgs(["--help"]).command).to.equal("help");
        expect(parseArgs(["generate", "-h"]).command).to.equal("help");
      });

      it("should parse version command from -v", () => {
        expect(parseArgs(["-v"]).command).to.equal("version");
      });

      it("should leave the command empty without arguments", () => {
        expect(parseArgs([]).command).to.equal("");
      });
    });

    describe("Files", () => {
      it("should collect every positional argument after the command", () => {
        const result = parseArgs(["generate", "a.ts", "src/b.ts"]);
        expect(result.files).to.deep.equal(["a.ts", "src/b.ts"]);
      });

      it("should collect files around options", () => {
        const result = parseArgs(["generate", "a.ts", "-V", "b.ts"]);
        expect(result.files).to.deep.equal(["a.ts", "b.ts"]);
        expect(result.options.verbose).to.equal(true);
      });
    });

    describe("Options", () => {
      it("should parse options with values", () => {
        const result = parseArgs([
          "generate",
          "-c",
          "conf/shapegen.json",
          "--out",
          "derived",
          "--suffix",
          ".gen.ts",
          "--decoder",
          "match",
        ]);
        expect(result.options).to.deep.equal({
          config: "conf/shapegen.json",
          out: "derived",
          suffix: ".gen.ts",
          decoder: "match",
        });
      });

      it("should parse -q short option for quiet", () => {
        expect(parseArgs(["list", "-q"]).options.quiet).to.equal(true);
      });

      it("should report an option missing its value", () => {
        expect(parseArgs(["generate", "--out"]).error).to.equal(
          "--out requires a value"
        );
        expect(parseArgs(["generate", "-o", "-V"]).error).to.equal(
          "-o requires a value"
        );
      });

      it("should report an unknown option", () => {
        expect(parseArgs(["generate", "--watch"]).error).to.equal(
          "Unknown option '--watch'"
        );
      });
    });
  });
});
