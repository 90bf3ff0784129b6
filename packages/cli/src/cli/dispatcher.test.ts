/**
 * Tests for CLI command dispatch and exit codes
 */

import { describe, it, after, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import { existsSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { runCli } from "./dispatcher.js";

describe("CLI Dispatcher", () => {
  const root = mkdtempSync(join(tmpdir(), "shapegen-cli-"));
  const output: string[] = [];
  const errors: string[] = [];
  const originalLog = console.log;
  const originalError = console.error;

  beforeEach(() => {
    output.length = 0;
    errors.length = 0;
    console.log = (...args: unknown[]) => {
      output.push(args.map(String).join(" "));
    };
    console.error = (...args: unknown[]) => {
      errors.push(args.map(String).join(" "));
    };
  });

  afterEach(() => {
    console.log = originalLog;
    console.error = originalError;
  });

  after(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("should list derivations", async () => {
    const code = await runCli(["list"], root);

    expect(code).to.equal(0);
    expect(output).to.deep.equal(["toJson", "ofJson", "json", "Encoded", "example"]);
  });

  it("should exit with a usage error for an unknown command", async () => {
    const code = await runCli(["frobnicate"], root);

    expect(code).to.equal(2);
    expect(errors[0]).to.equal("Error: Unknown command 'frobnicate'");
  });

  it("should exit with a usage error for an unknown option", async () => {
    expect(await runCli(["generate", "--watch"], root)).to.equal(2);
  });

  it("should exit with a config error for a missing config file", async () => {
    const code = await runCli(["list", "-c", "nope.json"], root);

    expect(code).to.equal(3);
    expect(errors[0]).to.equal(
      `Error: Config file not found: ${join(root, "nope.json")}`
    );
  });

  it("should generate into the configured output directory", async () => {
    writeFileSync(join(root, "shapegen.json"), JSON.stringify({ outDir: "out" }));
    writeFileSync(
      join(root, "modes.ts"),
      '/** @deriving json */\nexport type Mode = "on" | "off";'
    );

    const code = await runCli(["generate", "modes.ts"], root);

    expect(code).to.equal(0);
    expect(existsSync(join(root, "out", "modes.derived.ts"))).to.equal(true);
    expect(output).to.deep.equal([`✓ ${join(root, "out", "modes.derived.ts")}`]);
  });

  it("should exit with the diagnostics code when a request fails", async () => {
    writeFileSync(
      join(root, "bad.ts"),
      '/** @deriving yaml */\nexport type Mode = "on";'
    );

    const code = await runCli(["generate", "bad.ts", "-q"], root);

    expect(code).to.equal(1);
    expect(output).to.deep.equal([]);
    expect(errors[0]).to.match(/error SG1002: Unknown derivation 'yaml'/);
  });
});
