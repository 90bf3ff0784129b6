/**
 * Tests for program creation
 */

import { describe, it, after } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { createProgram, createSourceProgram } from "./creation.js";

describe("Program Creation", () => {
  const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "shapegen-program-"));

  after(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should create a program over files on disk in the given order", () => {
    const a = path.join(tempDir, "a.ts");
    const b = path.join(tempDir, "b.ts");
    fs.writeFileSync(a, 'import type { B } from "./b.js";\nexport type A = [B];\n');
    fs.writeFileSync(b, 'export type B = "b";\n');

    const result = createProgram([b, a]);

    expect(result.ok).to.equal(true);
    if (result.ok) {
      expect(result.value.sourceFiles.map((sf) => sf.fileName)).to.deep.equal([
        b,
        a,
      ]);
    }
  });

  it("should report a missing file", () => {
    const missing = path.join(tempDir, "missing.ts");

    const result = createProgram([missing]);

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error.diagnostics.map((d) => [d.code, d.message])).to.deep.equal([
        ["SG9001", `Cannot read file ${missing}`],
      ]);
    }
  });

  it("should report syntax errors", () => {
    const result = createSourceProgram("export type A = ;");

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      const [diagnostic] = result.error.diagnostics;
      expect(diagnostic?.code).to.equal("SG9003");
      expect(diagnostic?.location?.file).to.equal("/input.ts");
    }
  });

  it("should not report names it cannot resolve", () => {
    const result = createSourceProgram("export type A = [Elsewhere];");

    expect(result.ok).to.equal(true);
    if (result.ok) {
      expect(result.value.sourceFiles).to.have.length(1);
    }
  });
});
