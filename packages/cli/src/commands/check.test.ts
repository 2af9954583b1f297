/**
 * Tests for assertlint check
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { resolveConfig } from "../config.js";
import type { CliOptions } from "../types.js";
import { checkCommand } from "./check.js";

const SUITE_SOURCE = [
  "declare function Test(): MethodDecorator;",
  "declare function assertValid(value: unknown): void;",
  "export class UserSuite {",
  "  @Test()",
  "  validates(): void {",
  "    assertValid(1);",
  "  }",
  "  @Test()",
  "  forgetsToAssert(): void {}",
  "}",
  "",
].join("\n");

describe("Check Command", () => {
  let tempDir = "";

  const configFor = (options: CliOptions = {}, paths: string[] = []) =>
    resolveConfig({ sourceRoot: "test" }, options, tempDir, paths, tempDir);

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "assertlint-check-"));
    fs.mkdirSync(path.join(tempDir, "test"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should report tests without assertions", () => {
    const suitePath = path.join(tempDir, "test", "user.test.ts");
    fs.writeFileSync(suitePath, SUITE_SOURCE);

    const result = checkCommand(configFor());

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.files).to.deep.equal([suitePath]);
    expect(result.value.findings).to.equal(1);
    expect(result.value.errors).to.equal(1);
    expect(result.value.warnings).to.equal(0);
    const [finding] = result.value.diagnostics;
    expect(finding?.location?.file).to.equal(suitePath);
    expect(finding?.location?.line).to.equal(9);
    expect(finding?.location?.column).to.equal(3);
  });

  it("should check only the files given", () => {
    const suitePath = path.join(tempDir, "test", "user.test.ts");
    const cleanPath = path.join(tempDir, "test", "clean.test.ts");
    fs.writeFileSync(suitePath, SUITE_SOURCE);
    fs.writeFileSync(cleanPath, "export const value = 1;\n");

    const result = checkCommand(configFor({}, ["test/clean.test.ts"]));

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.files).to.deep.equal([cleanPath]);
    expect(result.value.diagnostics).to.deep.equal([]);
  });

  it("should count configuration warnings", () => {
    fs.writeFileSync(
      path.join(tempDir, "test", "user.test.ts"),
      SUITE_SOURCE
    );

    const result = checkCommand(
      configFor({ customAssertionMethods: "Broken" })
    );

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.warnings).to.equal(1);
    expect(result.value.diagnostics[0]?.code).to.equal("ASL2001");
  });

  it("should succeed with no sources", () => {
    const result = checkCommand(configFor());

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.files).to.deep.equal([]);
    expect(result.value.errors).to.equal(0);
  });

  it("should fail on files that do not parse", () => {
    fs.writeFileSync(path.join(tempDir, "test", "broken.test.ts"), "class {");

    const result = checkCommand(configFor());

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.message).to.equal("Failed to load source files");
    expect(result.error.diagnostics[0]?.code).to.equal("ASL9002");
  });
});
