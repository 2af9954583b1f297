/**
 * Tests for configuration loading
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  CONFIG_FILE_NAME,
  findConfig,
  loadConfig,
  parseConfig,
  resolveConfig,
} from "./config.js";

describe("Config", () => {
  describe("parseConfig", () => {
    it("should accept known string fields", () => {
      const result = parseConfig({
        sourceRoot: "test",
        customAssertionMethods: "Helper#verify",
      });
      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value).to.deep.equal({
        sourceRoot: "test",
        customAssertionMethods: "Helper#verify",
      });
    });

    it("should reject non-objects", () => {
      const result = parseConfig(["test"]);
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error).to.equal(
        "assertlint.json must contain a JSON object"
      );
    });

    it("should reject unknown fields", () => {
      const result = parseConfig({ sourceRoots: "test" });
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error).to.equal(
        "Unknown field 'sourceRoots' in assertlint.json"
      );
    });

    it("should reject non-string values", () => {
      const result = parseConfig({ testDecorator: 42 });
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error).to.equal(
        "Field 'testDecorator' in assertlint.json must be a string"
      );
    });
  });

  describe("loadConfig and findConfig", () => {
    let tempDir = "";

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "assertlint-config-"));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it("should load a config file", () => {
      const configPath = path.join(tempDir, CONFIG_FILE_NAME);
      fs.writeFileSync(configPath, JSON.stringify({ testDecorator: "It" }));

      const result = loadConfig(configPath);
      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value).to.deep.equal({ testDecorator: "It" });
    });

    it("should report missing files", () => {
      const configPath = path.join(tempDir, CONFIG_FILE_NAME);
      const result = loadConfig(configPath);
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error).to.equal(`Config file not found: ${configPath}`);
    });

    it("should report invalid JSON", () => {
      const configPath = path.join(tempDir, CONFIG_FILE_NAME);
      fs.writeFileSync(configPath, "{ not json");

      const result = loadConfig(configPath);
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error).to.match(/^Failed to parse assertlint\.json: /);
    });

    it("should find the config in a parent directory", () => {
      const configPath = path.join(tempDir, CONFIG_FILE_NAME);
      fs.writeFileSync(configPath, "{}");
      const nested = path.join(tempDir, "test", "unit");
      fs.mkdirSync(nested, { recursive: true });

      expect(findConfig(nested)).to.equal(configPath);
    });
  });

  describe("resolveConfig", () => {
    const root = path.resolve("/work/project");

    it("should apply defaults", () => {
      const config = resolveConfig({}, {}, root, [], root);
      expect(config).to.deep.equal({
        projectRoot: root,
        sourceRoot: root,
        paths: [],
        customAssertionMethods: "",
        testDecorator: "Test",
        testBaseType: "TestCase",
        expectedExceptionKey: "expected",
        verbose: false,
        quiet: false,
      });
    });

    it("should resolve the source root against the project root", () => {
      const config = resolveConfig({ sourceRoot: "test" }, {}, root, [], "/elsewhere");
      expect(config.sourceRoot).to.equal(path.join(root, "test"));
    });

    it("should prefer CLI options over file values", () => {
      const config = resolveConfig(
        { sourceRoot: "test", testDecorator: "Spec", customAssertionMethods: "A#b" },
        { src: "spec", testDecorator: "It", quiet: true },
        root,
        ["a.test.ts"],
        path.join(root, "packages")
      );
      expect(config.sourceRoot).to.equal(path.join(root, "packages", "spec"));
      expect(config.testDecorator).to.equal("It");
      expect(config.customAssertionMethods).to.equal("A#b");
      expect(config.paths).to.deep.equal([
        path.join(root, "packages", "a.test.ts"),
      ]);
      expect(config.quiet).to.equal(true);
    });
  });
});
