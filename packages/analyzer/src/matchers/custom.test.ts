/**
 * Tests for the custom assertion method compiler
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import type { TypeRef } from "@assertlint/frontend";
import { compileCustomMatchers, parseCustomMatcher } from "./custom.js";
import { anyMatch } from "./call-matcher.js";
import { createFakeResolver } from "../test-harness.js";

describe("Custom Matchers", () => {
  describe("parseCustomMatcher", () => {
    it("should parse an exact method", () => {
      expect(parseCustomMatcher("com.example.Helper#verifyAll")).to.deep.equal({
        type: { kind: "exact", name: "com.example.Helper" },
        name: { kind: "exact", name: "verifyAll" },
        parameters: "any",
      });
    });

    it("should turn a trailing * into a prefix", () => {
      expect(
        parseCustomMatcher("com.example.Helper#checkSomething*")
      ).to.deep.equal({
        type: { kind: "exact", name: "com.example.Helper" },
        name: { kind: "prefix", prefix: "checkSomething" },
        parameters: "any",
      });
    });

    it("should trim both parts", () => {
      expect(parseCustomMatcher("  Verifier # ensure ")).to.deep.equal({
        type: { kind: "exact", name: "Verifier" },
        name: { kind: "exact", name: "ensure" },
        parameters: "any",
      });
    });

    it("should reject entries without exactly two non-empty parts", () => {
      expect(parseCustomMatcher("com.example.Helper")).to.equal(undefined);
      expect(parseCustomMatcher("#verify")).to.equal(undefined);
      expect(parseCustomMatcher("Helper#")).to.equal(undefined);
      expect(parseCustomMatcher("Helper# ")).to.equal(undefined);
      expect(parseCustomMatcher("a#b#c")).to.equal(undefined);
      expect(parseCustomMatcher("a##c")).to.equal(undefined);
    });

    it("should ignore trailing empty parts", () => {
      expect(parseCustomMatcher("Verifier#ensure##")).to.deep.equal({
        type: { kind: "exact", name: "Verifier" },
        name: { kind: "exact", name: "ensure" },
        parameters: "any",
      });
      expect(parseCustomMatcher("Verifier##")).to.equal(undefined);
      expect(parseCustomMatcher("Verifier#ensure# ")).to.equal(undefined);
    });
  });

  describe("compileCustomMatchers", () => {
    it("should produce an empty set for an empty setting", () => {
      const compiled = compileCustomMatchers("");
      expect(compiled.matchers).to.deep.equal([]);
      expect(compiled.diagnostics.diagnostics).to.deep.equal([]);
    });

    it("should skip blank entries silently", () => {
      const compiled = compileCustomMatchers(" , Verifier#ensure,,");
      expect(compiled.matchers).to.have.length(1);
      expect(compiled.diagnostics.diagnostics).to.deep.equal([]);
    });

    it("should drop malformed entries with a warning and keep the rest", () => {
      const compiled = compileCustomMatchers(
        "com.example.Helper, com.example.Helper#checkSomething*"
      );

      expect(compiled.matchers).to.have.length(1);
      expect(compiled.diagnostics.hasErrors).to.equal(false);
      expect(compiled.diagnostics.diagnostics).to.have.length(1);
      const [warning] = compiled.diagnostics.diagnostics;
      expect(warning?.code).to.equal("ASL2001");
      expect(warning?.severity).to.equal("warning");
      expect(warning?.message).to.equal(
        "Unable to create a matcher for custom assertion method 'com.example.Helper'"
      );
    });

    it("should match calls to configured methods", () => {
      const helper: TypeRef = { id: 1, qualifiedName: "com.example.Helper" };
      const resolver = createFakeResolver(
        new Map([
          [1, helper],
          [2, helper],
        ])
      );
      const { matchers } = compileCustomMatchers(
        "com.example.Helper#checkSomething*"
      );

      expect(
        anyMatch(matchers, { id: 1, name: "checkSomethingSpecial" }, resolver)
      ).to.equal(true);
      expect(
        anyMatch(matchers, { id: 2, name: "checkOther" }, resolver)
      ).to.equal(false);
      expect(
        anyMatch(matchers, { id: 3, name: "checkSomethingSpecial" }, resolver)
      ).to.equal(false);
    });
  });
});
