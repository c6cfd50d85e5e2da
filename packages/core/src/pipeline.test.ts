import { describe, expect, it, vi } from "vitest";
import { defaultCaseFolder, type CaseFolder } from "./caseFolding.js";
import type { CodePointSequence } from "./codePoints.js";
import { CanonicalTextError } from "./errors.js";
import { nfcNormalizer, type Normalizer } from "./normalizer.js";
import { canonicalPolicies, createPipeline, defaultPipeline } from "./pipeline.js";

function spyCapabilities() {
  const normalize = vi.fn((input: CodePointSequence) => nfcNormalizer.normalize(input));
  const isNormalized = vi.fn((input: CodePointSequence) => nfcNormalizer.isNormalized(input));
  const fold = vi.fn((input: CodePointSequence) => defaultCaseFolder.fold(input));
  return { normalize, isNormalized, fold, normalizer: { normalize, isNormalized }, caseFolder: { fold } };
}

const OHM = 0x2126;
const KELVIN = 0x212a;

// Deterministic stand-ins: the normalizer knows two singletons, and the
// folder maps K to KELVIN SIGN so its output is not canonical.
function fakeCapabilities(calls: string[]): { normalizer: Normalizer; caseFolder: CaseFolder } {
  return {
    normalizer: {
      *normalize(input) {
        calls.push("normalize");
        for (const cp of input) {
          if (cp === OHM) yield 0x3a9;
          else if (cp === KELVIN) yield 0x4b;
          else yield cp;
        }
      },
      isNormalized(input) {
        calls.push("isNormalized");
        return Array.from(input).every((cp) => cp !== OHM && cp !== KELVIN);
      }
    },
    caseFolder: {
      *fold(input) {
        calls.push("fold");
        for (const cp of input) {
          yield cp === 0x4b ? KELVIN : cp;
        }
      }
    }
  };
}

describe("createPipeline", () => {
  it("defaults to NFC, default folding and the fast path", () => {
    expect(defaultPipeline.normalizer).toBe(nfcNormalizer);
    expect(defaultPipeline.caseFolder).toBe(defaultCaseFolder);
    expect(defaultPipeline.fastPath).toBe(true);
  });

  it("skips normalize when the input is already canonical", () => {
    const spies = spyCapabilities();
    const pipeline = createPipeline(spies);
    expect(pipeline.canonicalize("abc", canonicalPolicies.text)).toBe("abc");
    expect(spies.isNormalized).toHaveBeenCalledTimes(1);
    expect(spies.normalize).not.toHaveBeenCalled();
  });

  it("normalizes when the oracle says no", () => {
    const spies = spyCapabilities();
    const pipeline = createPipeline(spies);
    expect(pipeline.canonicalize("A\u{30A}", canonicalPolicies.text)).toBe("\u{C5}");
    expect(spies.normalize).toHaveBeenCalledTimes(1);
  });

  it("never asks the oracle when the fast path is off", () => {
    const spies = spyCapabilities();
    const pipeline = createPipeline({ ...spies, fastPath: false });
    expect(pipeline.canonicalize("abc", canonicalPolicies.text)).toBe("abc");
    expect(spies.isNormalized).not.toHaveBeenCalled();
    expect(spies.normalize).toHaveBeenCalledTimes(1);
  });

  it("skips the fast path for paths that needed a separator rewrite", () => {
    const spies = spyCapabilities();
    const pipeline = createPipeline(spies);
    expect(pipeline.canonicalize("dir\\file", canonicalPolicies.path)).toBe("dir/file");
    expect(spies.isNormalized).not.toHaveBeenCalled();
    expect(spies.normalize).toHaveBeenCalledTimes(1);
  });

  it("keeps the fast path for paths without backslashes", () => {
    const spies = spyCapabilities();
    const pipeline = createPipeline(spies);
    expect(pipeline.canonicalize("dir/file", canonicalPolicies.path)).toBe("dir/file");
    expect(spies.isNormalized).toHaveBeenCalledTimes(1);
    expect(spies.normalize).not.toHaveBeenCalled();
  });

  it("always folds caseless text, even when it looks canonical", () => {
    const spies = spyCapabilities();
    const pipeline = createPipeline(spies);
    expect(pipeline.canonicalize("abc", canonicalPolicies.caselessText)).toBe("abc");
    expect(spies.fold).toHaveBeenCalledTimes(1);
    expect(spies.normalize).toHaveBeenCalledTimes(2);
    expect(spies.isNormalized).not.toHaveBeenCalled();
  });

  it("runs normalize, fold, normalize in that order", () => {
    const calls: string[] = [];
    const pipeline = createPipeline(fakeCapabilities(calls));
    expect(pipeline.canonicalize("K", canonicalPolicies.caselessText)).toBe("K");
    expect(calls).toEqual(["normalize", "fold", "normalize"]);
  });

  it("rewrites separators before folding caseless paths", () => {
    const calls: string[] = [];
    const pipeline = createPipeline(fakeCapabilities(calls));
    expect(pipeline.canonicalize("a\\\u{2126}", canonicalPolicies.caselessPath)).toBe(
      "a/\u{3A9}"
    );
    expect(calls).toEqual(["normalize", "fold", "normalize"]);
  });

  it("uses injected capabilities for plain text", () => {
    const calls: string[] = [];
    const pipeline = createPipeline(fakeCapabilities(calls));
    expect(pipeline.canonicalize("\u{2126}", canonicalPolicies.text)).toBe("\u{3A9}");
    expect(calls).toEqual(["isNormalized", "normalize"]);
  });

  it("rejects malformed text before touching any capability", () => {
    const spies = spyCapabilities();
    const pipeline = createPipeline(spies);
    expect(() => pipeline.canonicalize("a\uD800", canonicalPolicies.caselessText)).toThrow(
      CanonicalTextError
    );
    expect(spies.normalize).not.toHaveBeenCalled();
    expect(spies.fold).not.toHaveBeenCalled();
  });
});
