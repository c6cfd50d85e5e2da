import { type CaseFolder, defaultCaseFolder } from "./caseFolding.js";
import {
  BACKSLASH,
  fromCodePoints,
  rewriteSeparators,
  toCodePoints
} from "./codePoints.js";
import { assertWellFormedText } from "./errors.js";
import { type Normalizer, nfcNormalizer } from "./normalizer.js";

/** Which optional stages run: fold (caseless) and `\` -> `/` rewrite (path). */
export type CanonicalPolicy = {
  readonly caseless: boolean;
  readonly path: boolean;
};

export const canonicalPolicies = {
  text: { caseless: false, path: false },
  caselessText: { caseless: true, path: false },
  path: { caseless: false, path: true },
  caselessPath: { caseless: true, path: true }
} as const satisfies Record<string, CanonicalPolicy>;

export type CanonicalPolicyName = keyof typeof canonicalPolicies;

export type PipelineOptions = {
  normalizer?: Normalizer;
  caseFolder?: CaseFolder;
  /** Skip normalization when the normalizer reports the input canonical. Defaults to true. */
  fastPath?: boolean;
};

export type CanonicalPipeline = {
  readonly normalizer: Normalizer;
  readonly caseFolder: CaseFolder;
  readonly fastPath: boolean;
  canonicalize(text: string, policy: CanonicalPolicy): string;
};

export function createPipeline(options: PipelineOptions = {}): CanonicalPipeline {
  const normalizer = options.normalizer ?? nfcNormalizer;
  const caseFolder = options.caseFolder ?? defaultCaseFolder;
  const fastPath = options.fastPath ?? true;

  function canonicalize(text: string, policy: CanonicalPolicy): string {
    assertWellFormedText(text);
    const input = toCodePoints(text);

    if (policy.caseless) {
      // Folding can emit non-canonical sequences, so normalize on both sides.
      const source = policy.path ? rewriteSeparators(input) : input;
      const folded = caseFolder.fold(normalizer.normalize(source));
      return fromCodePoints(normalizer.normalize(folded));
    }

    // The oracle only vouches for the text it was asked about.
    const rewritten = policy.path && input.includes(BACKSLASH);
    const source = rewritten ? Array.from(rewriteSeparators(input)) : input;
    if (fastPath && !rewritten && normalizer.isNormalized(source)) {
      return text;
    }
    return fromCodePoints(normalizer.normalize(source));
  }

  return { normalizer, caseFolder, fastPath, canonicalize };
}

export const defaultPipeline: CanonicalPipeline = createPipeline();
