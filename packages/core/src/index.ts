export {
  CanonicalString,
  createCanonicalizer,
  type Canonicalizer
} from "./canonicalString.js";
export {
  canonicalPolicies,
  createPipeline,
  defaultPipeline,
  type CanonicalPipeline,
  type CanonicalPolicy,
  type CanonicalPolicyName,
  type PipelineOptions
} from "./pipeline.js";
export { nfcNormalizer, type Normalizer } from "./normalizer.js";
export {
  createCaseFolder,
  defaultCaseFolder,
  loadCaseFoldingTable,
  parseCaseFoldingTable,
  type CaseFolder,
  type CaseFoldingTable
} from "./caseFolding.js";
export {
  compareCodePoints,
  fromCodePoints,
  isScalarValue,
  rewriteSeparators,
  toCodePoints,
  type CodePointSequence
} from "./codePoints.js";
export {
  CanonicalTextError,
  assertWellFormedText,
  isWellFormedText,
  type CanonicalTextErrorCode
} from "./errors.js";
