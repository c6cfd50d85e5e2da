import {
  type CodePointSequence,
  fromCodePoints,
  materialize,
  sameCodePoints,
  toCodePoints
} from "./codePoints.js";

/**
 * Canonical composition (NFC) over code points.
 *
 * `isNormalized(x)` must agree with `normalize(x)` returning `x` unchanged;
 * callers use it only to skip work, never to decide a result.
 */
export interface Normalizer {
  normalize(input: CodePointSequence): CodePointSequence;
  isNormalized(input: CodePointSequence): boolean;
}

// Everything below U+0300 is NFC_Quick_Check=Yes with combining class 0.
const FIRST_UNSTABLE_CODE_POINT = 0x300;

function composeText(codePoints: readonly number[]): number[] {
  return toCodePoints(fromCodePoints(codePoints).normalize("NFC"));
}

export const nfcNormalizer: Normalizer = {
  normalize(input) {
    return composeText(materialize(input));
  },
  isNormalized(input) {
    const codePoints = materialize(input);
    if (codePoints.every((cp) => cp < FIRST_UNSTABLE_CODE_POINT)) return true;
    return sameCodePoints(composeText(codePoints), codePoints);
  }
};
