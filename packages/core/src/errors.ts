export type CanonicalTextErrorCode =
  | "MALFORMED_TEXT"
  | "INVALID_CODE_POINT"
  | "CASE_FOLDING_DATA";

export class CanonicalTextError extends Error {
  constructor(
    message: string,
    public code: CanonicalTextErrorCode,
    public details?: { index?: number; value?: number }
  ) {
    super(message);
    this.name = "CanonicalTextError";
  }
}

// With the `u` flag a paired surrogate is one astral code point, so only
// lone halves match.
const LONE_SURROGATE = /\p{Cs}/u;

export function findLoneSurrogate(text: string): number {
  const match = LONE_SURROGATE.exec(text);
  return match ? match.index : -1;
}

export function isWellFormedText(text: string): boolean {
  return findLoneSurrogate(text) === -1;
}

export function assertWellFormedText(text: string): void {
  const index = findLoneSurrogate(text);
  if (index !== -1) {
    throw new CanonicalTextError("Text contains a lone surrogate", "MALFORMED_TEXT", {
      index,
      value: text.charCodeAt(index)
    });
  }
}
