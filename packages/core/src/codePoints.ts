import { CanonicalTextError } from "./errors.js";

/**
 * A sequence of Unicode scalar values. Transforms hand these to each other
 * lazily; anything that must be read twice is materialized first.
 */
export type CodePointSequence = Iterable<number>;

export const BACKSLASH = 0x5c;
export const SLASH = 0x2f;

export function isScalarValue(value: number): boolean {
  return (
    Number.isInteger(value) &&
    value >= 0 &&
    value <= 0x10ffff &&
    (value < 0xd800 || value > 0xdfff)
  );
}

export function toCodePoints(text: string): number[] {
  const out: number[] = [];
  for (const ch of text) {
    const cp = ch.codePointAt(0);
    if (cp !== undefined) out.push(cp);
  }
  return out;
}

export function fromCodePoints(sequence: CodePointSequence): string {
  let out = "";
  let index = 0;
  for (const cp of sequence) {
    if (!isScalarValue(cp)) {
      throw new CanonicalTextError("Not a Unicode scalar value", "INVALID_CODE_POINT", {
        index,
        value: cp
      });
    }
    out += String.fromCodePoint(cp);
    index += 1;
  }
  return out;
}

export function materialize(sequence: CodePointSequence): readonly number[] {
  return Array.isArray(sequence) ? sequence : Array.from(sequence);
}

export function sameCodePoints(a: readonly number[], b: readonly number[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i += 1) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function* rewriteSeparators(sequence: CodePointSequence): Generator<number> {
  for (const cp of sequence) {
    yield cp === BACKSLASH ? SLASH : cp;
  }
}

/** Code-point order; for well-formed text this equals UTF-8 byte order. */
export function compareCodePoints(a: string, b: string): -1 | 0 | 1 {
  const left = a[Symbol.iterator]();
  const right = b[Symbol.iterator]();
  for (;;) {
    const l = left.next();
    const r = right.next();
    if (l.done) return r.done ? 0 : -1;
    if (r.done) return 1;
    const lc = l.value.codePointAt(0) ?? 0;
    const rc = r.value.codePointAt(0) ?? 0;
    if (lc !== rc) return lc < rc ? -1 : 1;
  }
}
