import { createHash } from "crypto";
import { inspect } from "util";
import { compareCodePoints, toCodePoints } from "./codePoints.js";
import {
  type CanonicalPipeline,
  type CanonicalPolicy,
  type PipelineOptions,
  canonicalPolicies,
  createPipeline,
  defaultPipeline
} from "./pipeline.js";

const encoder = new TextEncoder();

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/**
 * Text held in canonical composed form (NFC).
 *
 * The buffer is private and never changes after construction, so equality,
 * hashing and ordering compare buffers directly without normalizing again.
 * Caseless instances hold `NFC(fold(NFC(text)))` and compare
 * case-insensitively through the same plain equality.
 *
 * Ordering is code-point order of the canonical form. It is stable and
 * consistent with equality but it is not linguistic collation; sort with
 * `Intl.Collator` over `asText()` where users see the order.
 */
export class CanonicalString {
  readonly #buffer: string;
  readonly #policy: CanonicalPolicy;
  readonly #pipeline: CanonicalPipeline;

  private constructor(buffer: string, policy: CanonicalPolicy, pipeline: CanonicalPipeline) {
    this.#buffer = buffer;
    this.#policy = policy;
    this.#pipeline = pipeline;
  }

  static create(
    text: string,
    policy: CanonicalPolicy,
    pipeline: CanonicalPipeline = defaultPipeline
  ): CanonicalString {
    return new CanonicalString(pipeline.canonicalize(text, policy), policy, pipeline);
  }

  static fromText(text: string, pipeline?: CanonicalPipeline): CanonicalString {
    return CanonicalString.create(text, canonicalPolicies.text, pipeline);
  }

  static fromCaselessText(text: string, pipeline?: CanonicalPipeline): CanonicalString {
    return CanonicalString.create(text, canonicalPolicies.caselessText, pipeline);
  }

  /** Rewrites every `\` to `/` before normalizing. */
  static fromPath(text: string, pipeline?: CanonicalPipeline): CanonicalString {
    return CanonicalString.create(text, canonicalPolicies.path, pipeline);
  }

  static fromCaselessPath(text: string, pipeline?: CanonicalPipeline): CanonicalString {
    return CanonicalString.create(text, canonicalPolicies.caselessPath, pipeline);
  }

  static from(value: string | CanonicalString): CanonicalString {
    return value instanceof CanonicalString ? value : CanonicalString.fromText(value);
  }

  static compare(a: CanonicalString, b: CanonicalString): -1 | 0 | 1 {
    return a.compareTo(b);
  }

  get policy(): CanonicalPolicy {
    return { ...this.#policy };
  }

  /** UTF-16 code units, like `String.prototype.length`. */
  get length(): number {
    return this.#buffer.length;
  }

  get isEmpty(): boolean {
    return this.#buffer.length === 0;
  }

  asText(): string {
    return this.#buffer;
  }

  toString(): string {
    return this.#buffer;
  }

  toJSON(): string {
    return this.#buffer;
  }

  /** UTF-8 bytes of the canonical form; a fresh copy on every call. */
  toBytes(): Uint8Array {
    return encoder.encode(this.#buffer);
  }

  codePoints(): number[] {
    return toCodePoints(this.#buffer);
  }

  /**
   * Appends `other` and runs this instance's pipeline over the joined text.
   * A leading combining mark in `other` composes with the last character
   * here, so the halves are never normalized separately.
   */
  concat(other: string | CanonicalString): CanonicalString {
    const tail = other instanceof CanonicalString ? other.#buffer : other;
    return CanonicalString.create(this.#buffer + tail, this.#policy, this.#pipeline);
  }

  equals(other: string | CanonicalString): boolean {
    const text = other instanceof CanonicalString ? other.#buffer : other;
    return this.#buffer === text;
  }

  compareTo(other: CanonicalString): -1 | 0 | 1 {
    return compareCodePoints(this.#buffer, other.#buffer);
  }

  /** 32-bit FNV-1a over the canonical UTF-8 bytes. */
  hashCode(): number {
    let hash = FNV_OFFSET_BASIS;
    for (const byte of this.toBytes()) {
      hash ^= byte;
      hash = Math.imul(hash, FNV_PRIME);
    }
    return hash >>> 0;
  }

  digest(algorithm = "sha256"): string {
    return createHash(algorithm).update(this.#buffer, "utf8").digest("hex");
  }

  [inspect.custom](): string {
    return JSON.stringify(this.#buffer);
  }
}

export type Canonicalizer = CanonicalPipeline & {
  fromText(text: string): CanonicalString;
  fromCaselessText(text: string): CanonicalString;
  fromPath(text: string): CanonicalString;
  fromCaselessPath(text: string): CanonicalString;
};

/** A pipeline with its own capabilities and the four constructors bound to it. */
export function createCanonicalizer(options: PipelineOptions = {}): Canonicalizer {
  const pipeline = createPipeline(options);
  return {
    ...pipeline,
    fromText: (text) => CanonicalString.fromText(text, pipeline),
    fromCaselessText: (text) => CanonicalString.fromCaselessText(text, pipeline),
    fromPath: (text) => CanonicalString.fromPath(text, pipeline),
    fromCaselessPath: (text) => CanonicalString.fromCaselessPath(text, pipeline)
  };
}
