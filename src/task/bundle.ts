import { BundleError } from "../errors.js";
import { BUNDLE_PREFIX, BundleEnvelopeSchema, parseOrThrow } from "../schemas.js";

/**
 * Values a bundle field may hold. Everything here has a canonical rendering,
 * which is what makes bundle identity structural.
 */
export type FieldValue =
  | string
  | number
  | boolean
  | null
  | readonly FieldValue[]
  | { readonly [key: string]: FieldValue }
  | Bundle;

export type BundleFields = { readonly [key: string]: FieldValue };

export type BundleEnvelope = { [envelopeKey: string]: Record<string, unknown> };

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function invalidField(path: string, what: string): BundleError {
  return new BundleError("INVALID_BUNDLE", `Field "${path}" holds ${what}, which has no canonical form`, { path });
}

function canonical(value: unknown, path: string): string {
  if (value instanceof Bundle) return value.key;
  if (value === null) return "null";
  switch (typeof value) {
    case "string":
      return JSON.stringify(value);
    case "boolean":
      return String(value);
    case "number":
      if (!Number.isFinite(value)) throw invalidField(path, String(value));
      return JSON.stringify(value);
    case "object":
      break;
    default:
      throw invalidField(path, `a ${typeof value}`);
  }
  if (Array.isArray(value)) {
    return `[${value.map((item: unknown, i) => canonical(item, `${path}[${i}]`)).join(",")}]`;
  }
  if (!isPlainObject(value)) {
    throw invalidField(path, `an instance of ${value.constructor.name}`);
  }
  const entries = Object.entries(value)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${canonical(v, `${path}.${k}`)}`);
  return `{${entries.join(",")}}`;
}

/** Copy arrays and plain objects all the way down and freeze the copies. */
function frozenCopy<T extends FieldValue>(value: T): T;
function frozenCopy(value: FieldValue): FieldValue {
  if (value === null || typeof value !== "object" || value instanceof Bundle) return value;
  if (Array.isArray(value)) return Object.freeze(value.map((item: FieldValue) => frozenCopy(item)));
  if (!isPlainObject(value)) return value;
  const out: { [key: string]: FieldValue } = {};
  for (const [k, v] of Object.entries(value)) out[k] = frozenCopy(v);
  return Object.freeze(out);
}

function frozenFields<F extends BundleFields>(fields: F): F;
function frozenFields(fields: BundleFields): BundleFields {
  const out: { [key: string]: FieldValue } = {};
  for (const [k, v] of Object.entries(fields)) out[k] = frozenCopy(v);
  return Object.freeze(out);
}

/** First class seen using each kind. A kind belongs to exactly one class. */
const kindOwners = new Map<string, { owner: unknown; name: string }>();

function claimKind(kind: string, owner: { name: string }): void {
  const claimed = kindOwners.get(kind);
  if (claimed === undefined) {
    kindOwners.set(kind, { owner, name: owner.name });
    return;
  }
  if (claimed.owner !== owner) {
    throw new BundleError(
      "INVALID_BUNDLE",
      `Bundle kind "${kind}" belongs to ${claimed.name}; ${owner.name} must declare its own kind`,
      { kind, owner: claimed.name, other: owner.name },
    );
  }
}

function encode(value: FieldValue): unknown {
  if (value instanceof Bundle) return value.toJSON();
  if (value === null || typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map((item: FieldValue) => encode(item));
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) out[k] = encode(v);
  return out;
}

/**
 * Immutable value record. Two bundles of the same kind whose declared fields
 * are structurally equal share one `key` and are interchangeable.
 *
 * Subclasses declare `kind` and pass their fields to the constructor; state
 * that must not take part in identity lives outside `fields`. Fields are
 * copied and deep-frozen on construction. A subclass that inherits its
 * parent's `kind` instead of declaring one is rejected when its key is first
 * computed, so two classes never share an identity.
 *
 * @example
 * class Head extends Task<{ branch: string }> {
 *   readonly kind = "head";
 * }
 * new Head({ branch: "a" }).equals(new Head({ branch: "a" })); // true
 */
export abstract class Bundle<F extends BundleFields = BundleFields> {
  abstract readonly kind: string;
  readonly fields: Readonly<F>;
  private cachedKey?: string;

  constructor(fields: F) {
    this.fields = frozenFields(fields);
  }

  /** Stable identity key: kind plus the canonical rendering of the fields. */
  get key(): string {
    if (this.cachedKey === undefined) {
      claimKind(this.kind, this.constructor);
      this.cachedKey = `${this.kind}${canonical(this.fields, this.kind)}`;
    }
    return this.cachedKey;
  }

  equals(other: Bundle): boolean {
    return this === other || this.key === other.key;
  }

  toJSON(): BundleEnvelope {
    const fields: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(this.fields)) fields[k] = encode(v);
    return { [`${BUNDLE_PREFIX}${this.kind}`]: fields };
  }

  toString(): string {
    const parts = Object.keys(this.fields)
      .sort()
      .map((k) => `${k}=${canonical(this.fields[k], k)}`);
    return `${this.kind}(${parts.join(", ")})`;
  }
}

export type BundleFactory = (fields: Record<string, unknown>) => Bundle;

/** Maps serialized kinds back to constructors. */
export class BundleRegistry {
  private factories = new Map<string, BundleFactory>();

  register(kind: string, factory: BundleFactory): this {
    if (this.factories.has(kind)) {
      throw new BundleError("INVALID_BUNDLE", `Bundle kind "${kind}" already registered`, { kind });
    }
    this.factories.set(kind, factory);
    return this;
  }

  has(kind: string): boolean {
    return this.factories.has(kind);
  }

  kinds(): string[] {
    return [...this.factories.keys()];
  }

  /** Rebuild a bundle from its `toJSON()` form. Nested envelopes are decoded first. */
  fromValue(value: unknown): Bundle {
    const envelope = parseOrThrow(
      BundleEnvelopeSchema,
      value,
      (message) => new BundleError("INVALID_BUNDLE", `Invalid bundle envelope: ${message}`),
    );
    const [[envelopeKey, rawFields]] = Object.entries(envelope);
    const kind = envelopeKey.slice(BUNDLE_PREFIX.length);
    const factory = this.factories.get(kind);
    if (!factory) {
      throw new BundleError("UNKNOWN_BUNDLE_KIND", `Unknown bundle kind "${kind}"`, { kind });
    }
    const fields: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(rawFields)) fields[k] = this.decode(v);
    return factory(fields);
  }

  fromJSON(text: string): Bundle {
    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (err) {
      throw new BundleError("INVALID_BUNDLE", `Bundle JSON does not parse: ${String(err)}`);
    }
    return this.fromValue(value);
  }

  private decode(value: unknown): unknown {
    if (Array.isArray(value)) return value.map((item: unknown) => this.decode(item));
    if (value !== null && typeof value === "object" && BundleEnvelopeSchema.safeParse(value).success) {
      return this.fromValue(value);
    }
    return value;
  }
}

/** Registry holding the kinds this package ships; user kinds may be added to it. */
export const bundles = new BundleRegistry();
