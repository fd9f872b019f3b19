/**
 * Decoders for loosely-typed schema.org values. A field may arrive as a plain
 * string, a `{"@value": ...}` wrapper (optionally typed, e.g. `{"@type":
 * "DateTime", "@value": ...}`), a number, or an array of any of those. Each
 * decoder folds that into one small tagged union first, so the normalizer only
 * ever asks "absent, one value, or several".
 */

export type Decoded<T> =
  | { kind: "absent" }
  | { kind: "scalar"; value: T }
  | { kind: "list"; values: T[] };

const ABSENT = { kind: "absent" } as const;

export type JsonRecord = Record<string, unknown>;

export const isRecord = (value: unknown): value is JsonRecord =>
  value !== null && typeof value === "object" && !Array.isArray(value);

export const asRecord = (value: unknown): JsonRecord | null => (isRecord(value) ? value : null);

/** First element of an array, or the value itself when it is not one. */
export const firstElement = (value: unknown): unknown => (Array.isArray(value) ? value[0] : value);

const decodeScalarText = (value: unknown): string | null => {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed ? trimmed : null;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  const record = asRecord(value);
  if (record && "@value" in record) {
    const inner = record["@value"];
    if (typeof inner === "string" || typeof inner === "number") {
      return decodeScalarText(inner);
    }
  }
  return null;
};

export const decodeText = (value: unknown): Decoded<string> => {
  if (value === null || value === undefined) {
    return ABSENT;
  }
  if (Array.isArray(value)) {
    const values = value.map(decodeScalarText).filter((item): item is string => item !== null);
    return values.length ? { kind: "list", values } : ABSENT;
  }
  const scalar = decodeScalarText(value);
  return scalar === null ? ABSENT : { kind: "scalar", value: scalar };
};

export const decodeBoolean = (value: unknown): Decoded<boolean> => {
  if (typeof value === "boolean") {
    return { kind: "scalar", value };
  }
  if (typeof value === "string") {
    const lowered = value.trim().toLowerCase();
    if (lowered === "true") {
      return { kind: "scalar", value: true };
    }
    if (lowered === "false") {
      return { kind: "scalar", value: false };
    }
  }
  return ABSENT;
};

/** A single string for a text field; the first entry wins when a list arrives. */
export const textOf = (value: unknown): string | undefined => {
  const decoded = decodeText(value);
  switch (decoded.kind) {
    case "absent":
      return undefined;
    case "scalar":
      return decoded.value;
    case "list":
      return decoded.values[0];
  }
};

/** A list for a list-like field; absent or empty input yields undefined, never []. */
export const decodeList = (value: unknown): string[] | undefined => {
  const decoded = decodeText(value);
  switch (decoded.kind) {
    case "absent":
      return undefined;
    case "scalar":
      return [decoded.value];
    case "list":
      return decoded.values;
  }
};

export const booleanOf = (value: unknown): boolean | undefined => {
  const decoded = decodeBoolean(value);
  return decoded.kind === "scalar" ? decoded.value : undefined;
};

export const numberOf = (value: unknown): number | undefined => {
  const text = textOf(value);
  if (text === undefined) {
    return undefined;
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : undefined;
};
