import { JsonObject, JsonValue, isJsonArray, isJsonObject } from "../types";
import { LLMDecodeError, LLMValidationError, StructuredErrorKind, StructuredResponseError } from "./errors";
import { parseLLMJson } from "./jsonGuard";

export type FieldReader<V> = (value: JsonValue, path: string) => V | undefined;

type FieldSpecBase<V> = {
  /** Logical field name, used in error messages. */
  key: string;
  /** Candidate JSON names in priority order; the first one present with a readable value wins. */
  names: readonly string[];
  read: FieldReader<V>;
};

export type RequiredFieldSpec<V> = FieldSpecBase<V> & { required: true };
export type OptionalFieldSpec<V> = FieldSpecBase<V> & { required: false; fallback: V };
export type FieldSpec<V> = RequiredFieldSpec<V> | OptionalFieldSpec<V>;

export type ResponseShape<T> = {
  name: string;
  /**
   * Name of the array field wrapping the items. When set, a bare top-level array is
   * decoded as if it had been wrapped in `{ [envelope]: [...] }`.
   */
  envelope?: string;
  build: (source: FieldSource) => T;
  /** Returns the list of semantic problems; empty means usable. */
  validate: (value: T) => string[];
};

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; kind: StructuredErrorKind; error: StructuredResponseError };

export function requiredField<V>(key: string, names: readonly string[], read: FieldReader<V>): RequiredFieldSpec<V> {
  return { key, names, read, required: true };
}

export function optionalField<V>(
  key: string,
  names: readonly string[],
  read: FieldReader<V>,
  fallback: V
): OptionalFieldSpec<V> {
  return { key, names, read, required: false, fallback };
}

export class FieldSource {
  private readonly values: JsonObject;
  private readonly path: string;
  private readonly shapeName: string;

  constructor(values: JsonObject, path: string, shapeName: string) {
    this.values = values;
    this.path = path;
    this.shapeName = shapeName;
  }

  get<V>(spec: FieldSpec<V>): V {
    for (const name of spec.names) {
      if (!Object.prototype.hasOwnProperty.call(this.values, name)) continue;
      const value = spec.read(this.values[name], this.childPath(name));
      if (value !== undefined) {
        return value;
      }
    }

    if (spec.required) {
      const location = this.path ? ` at ${this.path}` : "";
      throw new LLMDecodeError(
        `${this.shapeName}: missing required field "${spec.key}"${location} (tried: ${spec.names.join(", ")})`,
        this.shapeName
      );
    }
    return spec.fallback;
  }

  private childPath(name: string): string {
    return this.path ? `${this.path}.${name}` : name;
  }
}

export const readString: FieldReader<string> = (value) => (typeof value === "string" ? value : undefined);

export const readInteger: FieldReader<number> = (value) =>
  typeof value === "number" && Number.isInteger(value) ? value : undefined;

export const readNumber: FieldReader<number> = (value) =>
  typeof value === "number" && Number.isFinite(value) ? value : undefined;

export const readBoolean: FieldReader<boolean> = (value) => (typeof value === "boolean" ? value : undefined);

export const readStringArray: FieldReader<readonly string[]> = (value) => {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    return undefined;
  }
  return Object.freeze([...value]);
};

/**
 * Reads an array whose elements are objects of another shape. A malformed element
 * fails the whole decode rather than being skipped.
 */
export function readArrayOf<T>(
  shapeName: string,
  build: (source: FieldSource) => T
): FieldReader<readonly T[]> {
  return (value, path) => {
    if (!Array.isArray(value)) {
      return undefined;
    }
    const items = value.map((item, index) => {
      const itemPath = `${path}[${index}]`;
      if (!isJsonObject(item)) {
        throw new LLMDecodeError(`${shapeName}: expected an object at ${itemPath}`, shapeName);
      }
      return build(new FieldSource(item, itemPath, shapeName));
    });
    return Object.freeze(items);
  };
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

export function decodeStructured<T>(text: string, shape: ResponseShape<T>): T {
  const value = decodeShape(parseForShape(text, shape.name), shape);
  const problems = shape.validate(value);
  if (problems.length > 0) {
    throw new LLMValidationError(shape.name, problems);
  }
  return value;
}

export function tryDecodeStructured<T>(text: string, shape: ResponseShape<T>): DecodeResult<T> {
  try {
    return { ok: true, value: decodeStructured(text, shape) };
  } catch (error) {
    if (error instanceof StructuredResponseError) {
      return { ok: false, kind: error.kind, error };
    }
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, kind: "decode", error: new LLMDecodeError(`${shape.name}: ${message}`, shape.name) };
  }
}

function parseForShape(text: string, shapeName: string): unknown {
  try {
    return parseLLMJson(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new LLMDecodeError(`${shapeName}: ${message}`, shapeName);
  }
}

function decodeShape<T>(parsed: unknown, shape: ResponseShape<T>): T {
  if (isJsonObject(parsed)) {
    return shape.build(new FieldSource(parsed, "", shape.name));
  }
  if (shape.envelope !== undefined && isJsonArray(parsed)) {
    return shape.build(new FieldSource({ [shape.envelope]: parsed }, "", shape.name));
  }

  const expected = shape.envelope !== undefined ? "a JSON object or array" : "a JSON object";
  throw new LLMDecodeError(`${shape.name}: expected ${expected}`, shape.name);
}
