import { isInteger, isSafeNumber, parse, stringify } from "lossless-json";

// Integers beyond Number.MAX_SAFE_INTEGER are carried as bigint
export type JsonPrimitive = string | number | bigint | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export const isJsonObject = (value: JsonValue): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isJsonValue = (value: unknown): value is JsonValue => {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "number":
    case "bigint":
    case "boolean":
      return true;
    case "object":
      return Array.isArray(value) ? value.every(isJsonValue) : Object.values(value).every(isJsonValue);
    default:
      return false;
  }
};

const parseNumber = (text: string): number | bigint =>
  isInteger(text) && !isSafeNumber(text) ? BigInt(text) : Number(text);

/** Parses JSON text keeping 64-bit integers exact. Throws SyntaxError on invalid input. */
export const parseJson = (text: string): JsonValue => {
  const parsed = parse(text, null, parseNumber);
  if (!isJsonValue(parsed)) {
    throw new SyntaxError("Unsupported JSON value");
  }
  return parsed;
};

export const stringifyJson = (value: JsonValue, space?: number): string =>
  stringify(value, undefined, space) ?? "null";
