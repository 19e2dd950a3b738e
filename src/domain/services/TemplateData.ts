import { isJsonObject, JsonObject, JsonValue } from "../entities/JsonValue";

/**
 * Templates always see an object namespace: objects pass through as-is,
 * anything else (array, string, number, boolean, null) is exposed as `data`.
 */
export const toTemplateData = (value: JsonValue): JsonObject =>
  isJsonObject(value) ? value : { data: value };
