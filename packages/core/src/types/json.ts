export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | Array<JsonValue> | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export type QueryScalar = string | number | boolean;

/**
 * Flat query mapping. Arrays are sent as repeated keys; `undefined` entries
 * are dropped before hashing and sending.
 */
export type QueryParams = Record<
  string,
  QueryScalar | ReadonlyArray<QueryScalar> | undefined
>;
