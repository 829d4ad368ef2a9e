/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

export interface JSONObject {
	readonly [key: string]: JSONValue;
}

/**
 * Type guard to check if value is a JSON object.
 *
 * @param value Value to check
 * @returns True if value is a non-null, non-array object
 */
export function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Type guard to check if value is an array.
 *
 * @param value Value to check
 * @returns True if value is an array
 */
export function isJSONArray(value: JSONValue): value is ReadonlyArray<JSONValue> {
	return Array.isArray(value);
}
