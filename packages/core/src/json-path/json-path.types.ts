/**
 * JSON Path Types
 */

/**
 * A JSON value as produced by JSON.parse
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * One step of a compiled path
 */
export type JsonPathSegment = { readonly type: "field"; readonly name: string } | { readonly type: "index"; readonly index: number };

/**
 * Compiled path, reusable across evaluations
 */
export interface JsonPathExpression {
	readonly source: string;
	readonly segments: readonly JsonPathSegment[];
}

/**
 * Target types for typed extraction and the TypeScript type each produces
 */
export interface JsonTypeMap {
	string: string;
	integer: number;
	long: bigint;
	decimal: number;
	double: number;
	boolean: boolean;
}

export type JsonValueType = keyof JsonTypeMap;

/**
 * Anything the evaluator accepts as a path
 */
export type JsonPathInput = string | JsonPathExpression;

/**
 * Result of a lookup that tolerates missing paths
 */
export type JsonPathLookup = { found: true; value: unknown } | { found: false };
