/**
 * JSON Path Evaluator
 *
 * Extracts values from JSON documents with a restricted path syntax:
 * `$` followed by `.name` and `[index]` segments, e.g. `$.customer.addresses[1].city`.
 * No wildcards, recursive descent or filters.
 *
 * Documents may be JSON text or already-deserialized object graphs.
 *
 * @example
 * ```typescript
 * const price = jsonPath.evaluateTyped('{"items":[{"price":10.5}]}', "$.items[0].price", "decimal");
 * // 10.5
 * ```
 */

import {
	EmptyDocumentError,
	InvalidPathError,
	MalformedDocumentError,
	PathNotFoundError,
	TypeMismatchError,
} from "../errors";
import { isRecord } from "../utils";
import type {
	JsonPathExpression,
	JsonPathInput,
	JsonPathLookup,
	JsonPathSegment,
	JsonTypeMap,
	JsonValueType,
} from "./json-path.types";

// =============================================================================
// Parsing
// =============================================================================

function isDelimiter(char: string): boolean {
	return char === "." || char === "[" || char === "]" || /\s/.test(char);
}

/**
 * Parse a path string into a reusable expression.
 *
 * @throws InvalidPathError when the path does not match the grammar
 */
export function compileJsonPath(path: string): JsonPathExpression {
	if (path.length === 0) {
		throw new InvalidPathError(path, "path is empty", 0);
	}
	if (path[0] !== "$") {
		throw new InvalidPathError(path, "path must start with '$'", 0);
	}

	const segments: JsonPathSegment[] = [];
	let position = 1;

	while (position < path.length) {
		const char = path[position];

		if (char === ".") {
			const start = position + 1;
			let end = start;
			while (end < path.length && !isDelimiter(path[end])) {
				end++;
			}
			if (end === start) {
				throw new InvalidPathError(path, "expected a field name after '.'", start);
			}
			segments.push({ type: "field", name: path.slice(start, end) });
			position = end;
		} else if (char === "[") {
			const start = position + 1;
			let end = start;
			while (end < path.length && path[end] >= "0" && path[end] <= "9") {
				end++;
			}
			if (end === start) {
				throw new InvalidPathError(path, "expected a non-negative array index", start);
			}
			if (path[end] !== "]") {
				throw new InvalidPathError(path, "expected ']'", end);
			}
			const index = Number(path.slice(start, end));
			if (!Number.isSafeInteger(index)) {
				throw new InvalidPathError(path, "array index is too large", start);
			}
			segments.push({ type: "index", index });
			position = end + 1;
		} else {
			throw new InvalidPathError(path, `unexpected character '${char}'`, position);
		}
	}

	if (segments.length === 0) {
		throw new InvalidPathError(path, "path must contain at least one segment", 1);
	}

	return Object.freeze({ source: path, segments: Object.freeze(segments) });
}

// =============================================================================
// Traversal
// =============================================================================

function normalizeDocument(document: unknown, path: string): unknown {
	if (document === null || document === undefined) {
		throw new EmptyDocumentError(path);
	}
	if (typeof document !== "string") {
		return document;
	}
	if (document.trim().length === 0) {
		throw new EmptyDocumentError(path);
	}
	try {
		return JSON.parse(document);
	} catch (error) {
		throw new MalformedDocumentError(error instanceof Error ? error.message : String(error), path);
	}
}

function lookup(root: unknown, expression: JsonPathExpression): JsonPathLookup {
	let node = root;
	for (const segment of expression.segments) {
		if (segment.type === "field") {
			if (!isRecord(node) || !Object.prototype.hasOwnProperty.call(node, segment.name)) {
				return { found: false };
			}
			node = node[segment.name];
		} else {
			if (!Array.isArray(node) || segment.index >= node.length) {
				return { found: false };
			}
			node = node[segment.index];
		}
		if (node === undefined) {
			return { found: false };
		}
	}
	return { found: true, value: node };
}

/**
 * Render the path up to and including the first segment that fails to resolve
 */
function failingPrefix(root: unknown, expression: JsonPathExpression): string {
	let prefix = "$";
	let node = root;
	for (const segment of expression.segments) {
		prefix += segment.type === "field" ? `.${segment.name}` : `[${segment.index}]`;
		const step = lookup(node, { source: prefix, segments: [segment] });
		if (!step.found) {
			return prefix;
		}
		node = step.value;
	}
	return prefix;
}

// =============================================================================
// Coercion
// =============================================================================

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

function describeType(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	return typeof value;
}

function toNumber(value: unknown): number | undefined {
	if (typeof value === "number") {
		return Number.isFinite(value) ? value : undefined;
	}
	if (typeof value === "string" && DECIMAL_PATTERN.test(value.trim())) {
		return Number(value.trim());
	}
	return undefined;
}

type Converter<K extends JsonValueType> = (value: unknown, path: string) => JsonTypeMap[K];

const converters: { [K in JsonValueType]: Converter<K> } = {
	string: (value, path) => {
		if (typeof value === "string") return value;
		if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
			return String(value);
		}
		throw new TypeMismatchError(path, "string", describeType(value), value);
	},
	integer: (value, path) => {
		const number = toNumber(value);
		if (number === undefined || !Number.isInteger(number) || number < INT32_MIN || number > INT32_MAX) {
			throw new TypeMismatchError(path, "integer", describeType(value), value);
		}
		return number;
	},
	long: (value, path) => {
		if (typeof value === "bigint") return value;
		if (typeof value === "number" && Number.isInteger(value)) {
			// Already rounded by JSON.parse; the string form keeps every digit
			if (!Number.isSafeInteger(value)) {
				throw new TypeMismatchError(path, "long", "unsafe integer", value);
			}
			return BigInt(value);
		}
		if (typeof value === "string" && INTEGER_PATTERN.test(value.trim())) {
			return BigInt(value.trim().replace(/^\+/, ""));
		}
		throw new TypeMismatchError(path, "long", describeType(value), value);
	},
	decimal: (value, path) => {
		const number = toNumber(value);
		if (number === undefined) {
			throw new TypeMismatchError(path, "decimal", describeType(value), value);
		}
		return number;
	},
	double: (value, path) => {
		const number = toNumber(value);
		if (number === undefined) {
			throw new TypeMismatchError(path, "double", describeType(value), value);
		}
		return number;
	},
	boolean: (value, path) => {
		if (typeof value === "boolean") return value;
		if (typeof value === "string") {
			const normalized = value.trim().toLowerCase();
			if (normalized === "true") return true;
			if (normalized === "false") return false;
		}
		throw new TypeMismatchError(path, "boolean", describeType(value), value);
	},
};

/**
 * Coerce an already-extracted value to the requested type.
 *
 * @throws TypeMismatchError when the value cannot be represented as `type`
 */
export function coerceJsonValue<K extends JsonValueType>(value: unknown, type: K, path = "$"): JsonTypeMap[K] {
	return converters[type](value, path);
}

// =============================================================================
// Evaluator
// =============================================================================

/**
 * JSON path evaluator with a cache of compiled expressions.
 */
export class JsonPathEvaluator {
	private readonly cache = new Map<string, JsonPathExpression>();

	/**
	 * Compile a path, reusing a previous compilation of the same source
	 */
	compile(path: JsonPathInput): JsonPathExpression {
		if (typeof path !== "string") {
			return path;
		}
		let expression = this.cache.get(path);
		if (!expression) {
			expression = compileJsonPath(path);
			this.cache.set(path, expression);
		}
		return expression;
	}

	/**
	 * Extract the raw value at `path`.
	 *
	 * @throws PathNotFoundError when any segment does not resolve
	 */
	evaluate(document: unknown, path: JsonPathInput): unknown {
		const expression = this.compile(path);
		const root = normalizeDocument(document, expression.source);
		const result = lookup(root, expression);
		if (!result.found) {
			throw new PathNotFoundError(expression.source, failingPrefix(root, expression));
		}
		return result.value;
	}

	/**
	 * Extract the value at `path` and coerce it to `type`
	 */
	evaluateTyped<K extends JsonValueType>(document: unknown, path: JsonPathInput, type: K): JsonTypeMap[K] {
		const expression = this.compile(path);
		return coerceJsonValue(this.evaluate(document, expression), type, expression.source);
	}

	/**
	 * Like evaluate, but reports a missing path instead of throwing
	 */
	tryEvaluate(document: unknown, path: JsonPathInput): JsonPathLookup {
		const expression = this.compile(path);
		return lookup(normalizeDocument(document, expression.source), expression);
	}

	/**
	 * Number of cached expressions
	 */
	get cacheSize(): number {
		return this.cache.size;
	}
}

/**
 * Default evaluator instance.
 */
export const jsonPath = new JsonPathEvaluator();
