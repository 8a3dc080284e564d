/**
 * Validation Builder
 *
 * Fluent assertions over an executed step's result. Every assertion runs
 * immediately and throws AssertionFailureError on failure; on success it
 * returns the builder so assertions can be chained.
 *
 * @example
 * ```typescript
 * const response = await scenario.apiResource(url).get().execute();
 * response.assertSuccess().assertJsonPath("$.name", "Laptop");
 * ```
 */

import { isDeepStrictEqual } from "node:util";
import { AssertionFailureError, formatValue, JsonPathError, toError } from "../errors";
import { jsonPath, type JsonPathEvaluator } from "../json-path/json-path";
import type { JsonTypeMap, JsonValueType } from "../json-path/json-path.types";
import type { StepResult } from "../results/result.types";

function pathSource(path: string | { source: string }): string {
	return typeof path === "string" ? path : path.source;
}

export class ValidationBuilder<R extends StepResult> {
	constructor(
		protected readonly result: R,
		protected readonly evaluator: JsonPathEvaluator = jsonPath
	) {}

	/**
	 * The wrapped result
	 */
	getResult(): R {
		return this.result;
	}

	and(): this {
		return this;
	}

	// =========================================================================
	// Outcome
	// =========================================================================

	assertSuccess(): this {
		if (!this.result.success) {
			throw new AssertionFailureError(
				`Expected step to succeed but it failed with errors: ${this.result.errors.join("; ") || "(none)"}`,
				{ expected: true, actual: false }
			);
		}
		return this;
	}

	assertFailure(): this {
		if (this.result.success) {
			throw new AssertionFailureError("Expected step to fail but it succeeded", { expected: false, actual: true });
		}
		return this;
	}

	/**
	 * Assert that some error message contains `text`
	 */
	assertErrorContains(text: string): this {
		if (!this.result.errors.some((error) => error.includes(text))) {
			throw new AssertionFailureError(
				`Expected an error containing '${text}' but got: ${this.result.errors.join("; ") || "no errors"}`,
				{ expected: text, actual: this.result.errors }
			);
		}
		return this;
	}

	assertProperty(name: string, expected: unknown): this {
		const actual = this.result.properties[name];
		if (!isDeepStrictEqual(actual, expected)) {
			throw new AssertionFailureError(
				`Expected property '${name}' to be ${formatValue(expected)} but got ${formatValue(actual)}`,
				{ expected, actual }
			);
		}
		return this;
	}

	/**
	 * Assert a custom condition over the whole result
	 */
	validate(predicate: (result: R) => boolean, message: string): this {
		if (!predicate(this.result)) {
			throw new AssertionFailureError(`Validation failed: ${message}`);
		}
		return this;
	}

	// =========================================================================
	// JSON
	// =========================================================================

	/**
	 * Extract a typed value from the result payload.
	 * JSON path errors propagate unchanged.
	 */
	jsonPath<K extends JsonValueType>(path: string, type: K): JsonTypeMap[K] {
		return this.evaluator.evaluateTyped(this.result.data, path, type);
	}

	/**
	 * Assert the value at `path` equals `expected`. Primitive expectations
	 * coerce the actual value to the expectation's type, so `"42"` in the
	 * document matches `42`. Objects and arrays are compared structurally.
	 */
	assertJsonPath(path: string, expected: unknown): this {
		const actual = this.extract(path, (document) => {
			switch (typeof expected) {
				case "string":
					return this.evaluator.evaluateTyped(document, path, "string");
				case "number":
					return this.evaluator.evaluateTyped(document, path, "decimal");
				case "boolean":
					return this.evaluator.evaluateTyped(document, path, "boolean");
				case "bigint":
					return this.evaluator.evaluateTyped(document, path, "long");
				default:
					return this.evaluator.evaluate(document, path);
			}
		});

		if (!isDeepStrictEqual(actual, expected)) {
			throw new AssertionFailureError(
				`Expected JSON path '${path}' to be ${formatValue(expected)} but got ${formatValue(actual)}`,
				{ expected, actual, path }
			);
		}
		return this;
	}

	/**
	 * Assert the value at `path`, coerced to `type`, satisfies `predicate`.
	 * A predicate returning nothing passes unless it throws.
	 */
	assertJsonPathMatches<K extends JsonValueType>(
		path: string,
		type: K,
		predicate: (value: JsonTypeMap[K]) => boolean | void,
		message?: string
	): this {
		const actual = this.extract(path, (document) => this.evaluator.evaluateTyped(document, path, type));
		if (predicate(actual) === false) {
			throw new AssertionFailureError(
				message ?? `JSON path '${path}' value ${formatValue(actual)} did not satisfy the predicate`,
				{ actual, path }
			);
		}
		return this;
	}

	assertJsonPathExists(path: string): this {
		const lookup = this.extract(path, (document) => this.evaluator.tryEvaluate(document, path));
		if (!lookup.found) {
			throw new AssertionFailureError(`Expected JSON path '${path}' to exist`, { path });
		}
		return this;
	}

	assertJsonPathMissing(path: string): this {
		const lookup = this.extract(path, (document) => this.evaluator.tryEvaluate(document, path));
		if (lookup.found) {
			throw new AssertionFailureError(
				`Expected JSON path '${path}' to be absent but found ${formatValue(lookup.value)}`,
				{ actual: lookup.value, path }
			);
		}
		return this;
	}

	/**
	 * Run a JSON extraction, turning evaluator errors into assertion failures
	 */
	protected extract<T>(path: string | { source: string }, read: (document: unknown) => T): T {
		try {
			return read(this.result.data);
		} catch (error) {
			if (error instanceof JsonPathError) {
				throw new AssertionFailureError(error.message, { path: pathSource(path) }, { cause: error });
			}
			throw toError(error);
		}
	}
}
