/**
 * Errors
 *
 * Error taxonomy shared by the DSL, the executor and the validation layer.
 *
 * Usage errors (configuration, incompatible step, scenario state) are thrown
 * at DSL-call time. Execution errors (timeout, delivery, transport) are
 * captured into the StepResult instead of being thrown.
 */

/**
 * Render a value for an error message
 */
export function formatValue(value: unknown): string {
	if (typeof value === "bigint") {
		return `${value}n`;
	}
	if (value === undefined) {
		return "undefined";
	}
	try {
		return JSON.stringify(value) ?? String(value);
	} catch {
		return String(value);
	}
}

// =============================================================================
// Usage Errors
// =============================================================================

/**
 * Missing or invalid configuration: an auth variant without its required
 * block, a blank field, a produce without a topic.
 */
export class ConfigurationError extends Error {
	constructor(
		message: string,
		public readonly field?: string,
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.name = "ConfigurationError";
	}
}

/**
 * A `with*` call was applied to a step of the wrong kind.
 */
export class IncompatibleStepError extends Error {
	constructor(
		public readonly expected: readonly string[],
		public readonly actual: string | undefined
	) {
		super(
			actual === undefined
				? `No current step. Expected a step of kind ${formatKinds(expected)}.`
				: `Current step is a '${actual}' step, expected ${formatKinds(expected)}.`
		);
		this.name = "IncompatibleStepError";
	}
}

/**
 * An operation is not valid in the scenario's current state.
 */
export class ScenarioStateError extends Error {
	constructor(
		message: string,
		public readonly state: string
	) {
		super(message);
		this.name = "ScenarioStateError";
	}
}

function formatKinds(kinds: readonly string[]): string {
	return kinds.map((kind) => `'${kind}'`).join(" or ");
}

// =============================================================================
// JSON Path Errors
// =============================================================================

/**
 * Base class for every error raised by the JSON path evaluator.
 */
export class JsonPathError extends Error {
	constructor(
		message: string,
		public readonly path?: string
	) {
		super(message);
		this.name = "JsonPathError";
	}
}

export class EmptyDocumentError extends JsonPathError {
	constructor(path?: string) {
		super(path ? `Cannot evaluate '${path}': document is empty` : "Document is empty", path);
		this.name = "EmptyDocumentError";
	}
}

export class MalformedDocumentError extends JsonPathError {
	constructor(reason: string, path?: string) {
		super(`Document is not valid JSON: ${reason}`, path);
		this.name = "MalformedDocumentError";
	}
}

export class InvalidPathError extends JsonPathError {
	constructor(
		path: string,
		public readonly reason: string,
		public readonly position: number
	) {
		super(`Invalid JSON path '${path}' at position ${position}: ${reason}`, path);
		this.name = "InvalidPathError";
	}
}

export class PathNotFoundError extends JsonPathError {
	constructor(
		path: string,
		public readonly segment: string
	) {
		super(`Key not found: '${segment}' does not resolve in '${path}'`, path);
		this.name = "PathNotFoundError";
	}
}

export class TypeMismatchError extends JsonPathError {
	constructor(
		path: string,
		public readonly expectedType: string,
		public readonly actualType: string,
		public readonly value: unknown
	) {
		super(`Value at '${path}' is ${actualType} ${formatValue(value)}, cannot convert to ${expectedType}`, path);
		this.name = "TypeMismatchError";
	}
}

// =============================================================================
// Execution Errors
// =============================================================================

/**
 * A step did not complete within its configured timeout.
 */
export class TimeoutError extends Error {
	constructor(
		message: string,
		public readonly timeoutMs: number
	) {
		super(message);
		this.name = "TimeoutError";
	}
}

/**
 * The broker acknowledged a produced message without persisting it.
 */
export class DeliveryFailureError extends Error {
	constructor(
		message: string,
		public readonly topic: string,
		public readonly status: string
	) {
		super(message);
		this.name = "DeliveryFailureError";
	}
}

/**
 * The HTTP transport or broker client failed before producing a response.
 */
export class TransportError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "TransportError";
	}
}

/**
 * An authentication exchange (e.g. an OAuth2 token request) failed.
 */
export class AuthenticationError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "AuthenticationError";
	}
}

// =============================================================================
// Assertion Errors
// =============================================================================

/**
 * A validation check failed. Carries what was expected, what was found and,
 * for JSON checks, the path that was evaluated.
 */
export class AssertionFailureError extends Error {
	readonly expected: unknown;
	readonly actual: unknown;
	readonly path?: string;

	constructor(
		message: string,
		details: { expected?: unknown; actual?: unknown; path?: string } = {},
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.name = "AssertionFailureError";
		this.expected = details.expected;
		this.actual = details.actual;
		this.path = details.path;
	}
}

/**
 * Normalize an unknown thrown value to an Error.
 */
export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
