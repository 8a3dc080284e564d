/**
 * Scenario Context
 *
 * String-keyed property bag shared by the steps of one scenario. Reads go
 * through typed keys whose guard checks the stored value, so a value of the
 * wrong type reads as absent instead of being coerced.
 *
 * @example
 * ```typescript
 * const TenantKey = contextKey("tenant", isString);
 * scenario.context.set(TenantKey, "acme");
 * scenario.context.get(TenantKey); // "acme"
 * ```
 */

import type { StepResult } from "../results/result.types";

export interface ContextKey<T> {
	readonly name: string;
	readonly guard: (value: unknown) => value is T;
}

export function contextKey<T>(name: string, guard: (value: unknown) => value is T): ContextKey<T> {
	return Object.freeze({ name, guard });
}

// =============================================================================
// Guards
// =============================================================================

export function isString(value: unknown): value is string {
	return typeof value === "string";
}

export function isStringArray(value: unknown): value is string[] {
	return Array.isArray(value) && value.every((item) => typeof item === "string");
}

const RESULT_KINDS: ReadonlySet<unknown> = new Set(["http", "message", "batchProduce", "batchConsume"]);

export function isStepResult(value: unknown): value is StepResult {
	return typeof value === "object" && value !== null && "kind" in value && RESULT_KINDS.has(value.kind);
}

// =============================================================================
// Well-known keys
// =============================================================================

/** Topic selected by `topic(name)` for the next messaging step */
export const TopicKey = contextKey("topic", isString);

/** Bootstrap servers used when a messaging step does not set its own */
export const BootstrapServersKey = contextKey("bootstrapServers", isStringArray);

/** Consumer group used when a consume step does not set its own */
export const ConsumerGroupKey = contextKey("consumerGroupId", isString);

/** Key under which `saveStep(name)` stores a result */
export function savedStepKey(name: string): ContextKey<StepResult> {
	return contextKey(`step:${name}`, isStepResult);
}

// =============================================================================
// Context
// =============================================================================

export class ScenarioContext {
	private readonly values = new Map<string, unknown>();

	get<T>(key: ContextKey<T>): T | undefined {
		if (key.name.trim().length === 0) {
			return undefined;
		}
		const value = this.values.get(key.name);
		return key.guard(value) ? value : undefined;
	}

	set<T>(key: ContextKey<T>, value: T): this {
		this.values.set(key.name, value);
		return this;
	}

	/**
	 * Untyped access by name
	 */
	getValue(name: string): unknown {
		return this.values.get(name);
	}

	setValue(name: string, value: unknown): this {
		this.values.set(name, value);
		return this;
	}

	has(key: ContextKey<unknown> | string): boolean {
		return this.values.has(typeof key === "string" ? key : key.name);
	}

	delete(key: ContextKey<unknown> | string): boolean {
		return this.values.delete(typeof key === "string" ? key : key.name);
	}

	keys(): string[] {
		return Array.from(this.values.keys());
	}

	clear(): void {
		this.values.clear();
	}

	get size(): number {
		return this.values.size;
	}
}
