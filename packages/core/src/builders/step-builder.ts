/**
 * Step Builder
 *
 * Base for the fluent `with*` builders. A builder holds no step of its own:
 * every call reads the scenario's current step, narrows it to the builder's
 * kind and hands a reconfigured copy back to the scenario.
 */

import { ConfigurationError, ScenarioStateError } from "../errors";
import type { StepResult } from "../results/result.types";
import { withStep } from "../steps/step.factory";
import type { StepSpecification } from "../steps/step.types";

/**
 * What a builder needs from the scenario that owns its step
 */
export interface StepHost {
	readonly currentStep: StepSpecification | undefined;
	/**
	 * Replace the current step
	 *
	 * @throws ScenarioStateError when the current step is executing or has completed
	 */
	replaceStep(change: (current: StepSpecification | undefined) => StepSpecification): void;
	execute(): Promise<StepResult>;
	saveStep(name: string): Promise<StepResult>;
}

export function requirePositiveTimeout(timeoutMs: number): number {
	if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
		throw new ConfigurationError("Timeout must be a positive number of milliseconds.", "timeoutMs");
	}
	return timeoutMs;
}

export function requireName(value: string, label: string): string {
	if (value.trim().length === 0) {
		throw new ConfigurationError(`${label} is required.`, label);
	}
	return value;
}

/**
 * Result of the wrong shape for the builder that executed it
 */
export function unexpectedResult(expected: string, result: StepResult): ScenarioStateError {
	return new ScenarioStateError(`Expected a '${expected}' result but the step produced '${result.kind}'`, "completed");
}

export abstract class StepBuilder<S extends StepSpecification, V> {
	constructor(protected readonly host: StepHost) {}

	/**
	 * Narrow the scenario's current step to this builder's kind
	 *
	 * @throws IncompatibleStepError
	 */
	protected abstract narrow(step: StepSpecification | undefined): S;

	/**
	 * Wrap an executed result in its validation builder
	 */
	protected abstract validate(result: StepResult): V;

	/**
	 * The current step, as this builder's kind
	 */
	get step(): S {
		return this.narrow(this.host.currentStep);
	}

	protected update(change: (step: S) => S): this {
		this.host.replaceStep((current) => change(this.narrow(current)));
		return this;
	}

	when(): this {
		return this;
	}

	and(): this {
		return this;
	}

	withTimeout(timeoutMs: number): this {
		const value = requirePositiveTimeout(timeoutMs);
		return this.update((step) => withStep(step, { timeoutMs: value }));
	}

	/**
	 * Execute the current step and wait for its result
	 */
	async execute(): Promise<V> {
		this.narrow(this.host.currentStep);
		return this.validate(await this.host.execute());
	}

	/**
	 * Execute the current step and keep its result in the scenario context
	 * under `name`
	 */
	async saveStep(name: string): Promise<V> {
		this.narrow(this.host.currentStep);
		return this.validate(await this.host.saveStep(name));
	}
}
