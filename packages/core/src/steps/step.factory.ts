/**
 * Step Factory
 *
 * Creates step specifications with their defaults and derives reconfigured
 * copies. `withStep` is the only place a step is copied, so a field added to
 * a variant is carried through every `with*` call automatically.
 */

import { IncompatibleStepError } from "../errors";
import type {
	BatchConsumeStep,
	BatchMessage,
	BatchProduceStep,
	ConsumeStep,
	ConsumerFieldChanges,
	ConsumerStepKind,
	HttpStep,
	MessagingFieldChanges,
	MessagingStepKind,
	ProduceStep,
	ProducerFieldChanges,
	ProducerStepKind,
	SharedFieldChanges,
	StepChanges,
	StepKind,
	StepOf,
	StepSpecification,
} from "./step.types";

export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;
export const DEFAULT_MESSAGE_TIMEOUT_MS = 30_000;
export const DEFAULT_BATCH_TIMEOUT_MS = 60_000;

// =============================================================================
// Copying
// =============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (typeof value !== "object" || value === null) {
		return false;
	}
	const prototype = Object.getPrototypeOf(value);
	return prototype === Object.prototype || prototype === null;
}

/**
 * Deep-copy plain objects and arrays, freezing every copy. Class instances,
 * functions and primitives are kept by reference.
 */
export function snapshot<T>(value: T): T;
export function snapshot(value: unknown): unknown {
	if (Array.isArray(value)) {
		return Object.freeze(value.map((item: unknown) => snapshot(item)));
	}
	if (isPlainObject(value)) {
		const copy: Record<string, unknown> = {};
		for (const [key, item] of Object.entries(value)) {
			copy[key] = snapshot(item);
		}
		return Object.freeze(copy);
	}
	return value;
}

/**
 * Return a new step with `changes` applied. The input step is not modified
 * and shares no mutable structure with the result.
 */
export function withStep<S extends StepSpecification>(step: S, changes: StepChanges<S>): S;
export function withStep<S extends StepOf<ProducerStepKind>>(step: S, changes: ProducerFieldChanges): S;
export function withStep<S extends StepOf<ConsumerStepKind>>(step: S, changes: ConsumerFieldChanges): S;
export function withStep<S extends StepOf<MessagingStepKind>>(step: S, changes: MessagingFieldChanges): S;
export function withStep<S extends StepSpecification>(step: S, changes: SharedFieldChanges): S;
export function withStep(step: StepSpecification, changes: object): StepSpecification {
	return snapshot({ ...step, ...changes });
}

// =============================================================================
// Construction
// =============================================================================

export function createHttpStep(url: string, timeoutMs = DEFAULT_HTTP_TIMEOUT_MS): HttpStep {
	const step: HttpStep = {
		kind: "http",
		url,
		method: "GET",
		body: undefined,
		headers: {},
		queryParams: [],
		timeoutMs,
		auth: null,
	};
	return snapshot(step);
}

export function createProduceStep(
	topic: string,
	value: unknown,
	key: string | null = null,
	timeoutMs = DEFAULT_MESSAGE_TIMEOUT_MS
): ProduceStep {
	const step: ProduceStep = {
		kind: "produce",
		topic,
		key,
		value,
		headers: {},
		partition: null,
		timestamp: null,
		timeoutMs,
		bootstrapServers: null,
		auth: null,
		producerConfig: null,
		jsonOptions: null,
	};
	return snapshot(step);
}

export function createConsumeStep(topic: string, timeoutMs = DEFAULT_MESSAGE_TIMEOUT_MS): ConsumeStep {
	const step: ConsumeStep = {
		kind: "consume",
		topic,
		groupId: null,
		timeoutMs,
		bootstrapServers: null,
		auth: null,
		consumerConfig: null,
		expectedType: "json",
	};
	return snapshot(step);
}

export function createBatchProduceStep(
	topic: string,
	messages: readonly BatchMessage[],
	timeoutMs = DEFAULT_BATCH_TIMEOUT_MS
): BatchProduceStep {
	const step: BatchProduceStep = {
		kind: "batchProduce",
		topic,
		messages,
		headers: {},
		timeoutMs,
		bootstrapServers: null,
		auth: null,
		producerConfig: null,
		jsonOptions: null,
	};
	return snapshot(step);
}

export function createBatchConsumeStep(
	topic: string,
	messageCount: number,
	timeoutMs = DEFAULT_BATCH_TIMEOUT_MS
): BatchConsumeStep {
	const step: BatchConsumeStep = {
		kind: "batchConsume",
		topic,
		messageCount,
		groupId: null,
		timeoutMs,
		bootstrapServers: null,
		auth: null,
		consumerConfig: null,
		expectedType: "json",
	};
	return snapshot(step);
}

// =============================================================================
// Inspection
// =============================================================================

export function isStepOfKind<K extends StepKind>(
	step: StepSpecification | undefined,
	kinds: readonly K[]
): step is StepOf<K> {
	if (step === undefined) {
		return false;
	}
	const actual: StepKind = step.kind;
	return kinds.some((kind) => kind === actual);
}

/**
 * Narrow a step to one of `kinds`
 *
 * @throws IncompatibleStepError when the step is missing or of another kind
 */
export function requireStepKind<K extends StepKind>(step: StepSpecification | undefined, kinds: readonly K[]): StepOf<K> {
	if (!isStepOfKind(step, kinds)) {
		throw new IncompatibleStepError(kinds, step?.kind);
	}
	return step;
}

/**
 * One-line description for reports
 */
export function describeStep(step: StepSpecification): string {
	switch (step.kind) {
		case "http":
			return `${step.method} ${step.url}`;
		case "produce":
			return `Produce to '${step.topic}'${step.key === null ? "" : ` (key: ${step.key})`}`;
		case "consume":
			return `Consume from '${step.topic}'`;
		case "batchProduce":
			return `Produce ${step.messages.length} message(s) to '${step.topic}'`;
		case "batchConsume":
			return `Consume ${step.messageCount} message(s) from '${step.topic}'`;
	}
}
