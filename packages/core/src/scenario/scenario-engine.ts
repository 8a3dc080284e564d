/**
 * Scenario Engine
 *
 * Sequences Given → When → Then for one scenario. An entry point attaches a
 * step, builders reconfigure it, and `execute()` runs it once:
 *
 *   building ──execute()──▶ executing ──▶ completed
 *      ▲                                      │
 *      └──────── next entry point ────────────┘
 *
 * @example
 * ```typescript
 * const scenario = given({ broker });
 * await scenario.topic("orders").produce("order-1", { total: 42 }).execute();
 * const consumed = await scenario.topic("orders").consume().execute();
 * consumed.assertSuccess().assertJsonPath("$.total", 42);
 * await scenario.dispose();
 * ```
 */

import type { TokenCache } from "../auth/token-cache";
import { HttpStepBuilder } from "../builders/http.step-builder";
import {
	BatchConsumeStepBuilder,
	BatchProduceStepBuilder,
	ConsumeStepBuilder,
	ProduceStepBuilder,
	requireMessageCount,
} from "../builders/messaging.step-builder";
import { requireName, type StepHost } from "../builders/step-builder";
import { DEFAULT_SETTINGS, parseSettings, type ScenarioSettings } from "../config/settings";
import { ConfigurationError, ScenarioStateError, toError } from "../errors";
import { StepExecutor } from "../execution/step-executor";
import type { HttpTransport } from "../http/http.types";
import type { MessageBrokerAdapter } from "../messaging/broker.types";
import type { SharedProducer } from "../messaging/shared-producer";
import { createStepReport, type ScenarioReporter } from "../reporting/reporter";
import type { StepResult } from "../results/result.types";
import {
	createBatchConsumeStep,
	createBatchProduceStep,
	createConsumeStep,
	createHttpStep,
	createProduceStep,
} from "../steps/step.factory";
import type { BatchMessage, StepSpecification } from "../steps/step.types";
import { generateId } from "../utils";
import { savedStepKey, ScenarioContext, TopicKey } from "./scenario-context";

export type ScenarioState = "building" | "executing" | "completed";

export interface ScenarioOptions {
	/** Shown in reports */
	name?: string;
	/** @default FetchHttpTransport */
	http?: HttpTransport;
	/** Required for messaging steps */
	broker?: MessageBrokerAdapter;
	/** Producer shared with other scenarios; not disposed with this one */
	sharedProducer?: SharedProducer;
	tokenCache?: TokenCache;
	/** Validated and completed with defaults */
	settings?: Partial<ScenarioSettings>;
	reporter?: ScenarioReporter;
}

/**
 * A batch message with a key. Build with `keyedMessage(key, value)`.
 */
export class KeyedMessage {
	constructor(
		readonly key: string | null,
		readonly value: unknown
	) {}
}

export function keyedMessage(key: string | null, value: unknown): KeyedMessage {
	return new KeyedMessage(key, value);
}

/**
 * A message for `produceBatch`: a `KeyedMessage`, or any other value sent
 * unkeyed as it is
 */
export type BatchMessageInput = unknown;

function toBatchMessage(input: BatchMessageInput): BatchMessage {
	return input instanceof KeyedMessage ? { key: input.key, value: input.value } : { key: null, value: input };
}

export class ScenarioEngine implements StepHost {
	readonly id: string;
	readonly name?: string;
	readonly context = new ScenarioContext();
	readonly settings: ScenarioSettings;

	private readonly executor: StepExecutor;
	private readonly reporter?: ScenarioReporter;
	private step?: StepSpecification;
	private _state: ScenarioState = "building";
	private inFlight?: Promise<StepResult>;
	private result?: StepResult;
	private stepCount = 0;
	private disposed = false;

	constructor(options: ScenarioOptions = {}) {
		this.id = generateId("scenario_");
		this.name = options.name;
		this.settings = options.settings ? parseSettings({ ...DEFAULT_SETTINGS, ...options.settings }) : DEFAULT_SETTINGS;
		this.reporter = options.reporter;
		this.executor = new StepExecutor({
			http: options.http,
			broker: options.broker,
			sharedProducer: options.sharedProducer,
			tokenCache: options.tokenCache,
			settings: this.settings,
			context: this.context,
		});
	}

	get state(): ScenarioState {
		return this._state;
	}

	get currentStep(): StepSpecification | undefined {
		return this.step;
	}

	/**
	 * Result of the most recently completed step
	 */
	get lastResult(): StepResult | undefined {
		return this.result;
	}

	// =========================================================================
	// Entry points
	// =========================================================================

	apiResource(url: string): HttpStepBuilder {
		requireName(url, "Resource URL");
		this.attach(createHttpStep(url, this.settings.httpTimeoutMs));
		return new HttpStepBuilder(this);
	}

	/**
	 * Select the topic used by the messaging entry points that follow
	 */
	topic(name: string): this {
		requireName(name, "Topic name");
		this.context.set(TopicKey, name);
		return this;
	}

	produce(value: unknown): ProduceStepBuilder;
	produce(key: string | null, value: unknown): ProduceStepBuilder;
	produce(...args: [unknown] | [string | null, unknown]): ProduceStepBuilder {
		const topic = this.requireTopic("produce");
		const step =
			args.length === 1
				? createProduceStep(topic, args[0], null, this.settings.messageTimeoutMs)
				: createProduceStep(topic, args[1], args[0], this.settings.messageTimeoutMs);
		this.attach(step);
		return new ProduceStepBuilder(this);
	}

	consume(): ConsumeStepBuilder {
		this.attach(createConsumeStep(this.requireTopic("consume"), this.settings.messageTimeoutMs));
		return new ConsumeStepBuilder(this);
	}

	/**
	 * Produce several messages. Wrap an item with `keyedMessage()` to give it
	 * a key; every other item is sent unkeyed, whatever its shape.
	 */
	produceBatch(messages: readonly BatchMessageInput[]): BatchProduceStepBuilder {
		const topic = this.requireTopic("produceBatch");
		if (messages.length === 0) {
			throw new ConfigurationError("At least one message is required for a batch produce.", "messages");
		}
		this.attach(createBatchProduceStep(topic, messages.map(toBatchMessage), this.settings.batchTimeoutMs));
		return new BatchProduceStepBuilder(this);
	}

	consumeBatch(count: number): BatchConsumeStepBuilder {
		const topic = this.requireTopic("consumeBatch");
		this.attach(createBatchConsumeStep(topic, requireMessageCount(count), this.settings.batchTimeoutMs));
		return new BatchConsumeStepBuilder(this);
	}

	// =========================================================================
	// Step lifecycle
	// =========================================================================

	replaceStep(change: (current: StepSpecification | undefined) => StepSpecification): void {
		this.requireNotDisposed();
		if (this._state !== "building") {
			throw new ScenarioStateError(
				this._state === "executing"
					? "Cannot reconfigure a step while it is executing."
					: "Cannot reconfigure a step that has already been executed. Start a new step first.",
				this._state
			);
		}
		this.step = change(this.step);
	}

	/**
	 * Execute the current step. Concurrent calls share one execution; calls
	 * after completion return the stored result.
	 *
	 * @throws ConfigurationError when there is no step or its configuration is incomplete
	 */
	async execute(): Promise<StepResult> {
		this.requireNotDisposed();
		if (this._state === "completed" && this.result) {
			return this.result;
		}
		if (this.inFlight) {
			return this.inFlight;
		}
		const step = this.step;
		if (!step) {
			throw new ConfigurationError("No step to execute. Start one with apiResource() or topic().");
		}

		this._state = "executing";
		this.inFlight = this.run(step);
		return this.inFlight;
	}

	/**
	 * Execute the current step and keep its result under `name`
	 */
	async saveStep(name: string): Promise<StepResult> {
		requireName(name, "Step name");
		const result = await this.execute();
		this.context.set(savedStepKey(name), result);
		return result;
	}

	getSavedStep(name: string): StepResult | undefined {
		return this.context.get(savedStepKey(name));
	}

	/**
	 * Release the producer this scenario created and clear its context.
	 * Later calls are no-ops.
	 */
	async dispose(): Promise<void> {
		if (this.disposed) {
			return;
		}
		this.disposed = true;
		this.context.clear();
		await this.executor.dispose();
	}

	// =========================================================================
	// Internals
	// =========================================================================

	private async run(step: StepSpecification): Promise<StepResult> {
		try {
			this.reporter?.onStepStart?.(step, this.id);
			const result = await this.executor.execute(step);
			this.result = result;
			this._state = "completed";
			this.stepCount += 1;
			this.reporter?.onStepComplete(createStepReport(this.id, this.stepCount, step, result), result);
			return result;
		} catch (error) {
			this._state = "building";
			this.reporter?.onError?.(toError(error), this.id);
			throw error;
		} finally {
			this.inFlight = undefined;
		}
	}

	private attach(step: StepSpecification): void {
		this.requireNotDisposed();
		if (this._state === "executing") {
			throw new ScenarioStateError("Cannot start a new step while the current one is executing.", this._state);
		}
		this.step = step;
		this._state = "building";
	}

	private requireTopic(operation: string): string {
		const topic = this.context.get(TopicKey);
		if (topic === undefined) {
			throw new ConfigurationError(`No topic specified. Call topic() before ${operation}().`, "topic");
		}
		return topic;
	}

	private requireNotDisposed(): void {
		if (this.disposed) {
			throw new ScenarioStateError("Scenario has been disposed.", "disposed");
		}
	}
}

/**
 * Start a scenario
 */
export function given(options?: ScenarioOptions): ScenarioEngine {
	return new ScenarioEngine(options);
}
