/**
 * Step Executor
 *
 * Runs one step specification against its transport:
 * - resolve and apply the auth strategy (configuration errors are thrown)
 * - call the HTTP transport or broker adapter under the step's timeout
 * - classify the outcome into a StepResult (execution errors are captured)
 *
 * Produce steps without custom tuning, bootstrap servers or auth share one
 * lazily created producer. Every consume gets its own consumer.
 */

import { resolveHttpAuthStrategy, resolveMessagingAuthStrategy } from "../auth/auth.resolver";
import type { MessagingClientConfig } from "../auth/auth.types";
import { defaultTokenCache, type TokenCache } from "../auth/token-cache";
import { defaultJsonSerializer, JsonSerializer } from "../codecs/json.serializer";
import { DEFAULT_SETTINGS, type ScenarioSettings } from "../config/settings";
import {
	AuthenticationError,
	ConfigurationError,
	DeliveryFailureError,
	ScenarioStateError,
	TimeoutError,
	TransportError,
	toError,
} from "../errors";
import { FetchHttpTransport } from "../http/fetch.transport";
import type { HttpRequest, HttpTransport } from "../http/http.types";
import type {
	ConsumedMessage,
	DeliveryReport,
	MessageBrokerAdapter,
	OutgoingMessage,
} from "../messaging/broker.types";
import { SharedProducer } from "../messaging/shared-producer";
import {
	createBatchConsumeResult,
	createBatchProduceResult,
	createConsumedResult,
	createDeliveredResult,
	createHttpFailure,
	createHttpResult,
	createMessageFailure,
} from "../results/result.factory";
import type {
	BatchConsumeResult,
	BatchProduceResult,
	HttpStepResult,
	MessageStepResult,
	StepResult,
} from "../results/result.types";
import { BootstrapServersKey, ConsumerGroupKey, ScenarioContext } from "../scenario/scenario-context";
import type {
	BatchConsumeStep,
	BatchProduceStep,
	ConsumeStep,
	HttpStep,
	ProduceStep,
	ConsumerStepKind,
	MessagingStepKind,
	ProducerStepKind,
	StepOf,
	StepSpecification,
} from "../steps/step.types";
import { withTimeout } from "../utils";

// =============================================================================
// Types
// =============================================================================

export interface StepExecutorOptions {
	/** @default FetchHttpTransport */
	http?: HttpTransport;
	broker?: MessageBrokerAdapter;
	/** Producer shared across scenarios; the executor does not dispose it */
	sharedProducer?: SharedProducer;
	/** @default defaultTokenCache */
	tokenCache?: TokenCache;
	settings?: ScenarioSettings;
	context?: ScenarioContext;
}

/**
 * Extra time given to a consumer past the step timeout before it is
 * considered hung
 */
const CONSUMER_GRACE_MS = 1000;

interface SentMessage {
	key: string | null;
	value: string;
	headers: Record<string, string>;
	data: unknown;
}

// =============================================================================
// Executor
// =============================================================================

export class StepExecutor {
	private readonly http: HttpTransport;
	private readonly broker?: MessageBrokerAdapter;
	private readonly tokenCache: TokenCache;
	private readonly settings: ScenarioSettings;
	private readonly context: ScenarioContext;
	private readonly externalProducer?: SharedProducer;
	private ownedProducer?: SharedProducer;

	constructor(options: StepExecutorOptions = {}) {
		this.http = options.http ?? new FetchHttpTransport();
		this.broker = options.broker;
		this.tokenCache = options.tokenCache ?? defaultTokenCache;
		this.settings = options.settings ?? DEFAULT_SETTINGS;
		this.context = options.context ?? new ScenarioContext();
		this.externalProducer = options.sharedProducer;
	}

	/**
	 * Execute a step
	 *
	 * @throws ConfigurationError for incomplete auth or a missing broker adapter
	 */
	execute(step: StepOf<"http">): Promise<HttpStepResult>;
	execute(step: StepOf<"produce" | "consume">): Promise<MessageStepResult>;
	execute(step: StepOf<"batchProduce">): Promise<BatchProduceResult>;
	execute(step: StepOf<"batchConsume">): Promise<BatchConsumeResult>;
	execute(step: StepSpecification): Promise<StepResult>;
	execute(step: StepSpecification): Promise<StepResult> {
		switch (step.kind) {
			case "http":
				return this.executeHttp(step);
			case "produce":
				return this.executeProduce(step);
			case "consume":
				return this.executeConsume(step);
			case "batchProduce":
				return this.executeBatchProduce(step);
			case "batchConsume":
				return this.executeBatchConsume(step);
		}
	}

	/**
	 * Close the producer this executor created, if any
	 */
	async dispose(): Promise<void> {
		await this.ownedProducer?.dispose();
	}

	// =========================================================================
	// HTTP
	// =========================================================================

	private async executeHttp(step: HttpStep): Promise<HttpStepResult> {
		const startedAt = new Date();
		const strategy = resolveHttpAuthStrategy(step.auth ?? this.settings.httpAuth, {
			transport: this.http,
			tokenCache: this.tokenCache,
		});

		try {
			const request = buildHttpRequest(step);
			await strategy.apply(request);
			const response = await withTimeout(
				(signal) => this.http.send(request, signal),
				step.timeoutMs,
				`HTTP ${step.method} ${step.url} did not complete within timeout of ${step.timeoutMs}ms`
			);
			return createHttpResult(response, startedAt);
		} catch (error) {
			if (error instanceof ConfigurationError) {
				throw error;
			}
			return createHttpFailure(classifyError(error, `HTTP ${step.method} ${step.url} failed`), startedAt);
		}
	}

	// =========================================================================
	// Produce
	// =========================================================================

	private async executeProduce(step: ProduceStep): Promise<MessageStepResult> {
		const startedAt = new Date();
		const client = this.clientConfig(step);
		const broker = this.requireBroker();

		let sent: SentMessage;
		try {
			sent = encodeMessage(step, step.key, step.value);
		} catch (error) {
			return createMessageFailure(step.topic, error, startedAt);
		}

		const message: OutgoingMessage = {
			key: sent.key,
			value: sent.value,
			headers: sent.headers,
			partition: step.partition,
			timestamp: step.timestamp,
		};

		try {
			const reports = await withTimeout(
				() => this.send(broker, step, client, [message]),
				step.timeoutMs,
				`Failed to produce message to topic '${step.topic}' within timeout of ${step.timeoutMs}ms`
			);
			const report = reports[0];
			if (!report) {
				return createMessageFailure(step.topic, missingReport(step.topic, 0), startedAt, sent);
			}
			return createDeliveredResult(report, sent, startedAt, deliveryError(report));
		} catch (error) {
			return createMessageFailure(
				step.topic,
				classifyError(error, `Failed to produce message to topic '${step.topic}'`),
				startedAt,
				sent
			);
		}
	}

	private async executeBatchProduce(step: BatchProduceStep): Promise<BatchProduceResult> {
		const startedAt = new Date();
		const client = this.clientConfig(step);
		const broker = this.requireBroker();

		let sent: SentMessage[];
		try {
			sent = step.messages.map((message) => encodeMessage(step, message.key, message.value));
		} catch (error) {
			return createBatchProduceResult(step.topic, [], startedAt, error);
		}

		const messages: OutgoingMessage[] = sent.map((message) => ({
			key: message.key,
			value: message.value,
			headers: message.headers,
			partition: null,
			timestamp: null,
		}));

		try {
			const reports = await withTimeout(
				() => this.send(broker, step, client, messages),
				step.timeoutMs,
				`Failed to produce ${messages.length} message(s) to topic '${step.topic}' within timeout of ${step.timeoutMs}ms`
			);
			const results = sent.map((message, index) => {
				const report = reports[index];
				return report
					? createDeliveredResult(report, message, startedAt, deliveryError(report))
					: createMessageFailure(step.topic, missingReport(step.topic, index), startedAt, message);
			});
			return createBatchProduceResult(step.topic, results, startedAt);
		} catch (error) {
			return createBatchProduceResult(
				step.topic,
				[],
				startedAt,
				classifyError(error, `Failed to produce to topic '${step.topic}'`)
			);
		}
	}

	private async send(
		broker: MessageBrokerAdapter,
		step: StepOf<ProducerStepKind>,
		client: MessagingClientConfig,
		messages: OutgoingMessage[]
	): Promise<DeliveryReport[]> {
		const tuning = step.producerConfig ?? {};
		const custom = step.producerConfig !== null || step.bootstrapServers !== null || step.auth !== null;

		if (!custom) {
			const producer = await this.sharedProducer(broker).get();
			return producer.send(step.topic, messages, tuning);
		}

		const producer = await broker.createProducer({ client, tuning });
		try {
			return await producer.send(step.topic, messages, tuning);
		} finally {
			await producer.close();
		}
	}

	private sharedProducer(broker: MessageBrokerAdapter): SharedProducer {
		if (this.externalProducer) {
			return this.externalProducer;
		}
		if (!this.ownedProducer) {
			const client = this.clientConfig({ bootstrapServers: null, auth: null });
			this.ownedProducer = new SharedProducer(broker, { client, tuning: {} });
		}
		return this.ownedProducer;
	}

	// =========================================================================
	// Consume
	// =========================================================================

	private async executeConsume(step: ConsumeStep): Promise<MessageStepResult> {
		const startedAt = new Date();
		const client = this.clientConfig(step);
		const broker = this.requireBroker();
		const timeoutMessage = `No message consumed from topic '${step.topic}' within timeout of ${step.timeoutMs}ms`;

		try {
			const messages = await this.consume(broker, step, client, 1, timeoutMessage);
			const first = messages[0];
			if (!first) {
				return createMessageFailure(step.topic, new TimeoutError(timeoutMessage, step.timeoutMs), startedAt);
			}
			return createConsumedResult(first, step.expectedType, startedAt);
		} catch (error) {
			return createMessageFailure(
				step.topic,
				classifyError(error, `Failed to consume from topic '${step.topic}'`),
				startedAt
			);
		}
	}

	private async executeBatchConsume(step: BatchConsumeStep): Promise<BatchConsumeResult> {
		const startedAt = new Date();
		const client = this.clientConfig(step);
		const broker = this.requireBroker();

		try {
			const messages = await this.consume(
				broker,
				step,
				client,
				step.messageCount,
				`No messages consumed from topic '${step.topic}' within timeout of ${step.timeoutMs}ms`
			);
			const results = messages.map((message) => createConsumedResult(message, step.expectedType, startedAt));
			if (results.length < step.messageCount) {
				const shortfall = new TimeoutError(
					`Consumed ${results.length} of ${step.messageCount} messages from topic '${step.topic}' within timeout of ${step.timeoutMs}ms`,
					step.timeoutMs
				);
				return createBatchConsumeResult(step.topic, step.messageCount, results, startedAt, shortfall);
			}
			return createBatchConsumeResult(step.topic, step.messageCount, results, startedAt);
		} catch (error) {
			return createBatchConsumeResult(
				step.topic,
				step.messageCount,
				[],
				startedAt,
				classifyError(error, `Failed to consume from topic '${step.topic}'`)
			);
		}
	}

	private async consume(
		broker: MessageBrokerAdapter,
		step: StepOf<ConsumerStepKind>,
		client: MessagingClientConfig,
		count: number,
		timeoutMessage: string
	): Promise<ConsumedMessage[]> {
		const groupId = step.groupId ?? this.context.get(ConsumerGroupKey) ?? this.settings.consumerGroupId;
		const consumer = await broker.createConsumer({ client, groupId, tuning: step.consumerConfig ?? {} });
		try {
			return await withTimeout(
				() => consumer.consume(step.topic, { count, timeoutMs: step.timeoutMs }),
				step.timeoutMs + CONSUMER_GRACE_MS,
				timeoutMessage
			);
		} finally {
			await consumer.close();
		}
	}

	// =========================================================================
	// Connection
	// =========================================================================

	private requireBroker(): MessageBrokerAdapter {
		if (!this.broker) {
			throw new ConfigurationError("No message broker adapter configured for this scenario.", "broker");
		}
		return this.broker;
	}

	/**
	 * Effective client configuration: step value, then context, then settings
	 */
	private clientConfig(step: Pick<StepOf<MessagingStepKind>, "bootstrapServers" | "auth">): MessagingClientConfig {
		const brokers = step.bootstrapServers ?? this.context.get(BootstrapServersKey) ?? this.settings.bootstrapServers;
		const config: MessagingClientConfig = { brokers: [...brokers], securityProtocol: "plaintext" };
		resolveMessagingAuthStrategy(step.auth ?? this.settings.messagingAuth).apply(config);
		return config;
	}
}

// =============================================================================
// Helpers
// =============================================================================

function hasHeader(headers: Record<string, string>, name: string): boolean {
	const lower = name.toLowerCase();
	return Object.keys(headers).some((key) => key.toLowerCase() === lower);
}

/** Request bodies keep null properties so a field can be cleared */
const httpBodySerializer = new JsonSerializer({ omitNull: false });

/**
 * Translate an HTTP step into a mutable request
 */
export function buildHttpRequest(step: HttpStep): HttpRequest {
	const request: HttpRequest = {
		url: step.url,
		method: step.method,
		headers: { ...step.headers },
		query: step.queryParams.map((param) => ({ name: param.name, value: param.value })),
	};

	if (step.body !== undefined && step.body !== null) {
		if (typeof step.body === "string") {
			request.body = step.body;
		} else {
			request.body = httpBodySerializer.encode(step.body);
			if (!hasHeader(request.headers, "Content-Type")) {
				request.headers["Content-Type"] = "application/json";
			}
		}
	}
	return request;
}

function encodeMessage(step: StepOf<ProducerStepKind>, key: string | null, value: unknown): SentMessage {
	const serializer = step.jsonOptions ? new JsonSerializer(step.jsonOptions) : defaultJsonSerializer;
	return { key, value: serializer.encode(value), headers: { ...step.headers }, data: value };
}

function deliveryError(report: DeliveryReport): DeliveryFailureError | undefined {
	if (report.status === "persisted") {
		return undefined;
	}
	const detail = report.error ? `: ${report.error}` : "";
	return new DeliveryFailureError(
		`Message to topic '${report.topic}' was not persisted (status: ${report.status})${detail}`,
		report.topic,
		report.status
	);
}

function missingReport(topic: string, index: number): DeliveryFailureError {
	return new DeliveryFailureError(`Broker returned no delivery report for message ${index} to topic '${topic}'`, topic, "notPersisted");
}

/**
 * Keep already-classified failures, wrap everything else as a transport fault
 */
function classifyError(error: unknown, context: string): Error {
	if (
		error instanceof TimeoutError ||
		error instanceof DeliveryFailureError ||
		error instanceof AuthenticationError ||
		error instanceof TransportError ||
		error instanceof ScenarioStateError
	) {
		return error;
	}
	const cause = toError(error);
	return new TransportError(`${context}: ${cause.message}`, { cause });
}
