/**
 * Messaging Step Builders
 *
 * Builders for produce, consume and their batch variants. Connection and
 * authentication settings are shared by every messaging kind; producer and
 * consumer settings by the kinds that produce or consume.
 */

import { validateMessagingAuthConfig } from "../auth/auth.resolver";
import type { MessagingAuthConfig, MessagingAuthConfigMap, SslSettings } from "../auth/auth.types";
import type { JsonSerializerOptions } from "../codecs/json.serializer";
import { ConfigurationError } from "../errors";
import type { ConsumerTuning, ProducerTuning } from "../messaging/broker.types";
import type { BatchConsumeResult, BatchProduceResult, StepResult } from "../results/result.types";
import { requireStepKind, withStep } from "../steps/step.factory";
import type {
	BatchConsumeStep,
	BatchProduceStep,
	ConsumeStep,
	ConsumerStepKind,
	ExpectedPayloadType,
	MessagingStepKind,
	ProduceStep,
	ProducerStepKind,
	StepOf,
	StepSpecification,
} from "../steps/step.types";
import { isBlank } from "../utils";
import { BatchValidationBuilder } from "../validation/batch.validation";
import { MessageValidationBuilder } from "../validation/message.validation";
import { requireName, StepBuilder, unexpectedResult } from "./step-builder";

type SaslAuthConfig = MessagingAuthConfigMap["saslPlain" | "saslScram256" | "saslScram512"];

export type ScramMechanism = "scram-sha-256" | "scram-sha-512";

function isSaslAuth(auth: MessagingAuthConfig | null): auth is SaslAuthConfig {
	return auth?.type === "saslPlain" || auth?.type === "saslScram256" || auth?.type === "saslScram512";
}

/**
 * SSL block carried by the current auth, so SASL and SSL can be configured
 * in either order
 */
function currentSsl(auth: MessagingAuthConfig | null): SslSettings | null {
	if (auth === null || auth.type === "none") {
		return null;
	}
	return auth.ssl ?? null;
}

/**
 * Split a comma-separated server list, or trim an array of servers
 */
export function parseBootstrapServers(servers: string | readonly string[]): string[] {
	const list = typeof servers === "string" ? servers.split(",") : servers;
	const trimmed = list.map((server) => server.trim()).filter((server) => server.length > 0);
	if (trimmed.length === 0) {
		throw new ConfigurationError("At least one bootstrap server is required.", "bootstrapServers");
	}
	return trimmed;
}

// =============================================================================
// Shared messaging configuration
// =============================================================================

export abstract class MessagingStepBuilder<S extends StepOf<MessagingStepKind>, V> extends StepBuilder<S, V> {
	withBootstrapServers(servers: string | readonly string[]): this {
		const bootstrapServers = parseBootstrapServers(servers);
		return this.update((step) => withStep(step, { bootstrapServers }));
	}

	/**
	 * Attach a messaging auth configuration, validated now
	 */
	withMessagingAuth(auth: MessagingAuthConfig): this {
		validateMessagingAuthConfig(auth);
		return this.update((step) => withStep(step, { auth }));
	}

	withNoMessagingAuth(): this {
		return this.withMessagingAuth({ type: "none" });
	}

	withSaslPlain(username: string, password: string, useSsl = true): this {
		return this.withMessagingAuth({
			type: "saslPlain",
			saslPlain: { username, password, useSsl },
			ssl: currentSsl(this.step.auth),
		});
	}

	withSaslScram(username: string, password: string, mechanism: ScramMechanism = "scram-sha-256", useSsl = true): this {
		return this.withMessagingAuth({
			type: mechanism === "scram-sha-512" ? "saslScram512" : "saslScram256",
			saslScram: { username, password, useSsl },
			ssl: currentSsl(this.step.auth),
		});
	}

	/**
	 * Encrypt the connection. On a SASL step the settings become its SSL
	 * overlay.
	 */
	withSsl(settings: SslSettings = {}): this {
		const auth = this.step.auth;
		return this.withMessagingAuth(isSaslAuth(auth) ? { ...auth, ssl: settings } : { type: "ssl", ssl: settings });
	}

	withMutualTls(settings: SslSettings): this {
		if (isBlank(settings.certificateLocation) || isBlank(settings.keyLocation)) {
			throw new ConfigurationError("Mutual TLS requires both certificateLocation and keyLocation.", "ssl");
		}
		const auth = this.step.auth;
		return this.withMessagingAuth(isSaslAuth(auth) ? { ...auth, ssl: settings } : { type: "mutualTls", ssl: settings });
	}
}

// =============================================================================
// Producers
// =============================================================================

export abstract class ProducerStepBuilder<S extends StepOf<ProducerStepKind>, V> extends MessagingStepBuilder<S, V> {
	withHeader(name: string, value: string): this {
		requireName(name, "Header name");
		return this.update((step) => withStep(step, { headers: { ...step.headers, [name]: value } }));
	}

	withHeaders(headers: Readonly<Record<string, string>>): this {
		for (const name of Object.keys(headers)) {
			requireName(name, "Header name");
		}
		return this.update((step) => withStep(step, { headers: { ...step.headers, ...headers } }));
	}

	/**
	 * Merge producer tuning into what earlier calls set. Any tuning gives the
	 * step a dedicated producer.
	 */
	withProducerConfig(tuning: ProducerTuning): this {
		if (tuning.batchSize !== undefined && (!Number.isInteger(tuning.batchSize) || tuning.batchSize <= 0)) {
			throw new ConfigurationError("Producer batchSize must be a positive integer.", "batchSize");
		}
		if (tuning.lingerMs !== undefined && tuning.lingerMs < 0) {
			throw new ConfigurationError("Producer lingerMs must not be negative.", "lingerMs");
		}
		return this.update((step) => withStep(step, { producerConfig: { ...step.producerConfig, ...tuning } }));
	}

	withJsonOptions(options: JsonSerializerOptions): this {
		return this.update((step) => withStep(step, { jsonOptions: { ...step.jsonOptions, ...options } }));
	}
}

export class ProduceStepBuilder extends ProducerStepBuilder<ProduceStep, MessageValidationBuilder> {
	protected narrow(step: StepSpecification | undefined): ProduceStep {
		return requireStepKind(step, ["produce"]);
	}

	protected validate(result: StepResult): MessageValidationBuilder {
		if (result.kind !== "message") {
			throw unexpectedResult("message", result);
		}
		return new MessageValidationBuilder(result);
	}

	withKey(key: string | null): this {
		return this.update((step) => withStep(step, { key }));
	}

	withValue(value: unknown): this {
		return this.update((step) => withStep(step, { value }));
	}

	withPartition(partition: number): this {
		if (!Number.isInteger(partition) || partition < 0) {
			throw new ConfigurationError("Partition must be a non-negative integer.", "partition");
		}
		return this.update((step) => withStep(step, { partition }));
	}

	withTimestamp(timestamp: Date | number): this {
		const value = timestamp instanceof Date ? timestamp.getTime() : timestamp;
		if (!Number.isFinite(value)) {
			throw new ConfigurationError("Timestamp must be a valid date.", "timestamp");
		}
		return this.update((step) => withStep(step, { timestamp: value }));
	}
}

export class BatchProduceStepBuilder extends ProducerStepBuilder<
	BatchProduceStep,
	BatchValidationBuilder<BatchProduceResult>
> {
	protected narrow(step: StepSpecification | undefined): BatchProduceStep {
		return requireStepKind(step, ["batchProduce"]);
	}

	protected validate(result: StepResult): BatchValidationBuilder<BatchProduceResult> {
		if (result.kind !== "batchProduce") {
			throw unexpectedResult("batchProduce", result);
		}
		return new BatchValidationBuilder(result);
	}

	addMessage(value: unknown, key: string | null = null): this {
		return this.update((step) => withStep(step, { messages: [...step.messages, { key, value }] }));
	}
}

// =============================================================================
// Consumers
// =============================================================================

export abstract class ConsumerStepBuilder<S extends StepOf<ConsumerStepKind>, V> extends MessagingStepBuilder<S, V> {
	withGroupId(groupId: string): this {
		requireName(groupId, "Consumer group ID");
		return this.update((step) => withStep(step, { groupId }));
	}

	withConsumerConfig(tuning: ConsumerTuning): this {
		return this.update((step) => withStep(step, { consumerConfig: { ...step.consumerConfig, ...tuning } }));
	}

	withExpectedType(expectedType: ExpectedPayloadType): this {
		return this.update((step) => withStep(step, { expectedType }));
	}
}

export class ConsumeStepBuilder extends ConsumerStepBuilder<ConsumeStep, MessageValidationBuilder> {
	protected narrow(step: StepSpecification | undefined): ConsumeStep {
		return requireStepKind(step, ["consume"]);
	}

	protected validate(result: StepResult): MessageValidationBuilder {
		if (result.kind !== "message") {
			throw unexpectedResult("message", result);
		}
		return new MessageValidationBuilder(result);
	}
}

export class BatchConsumeStepBuilder extends ConsumerStepBuilder<
	BatchConsumeStep,
	BatchValidationBuilder<BatchConsumeResult>
> {
	protected narrow(step: StepSpecification | undefined): BatchConsumeStep {
		return requireStepKind(step, ["batchConsume"]);
	}

	protected validate(result: StepResult): BatchValidationBuilder<BatchConsumeResult> {
		if (result.kind !== "batchConsume") {
			throw unexpectedResult("batchConsume", result);
		}
		return new BatchValidationBuilder(result);
	}

	withMessageCount(messageCount: number): this {
		return this.update((step) => withStep(step, { messageCount: requireMessageCount(messageCount) }));
	}
}

export function requireMessageCount(count: number): number {
	if (!Number.isInteger(count) || count <= 0) {
		throw new ConfigurationError("Message count must be a positive integer.", "messageCount");
	}
	return count;
}
