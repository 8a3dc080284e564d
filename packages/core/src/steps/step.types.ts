/**
 * Step Specification Types
 *
 * Immutable descriptions of one HTTP or messaging operation. Step objects
 * are frozen; reconfiguration always goes through `withStep`, which returns
 * a new instance.
 */

import type { HttpAuthConfig, MessagingAuthConfig } from "../auth/auth.types";
import type { JsonSerializerOptions } from "../codecs/json.serializer";
import type { HttpMethod, QueryParam } from "../http/http.types";
import type { ConsumerTuning, ProducerTuning } from "../messaging/broker.types";

/**
 * How consumed payloads are exposed as result data
 */
export type ExpectedPayloadType = "json" | "string";

export interface HttpStep {
	readonly kind: "http";
	readonly url: string;
	readonly method: HttpMethod;
	/** Strings are sent as-is, other values as JSON */
	readonly body: unknown;
	readonly headers: Readonly<Record<string, string>>;
	readonly queryParams: readonly Readonly<QueryParam>[];
	readonly timeoutMs: number;
	/** null falls back to the scenario's configured auth */
	readonly auth: HttpAuthConfig | null;
}

interface MessagingStepFields {
	readonly topic: string;
	readonly timeoutMs: number;
	/** null resolves from the scenario context, then from settings */
	readonly bootstrapServers: readonly string[] | null;
	/** null falls back to the scenario's configured auth */
	readonly auth: MessagingAuthConfig | null;
}

export interface ProduceStep extends MessagingStepFields {
	readonly kind: "produce";
	readonly key: string | null;
	readonly value: unknown;
	readonly headers: Readonly<Record<string, string>>;
	readonly partition: number | null;
	/** Epoch milliseconds */
	readonly timestamp: number | null;
	readonly producerConfig: Readonly<ProducerTuning> | null;
	readonly jsonOptions: Readonly<JsonSerializerOptions> | null;
}

export interface BatchMessage {
	readonly key: string | null;
	readonly value: unknown;
}

export interface BatchProduceStep extends MessagingStepFields {
	readonly kind: "batchProduce";
	readonly messages: readonly BatchMessage[];
	readonly headers: Readonly<Record<string, string>>;
	readonly producerConfig: Readonly<ProducerTuning> | null;
	readonly jsonOptions: Readonly<JsonSerializerOptions> | null;
}

interface ConsumerStepFields extends MessagingStepFields {
	/** null resolves from the scenario context, then from settings */
	readonly groupId: string | null;
	readonly consumerConfig: Readonly<ConsumerTuning> | null;
	readonly expectedType: ExpectedPayloadType;
}

export interface ConsumeStep extends ConsumerStepFields {
	readonly kind: "consume";
}

export interface BatchConsumeStep extends ConsumerStepFields {
	readonly kind: "batchConsume";
	readonly messageCount: number;
}

export type StepSpecification = HttpStep | ProduceStep | ConsumeStep | BatchProduceStep | BatchConsumeStep;

export type StepKind = StepSpecification["kind"];

export type StepOf<K extends StepKind> = Extract<StepSpecification, { kind: K }>;

export type MessagingStepKind = Exclude<StepKind, "http">;

export type ProducerStepKind = "produce" | "batchProduce";

export type ConsumerStepKind = "consume" | "batchConsume";

/**
 * Fields a `with*` call may replace on a step of type S
 */
export type StepChanges<S extends StepSpecification> = Partial<Omit<S, "kind">>;

/**
 * Fields shared by a family of variants, for code generic over the family
 */
export type SharedFieldChanges = Partial<Pick<HttpStep, "timeoutMs">>;

export type MessagingFieldChanges = Partial<Pick<ProduceStep, "timeoutMs" | "bootstrapServers" | "auth">>;

export type ProducerFieldChanges = MessagingFieldChanges &
	Partial<Pick<ProduceStep, "headers" | "producerConfig" | "jsonOptions">>;

export type ConsumerFieldChanges = MessagingFieldChanges &
	Partial<Pick<ConsumeStep, "groupId" | "consumerConfig" | "expectedType">>;
