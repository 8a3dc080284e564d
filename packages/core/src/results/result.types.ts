/**
 * Step Result Types
 *
 * The outcome of executing one step. Results are frozen once created.
 */

import type { DeliveryStatus } from "../messaging/broker.types";

export type StepStatus = "succeeded" | "failed";

export interface StepMetadata {
	readonly startedAt: Date;
	readonly completedAt: Date;
	readonly durationMs: number;
	readonly status: StepStatus;
	readonly attemptCount: number;
}

interface StepResultBase {
	readonly success: boolean;
	readonly errors: readonly string[];
	/** The classified failure, when there is one */
	readonly error?: Error;
	/** Parsed payload: response body, consumed value or produced value */
	readonly data: unknown;
	readonly properties: Readonly<Record<string, unknown>>;
	readonly metadata: StepMetadata;
}

export interface HttpStepResult extends StepResultBase {
	readonly kind: "http";
	/** 0 when no response was received */
	readonly statusCode: number;
	readonly reasonPhrase: string;
	/** Lower-cased header names */
	readonly headers: Readonly<Record<string, string>>;
	readonly contentType: string | null;
	readonly body: string | null;
	readonly isSuccessStatusCode: boolean;
	readonly isRedirect: boolean;
	readonly isClientError: boolean;
	readonly isServerError: boolean;
}

export interface MessageStepResult extends StepResultBase {
	readonly kind: "message";
	readonly topic: string;
	readonly partition: number | null;
	readonly offset: string | null;
	/** Epoch milliseconds */
	readonly timestamp: number | null;
	readonly key: string | null;
	/** Wire value */
	readonly value: string | null;
	readonly headers: Readonly<Record<string, string>>;
	readonly status: DeliveryStatus;
}

export interface BatchProduceResult extends StepResultBase {
	readonly kind: "batchProduce";
	readonly topic: string;
	readonly results: readonly MessageStepResult[];
}

export interface BatchConsumeResult extends StepResultBase {
	readonly kind: "batchConsume";
	readonly topic: string;
	readonly expectedCount: number;
	readonly results: readonly MessageStepResult[];
}

export type StepResult = HttpStepResult | MessageStepResult | BatchProduceResult | BatchConsumeResult;

/**
 * Result type produced by each step kind
 */
export interface StepResultMap {
	http: HttpStepResult;
	produce: MessageStepResult;
	consume: MessageStepResult;
	batchProduce: BatchProduceResult;
	batchConsume: BatchConsumeResult;
}
