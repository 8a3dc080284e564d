/**
 * Step Result Factory
 */

import { defaultJsonSerializer } from "../codecs/json.serializer";
import { toError } from "../errors";
import type { HttpResponse } from "../http/http.types";
import type { ConsumedMessage, DeliveryReport, DeliveryStatus } from "../messaging/broker.types";
import type { ExpectedPayloadType } from "../steps/step.types";
import { snapshot } from "../steps/step.factory";
import type {
	BatchConsumeResult,
	BatchProduceResult,
	HttpStepResult,
	MessageStepResult,
	StepMetadata,
} from "./result.types";

export function createMetadata(startedAt: Date, success: boolean, completedAt: Date = new Date()): StepMetadata {
	return {
		startedAt,
		completedAt,
		durationMs: completedAt.getTime() - startedAt.getTime(),
		status: success ? "succeeded" : "failed",
		attemptCount: 1,
	};
}

/**
 * Parse a payload when it looks like JSON, otherwise return it unchanged
 */
export function parsePayload(text: string | null, expectedType: ExpectedPayloadType = "json"): unknown {
	if (text === null || text.length === 0) {
		return null;
	}
	return expectedType === "string" ? text : defaultJsonSerializer.decode(text);
}

function isJsonContentType(contentType: string | null): boolean {
	if (!contentType) {
		return false;
	}
	const mediaType = contentType.split(";")[0].trim().toLowerCase();
	return mediaType === "application/json" || mediaType.endsWith("+json");
}

// =============================================================================
// HTTP
// =============================================================================

export function createHttpResult(response: HttpResponse, startedAt: Date): HttpStepResult {
	const status = response.status;
	const success = status >= 200 && status <= 299;
	const contentType = response.headers["content-type"] ?? null;
	const errors = success ? [] : [`Request failed with status code ${status}${response.statusText ? ` (${response.statusText})` : ""}`];

	const result: HttpStepResult = {
		kind: "http",
		success,
		errors,
		data: isJsonContentType(contentType) ? parsePayload(response.body) : response.body,
		properties: {},
		metadata: createMetadata(startedAt, success),
		statusCode: status,
		reasonPhrase: response.statusText,
		headers: response.headers,
		contentType,
		body: response.body,
		isSuccessStatusCode: success,
		isRedirect: status >= 300 && status <= 399,
		isClientError: status >= 400 && status <= 499,
		isServerError: status >= 500 && status <= 599,
	};
	return snapshot(result);
}

/**
 * Result for a request that produced no response
 */
export function createHttpFailure(error: unknown, startedAt: Date): HttpStepResult {
	const cause = toError(error);
	const result: HttpStepResult = {
		kind: "http",
		success: false,
		errors: [cause.message],
		error: cause,
		data: null,
		properties: {},
		metadata: createMetadata(startedAt, false),
		statusCode: 0,
		reasonPhrase: "",
		headers: {},
		contentType: null,
		body: null,
		isSuccessStatusCode: false,
		isRedirect: false,
		isClientError: false,
		isServerError: false,
	};
	return snapshot(result);
}

// =============================================================================
// Messaging
// =============================================================================

interface MessageResultInput {
	topic: string;
	partition: number | null;
	offset: string | null;
	timestamp: number | null;
	key: string | null;
	value: string | null;
	headers: Record<string, string>;
	status: DeliveryStatus;
	data: unknown;
	error?: Error;
}

export function createMessageResult(input: MessageResultInput, startedAt: Date): MessageStepResult {
	const success = input.error === undefined && input.status === "persisted";
	const result: MessageStepResult = {
		kind: "message",
		success,
		errors: input.error ? [input.error.message] : [],
		error: input.error,
		data: input.data,
		properties: {},
		metadata: createMetadata(startedAt, success),
		topic: input.topic,
		partition: input.partition,
		offset: input.offset,
		timestamp: input.timestamp,
		key: input.key,
		value: input.value,
		headers: input.headers,
		status: input.status,
	};
	return snapshot(result);
}

export function createDeliveredResult(
	report: DeliveryReport,
	sent: { key: string | null; value: string; headers: Record<string, string>; data: unknown },
	startedAt: Date,
	error?: Error
): MessageStepResult {
	return createMessageResult(
		{
			topic: report.topic,
			partition: report.partition,
			offset: report.offset,
			timestamp: report.timestamp,
			key: sent.key,
			value: sent.value,
			headers: sent.headers,
			status: report.status,
			data: sent.data,
			error,
		},
		startedAt
	);
}

export function createConsumedResult(
	message: ConsumedMessage,
	expectedType: ExpectedPayloadType,
	startedAt: Date
): MessageStepResult {
	return createMessageResult(
		{
			topic: message.topic,
			partition: message.partition,
			offset: message.offset,
			timestamp: message.timestamp,
			key: message.key,
			value: message.value,
			headers: message.headers,
			status: "persisted",
			data: parsePayload(message.value, expectedType),
		},
		startedAt
	);
}

/**
 * Result for a produce or consume that failed before a message was delivered
 */
export function createMessageFailure(
	topic: string,
	error: unknown,
	startedAt: Date,
	sent?: { key: string | null; value: string | null; headers: Record<string, string>; data: unknown }
): MessageStepResult {
	return createMessageResult(
		{
			topic,
			partition: null,
			offset: null,
			timestamp: null,
			key: sent?.key ?? null,
			value: sent?.value ?? null,
			headers: sent?.headers ?? {},
			status: "notPersisted",
			data: sent?.data ?? null,
			error: toError(error),
		},
		startedAt
	);
}

// =============================================================================
// Batches
// =============================================================================

function collectErrors(results: readonly MessageStepResult[]): string[] {
	return results.flatMap((result, index) => result.errors.map((error) => `Message ${index}: ${error}`));
}

export function createBatchProduceResult(
	topic: string,
	results: readonly MessageStepResult[],
	startedAt: Date,
	failure?: unknown
): BatchProduceResult {
	const error = failure === undefined ? undefined : toError(failure);
	const success = error === undefined && results.length > 0 && results.every((result) => result.success);
	const batch: BatchProduceResult = {
		kind: "batchProduce",
		success,
		errors: error ? [error.message] : collectErrors(results),
		error,
		data: results.map((result) => result.data),
		properties: {
			batchSize: results.length,
			deliveryStatuses: results.map((result) => result.status),
		},
		metadata: createMetadata(startedAt, success),
		topic,
		results,
	};
	return snapshot(batch);
}

export function createBatchConsumeResult(
	topic: string,
	expectedCount: number,
	results: readonly MessageStepResult[],
	startedAt: Date,
	failure?: unknown
): BatchConsumeResult {
	const error = failure === undefined ? undefined : toError(failure);
	const success = error === undefined && results.length >= expectedCount;
	const batch: BatchConsumeResult = {
		kind: "batchConsume",
		success,
		errors: error ? [error.message] : [],
		error,
		data: results.map((result) => result.data),
		properties: {
			batchSize: results.length,
			expectedBatchSize: expectedCount,
		},
		metadata: createMetadata(startedAt, success),
		topic,
		expectedCount,
		results,
	};
	return snapshot(batch);
}
