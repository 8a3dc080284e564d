/**
 * Message Broker Types
 *
 * Interfaces a broker adapter implements. The scenario engine only talks
 * to brokers through these.
 */

import type { MessagingClientConfig } from "../auth/auth.types";

// =============================================================================
// Delivery
// =============================================================================

/**
 * Broker-level persistence acknowledgment for a produced message
 */
export type DeliveryStatus = "persisted" | "possiblyPersisted" | "notPersisted";

export interface OutgoingMessage {
	key: string | null;
	value: string;
	headers: Record<string, string>;
	partition: number | null;
	/** Epoch milliseconds */
	timestamp: number | null;
}

export interface DeliveryReport {
	topic: string;
	partition: number | null;
	offset: string | null;
	/** Epoch milliseconds */
	timestamp: number | null;
	status: DeliveryStatus;
	error?: string;
}

export interface ConsumedMessage {
	topic: string;
	partition: number;
	offset: string;
	/** Epoch milliseconds */
	timestamp: number | null;
	key: string | null;
	value: string | null;
	headers: Record<string, string>;
}

// =============================================================================
// Tuning
// =============================================================================

export type AcknowledgmentMode = "all" | "leader" | "none";

export type CompressionType = "none" | "gzip" | "snappy" | "lz4" | "zstd";

export interface ProducerTuning {
	/** @default "all" */
	acks?: AcknowledgmentMode;
	/** @default "none" */
	compression?: CompressionType;
	/** Maximum messages per send request */
	batchSize?: number;
	/** Delay before sending, in milliseconds */
	lingerMs?: number;
	retries?: number;
	idempotent?: boolean;
}

export interface ConsumerTuning {
	/** @default true */
	fromBeginning?: boolean;
	sessionTimeoutMs?: number;
	heartbeatIntervalMs?: number;
}

// =============================================================================
// Clients
// =============================================================================

export interface ProducerConnection {
	client: MessagingClientConfig;
	tuning: ProducerTuning;
}

export interface ConsumerConnection {
	client: MessagingClientConfig;
	groupId: string;
	tuning: ConsumerTuning;
}

export interface BrokerProducer {
	/**
	 * Send messages and report one delivery per message, in order
	 */
	send(topic: string, messages: OutgoingMessage[], tuning: ProducerTuning): Promise<DeliveryReport[]>;
	close(): Promise<void>;
}

export interface BrokerConsumer {
	/**
	 * Collect up to `count` messages, resolving with whatever arrived
	 * when `timeoutMs` passes
	 */
	consume(topic: string, options: { count: number; timeoutMs: number }): Promise<ConsumedMessage[]>;
	close(): Promise<void>;
}

/**
 * Broker adapter: creates connected producers and consumers
 */
export interface MessageBrokerAdapter {
	readonly type: string;
	createProducer(connection: ProducerConnection): Promise<BrokerProducer>;
	createConsumer(connection: ConsumerConnection): Promise<BrokerConsumer>;
}
