/**
 * Kafka Adapter Types
 *
 * Configuration for the Kafka broker adapter, and the parts of the KafkaJS
 * client it uses.
 */

import type { Consumer, ConsumerConfig, KafkaConfig, logLevel, Producer, ProducerConfig } from "kafkajs";

/**
 * Kafka adapter configuration. Brokers, SASL and SSL come from each step's
 * resolved client configuration; these options apply to every client the
 * adapter creates.
 */
export interface KafkaAdapterConfig {
	/**
	 * Client ID for clients created by this adapter
	 * @default "flowcheck"
	 */
	clientId?: string;

	/**
	 * Connection timeout in milliseconds
	 * @default 30000
	 */
	connectionTimeout?: number;

	/**
	 * Request timeout in milliseconds
	 * @default 30000
	 */
	requestTimeout?: number;

	/**
	 * Log level for KafkaJS
	 * @default logLevel.NOTHING
	 */
	logLevel?: logLevel;

	/**
	 * Shorter connection, retry and group coordination timings for test
	 * brokers running locally
	 */
	testMode?: boolean;

	/**
	 * Additional KafkaJS configuration options
	 */
	kafkaOptions?: Partial<KafkaConfig>;

	/**
	 * Producer-specific configuration
	 */
	producerOptions?: ProducerConfig;

	/**
	 * Consumer-specific configuration
	 */
	consumerOptions?: Omit<ConsumerConfig, "groupId">;

	/**
	 * Reads CA, certificate and key files named by SSL settings
	 * @default fs.readFileSync
	 */
	readFile?: (path: string) => Buffer;
}

export type KafkaProducerClient = Pick<Producer, "connect" | "send" | "disconnect">;

export type KafkaConsumerClient = Pick<Consumer, "connect" | "subscribe" | "run" | "commitOffsets" | "stop" | "disconnect">;

/**
 * The part of a KafkaJS `Kafka` instance the adapter uses
 */
export interface KafkaClient {
	producer(config?: ProducerConfig): KafkaProducerClient;
	consumer(config: ConsumerConfig): KafkaConsumerClient;
}

export type KafkaClientFactory = (config: KafkaConfig) => KafkaClient;
