/**
 * Kafka Adapter
 *
 * Main adapter implementing MessageBrokerAdapter for Kafka using KafkaJS.
 * Every producer and consumer gets its own client, built from the
 * connection the scenario resolved for the step.
 */

import type {
	BrokerConsumer,
	BrokerProducer,
	ConsumerConnection,
	MessageBrokerAdapter,
	ProducerConnection,
} from "flowcheck";
import { type ConsumerConfig, Kafka, type ProducerConfig } from "kafkajs";
import { toKafkaConfig } from "./kafka.config";
import { KafkaBrokerConsumer } from "./kafka.consumer";
import { KafkaBrokerProducer } from "./kafka.producer";
import type { KafkaAdapterConfig, KafkaClientFactory } from "./kafka.types";

const createKafkaClient: KafkaClientFactory = (config) => new Kafka(config);

/**
 * Kafka adapter for flowcheck scenarios.
 *
 * @example
 * ```typescript
 * import { given } from "flowcheck";
 * import { KafkaBrokerAdapter } from "@flowcheck/adapter-kafka";
 *
 * const scenario = given({ broker: new KafkaBrokerAdapter({ clientId: "orders-tests" }) });
 * await scenario.topic("orders").produce("order-1", { total: 42 }).execute();
 * ```
 */
export class KafkaBrokerAdapter implements MessageBrokerAdapter {
	readonly type = "kafka";

	constructor(
		private readonly config: KafkaAdapterConfig = {},
		private readonly createClient: KafkaClientFactory = createKafkaClient
	) {}

	async createProducer(connection: ProducerConnection): Promise<BrokerProducer> {
		const kafka = this.createClient(toKafkaConfig(connection.client, this.config));
		const { idempotent, retries } = connection.tuning;

		const producerConfig: ProducerConfig = { ...this.config.producerOptions };
		if (idempotent !== undefined) producerConfig.idempotent = idempotent;
		if (retries !== undefined) producerConfig.retry = { ...producerConfig.retry, retries };

		const producer = new KafkaBrokerProducer(kafka.producer(producerConfig));
		await producer.connect();
		return producer;
	}

	async createConsumer(connection: ConsumerConnection): Promise<BrokerConsumer> {
		const kafka = this.createClient(toKafkaConfig(connection.client, this.config));
		const { sessionTimeoutMs, heartbeatIntervalMs, fromBeginning } = connection.tuning;

		// Faster group coordination and fetches against a local broker
		const testModeConfig: Partial<ConsumerConfig> = this.config.testMode
			? {
					heartbeatInterval: 500,
					sessionTimeout: 6000,
					rebalanceTimeout: 10000,
					maxWaitTimeInMs: 100,
					retry: { initialRetryTime: 100, retries: 5, maxRetryTime: 1000, factor: 0.2 },
				}
			: {};

		const consumerConfig: ConsumerConfig = {
			...testModeConfig,
			...this.config.consumerOptions,
			groupId: connection.groupId,
		};
		if (sessionTimeoutMs !== undefined) consumerConfig.sessionTimeout = sessionTimeoutMs;
		if (heartbeatIntervalMs !== undefined) consumerConfig.heartbeatInterval = heartbeatIntervalMs;

		const consumer = new KafkaBrokerConsumer(kafka.consumer(consumerConfig), fromBeginning ?? true);
		await consumer.connect();
		return consumer;
	}
}
