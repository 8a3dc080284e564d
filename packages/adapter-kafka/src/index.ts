/**
 * @flowcheck/adapter-kafka
 *
 * Kafka broker adapter for flowcheck produce and consume steps.
 *
 * @example
 * ```typescript
 * import { given } from "flowcheck";
 * import { KafkaBrokerAdapter } from "@flowcheck/adapter-kafka";
 *
 * const scenario = given({
 *   broker: new KafkaBrokerAdapter({ testMode: true }),
 *   settings: { bootstrapServers: ["localhost:9092"] },
 * });
 *
 * await scenario.topic("events").produce({ type: "user.created", userId: "123" }).execute();
 * const consumed = await scenario.topic("events").consume().execute();
 * consumed.assertJsonPath("$.type", "user.created");
 * ```
 *
 * @packageDocumentation
 */

// Main adapter
export { KafkaBrokerAdapter } from "./kafka.adapter";

// Individual clients (for advanced use cases)
export { KafkaBrokerProducer, toDeliveryReports } from "./kafka.producer";
export { KafkaBrokerConsumer, toCommitOffsets, toConsumedMessage } from "./kafka.consumer";

// Configuration mapping
export { toKafkaAcks, toKafkaCompression, toKafkaConfig, toSaslOptions, toTlsOptions } from "./kafka.config";

// Types
export type {
	KafkaAdapterConfig,
	KafkaClient,
	KafkaClientFactory,
	KafkaConsumerClient,
	KafkaProducerClient,
} from "./kafka.types";
