/**
 * Kafka Adapter Tests
 *
 * Exercises the adapter against in-process KafkaJS client fakes.
 */

import {
	KafkaBrokerAdapter,
	KafkaBrokerProducer,
	type KafkaClientFactory,
	type KafkaConsumerClient,
	type KafkaProducerClient,
	toCommitOffsets,
	toDeliveryReports,
	toKafkaAcks,
	toKafkaCompression,
	toKafkaConfig,
} from "@flowcheck/adapter-kafka";
import type { MessagingClientConfig, OutgoingMessage } from "flowcheck";
import {
	CompressionTypes,
	type ConsumerConfig,
	type ConsumerRunConfig,
	type ConsumerSubscribeTopic,
	type ConsumerSubscribeTopics,
	type EachMessagePayload,
	type KafkaConfig,
	logLevel,
	type ProducerConfig,
	type ProducerRecord,
	type RecordMetadata,
	type TopicPartitionOffsetAndMetadata,
} from "kafkajs";
import { describe, expect, it } from "vitest";

// =============================================================================
// Fakes
// =============================================================================

class FakeKafkaProducer implements KafkaProducerClient {
	connected = false;
	readonly records: ProducerRecord[] = [];

	constructor(private readonly respond: (record: ProducerRecord) => RecordMetadata[] = () => []) {}

	async connect(): Promise<void> {
		this.connected = true;
	}

	async send(record: ProducerRecord): Promise<RecordMetadata[]> {
		this.records.push(record);
		return this.respond(record);
	}

	async disconnect(): Promise<void> {
		this.connected = false;
	}
}

class FakeKafkaConsumer implements KafkaConsumerClient {
	connected = false;
	stopped = false;
	readonly subscriptions: Array<ConsumerSubscribeTopics | ConsumerSubscribeTopic> = [];
	readonly runConfigs: Array<ConsumerRunConfig | undefined> = [];
	readonly committed: TopicPartitionOffsetAndMetadata[][] = [];

	constructor(
		private readonly queued: EachMessagePayload[] = [],
		private readonly failure?: Error
	) {}

	async connect(): Promise<void> {
		this.connected = true;
	}

	async subscribe(subscription: ConsumerSubscribeTopics | ConsumerSubscribeTopic): Promise<void> {
		this.subscriptions.push(subscription);
	}

	async run(config?: ConsumerRunConfig): Promise<void> {
		this.runConfigs.push(config);
		if (this.failure) {
			throw this.failure;
		}
		for (const payload of this.queued) {
			await config?.eachMessage?.(payload);
		}
	}

	async commitOffsets(offsets: TopicPartitionOffsetAndMetadata[]): Promise<void> {
		this.committed.push(offsets);
	}

	async stop(): Promise<void> {
		this.stopped = true;
	}

	async disconnect(): Promise<void> {
		this.connected = false;
	}
}

function createFactory(producer: FakeKafkaProducer, consumer: FakeKafkaConsumer) {
	const configs: KafkaConfig[] = [];
	const producerConfigs: Array<ProducerConfig | undefined> = [];
	const consumerConfigs: ConsumerConfig[] = [];

	const factory: KafkaClientFactory = (config) => {
		configs.push(config);
		return {
			producer: (producerConfig) => {
				producerConfigs.push(producerConfig);
				return producer;
			},
			consumer: (consumerConfig) => {
				consumerConfigs.push(consumerConfig);
				return consumer;
			},
		};
	};
	return { factory, configs, producerConfigs, consumerConfigs };
}

function payload(offset: string, value: string, key: string | null = null, partition = 1): EachMessagePayload {
	return {
		topic: "orders",
		partition,
		message: {
			key: key === null ? null : Buffer.from(key),
			value: Buffer.from(value),
			timestamp: "1700000000000",
			attributes: 0,
			offset,
			headers: { "event-type": Buffer.from("OrderCreated"), trace: ["a", "b"] },
		},
		heartbeat: async () => {},
		pause: () => () => {},
	};
}

function outgoing(overrides?: Partial<OutgoingMessage>): OutgoingMessage {
	return { key: null, value: "v", headers: {}, partition: null, timestamp: null, ...overrides };
}

const plaintext: MessagingClientConfig = { brokers: ["localhost:9092"], securityProtocol: "plaintext" };

// =============================================================================
// Configuration
// =============================================================================

describe("toKafkaConfig", () => {
	it("should map a plaintext connection", () => {
		expect(toKafkaConfig(plaintext)).toEqual({
			clientId: "flowcheck",
			brokers: ["localhost:9092"],
			connectionTimeout: 30_000,
			requestTimeout: 30_000,
			logLevel: logLevel.NOTHING,
		});
	});

	it("should enable TLS and SASL for sasl_ssl", () => {
		const config = toKafkaConfig({
			brokers: ["kafka:9093"],
			securityProtocol: "sasl_ssl",
			sasl: { mechanism: "scram-sha-512", username: "svc", password: "test-secret" },
		});

		expect(config.ssl).toBe(true);
		expect(config.sasl).toEqual({ mechanism: "scram-sha-512", username: "svc", password: "test-secret" });
	});

	it("should read certificate files for the TLS block", () => {
		const config = toKafkaConfig(
			{
				brokers: ["kafka:9093"],
				securityProtocol: "ssl",
				ssl: {
					caLocation: "/certs/ca.pem",
					certificateLocation: "/certs/client.pem",
					keyLocation: "/certs/client.key",
					keyPassword: "test-secret",
					enableCertificateVerification: false,
				},
			},
			{ readFile: (path) => Buffer.from(`contents of ${path}`) }
		);

		expect(config.ssl).toEqual({
			rejectUnauthorized: false,
			ca: [Buffer.from("contents of /certs/ca.pem")],
			cert: Buffer.from("contents of /certs/client.pem"),
			key: Buffer.from("contents of /certs/client.key"),
			passphrase: "test-secret",
		});
	});

	it("should apply test mode timings and explicit options", () => {
		const config = toKafkaConfig(plaintext, { testMode: true, kafkaOptions: { clientId: "orders-tests" } });

		expect(config).toMatchObject({ clientId: "orders-tests", connectionTimeout: 3000, requestTimeout: 5000 });
	});

	it("should map acknowledgment and compression modes", () => {
		expect(toKafkaAcks()).toBe(-1);
		expect(toKafkaAcks("leader")).toBe(1);
		expect(toKafkaAcks("none")).toBe(0);
		expect(toKafkaCompression("gzip")).toBe(CompressionTypes.GZIP);
	});
});

// =============================================================================
// Delivery reports
// =============================================================================

describe("toDeliveryReports", () => {
	it("should number offsets from the base offset", () => {
		const reports = toDeliveryReports(
			"orders",
			[outgoing(), outgoing()],
			[{ topicName: "orders", partition: 0, errorCode: 0, baseOffset: "10", logAppendTime: "1700000000123" }],
			{}
		);

		expect(reports).toEqual([
			{ topic: "orders", partition: 0, offset: "10", timestamp: 1_700_000_000_123, status: "persisted" },
			{ topic: "orders", partition: 0, offset: "11", timestamp: 1_700_000_000_123, status: "persisted" },
		]);
	});

	it("should report broker errors as not persisted", () => {
		const [report] = toDeliveryReports("orders", [outgoing()], [{ topicName: "orders", partition: 0, errorCode: 7 }], {});

		expect(report).toEqual({
			topic: "orders",
			partition: 0,
			offset: null,
			timestamp: null,
			status: "notPersisted",
			error: "Broker returned error code 7",
		});
	});

	it("should report unacknowledged sends as possibly persisted", () => {
		const [report] = toDeliveryReports(
			"orders",
			[outgoing()],
			[{ topicName: "orders", partition: 0, errorCode: 0, baseOffset: "-1" }],
			{ acks: "none" }
		);

		expect(report?.status).toBe("possiblyPersisted");
		expect(report?.offset).toBeNull();
	});

	it("should match messages to partitions when several are returned", () => {
		const reports = toDeliveryReports(
			"orders",
			[outgoing({ partition: 1 }), outgoing({ partition: 2 }), outgoing({ partition: 1 })],
			[
				{ topicName: "orders", partition: 1, errorCode: 0, baseOffset: "5" },
				{ topicName: "orders", partition: 3, errorCode: 0, baseOffset: "0" },
			],
			{}
		);

		expect(reports.map((report) => [report.partition, report.offset, report.status])).toEqual([
			[1, "5", "persisted"],
			[2, null, "possiblyPersisted"],
			[1, "6", "persisted"],
		]);
	});

	it("should report keyed messages the broker spread over partitions as persisted", () => {
		const reports = toDeliveryReports(
			"orders",
			[outgoing({ key: "a" }), outgoing({ key: "b" })],
			[
				{ topicName: "orders", partition: 0, errorCode: 0, baseOffset: "3" },
				{ topicName: "orders", partition: 1, errorCode: 0, baseOffset: "8" },
			],
			{}
		);

		expect(reports).toEqual([
			{ topic: "orders", partition: null, offset: null, timestamp: null, status: "persisted" },
			{ topic: "orders", partition: null, offset: null, timestamp: null, status: "persisted" },
		]);
	});

	it("should leave offsets out when unplaced messages share the response", () => {
		const reports = toDeliveryReports(
			"orders",
			[outgoing({ partition: 0 }), outgoing({ key: "b" })],
			[
				{ topicName: "orders", partition: 0, errorCode: 0, baseOffset: "3" },
				{ topicName: "orders", partition: 1, errorCode: 0, baseOffset: "8" },
			],
			{}
		);

		expect(reports.map((report) => [report.partition, report.offset, report.status])).toEqual([
			[0, null, "persisted"],
			[null, null, "persisted"],
		]);
	});

	it("should not fail an unplaced message when another partition reports an error", () => {
		const [report] = toDeliveryReports(
			"orders",
			[outgoing({ key: "a" })],
			[
				{ topicName: "orders", partition: 0, errorCode: 0, baseOffset: "3" },
				{ topicName: "orders", partition: 1, errorCode: 6 },
			],
			{}
		);

		expect(report).toEqual({
			topic: "orders",
			partition: null,
			offset: null,
			timestamp: null,
			status: "possiblyPersisted",
			error: "Broker returned error code 6 for partition 1",
		});
	});
});

describe("toCommitOffsets", () => {
	it("should commit one past the highest offset of each partition", () => {
		const consumed = (partition: number, offset: string) => ({
			topic: "orders",
			partition,
			offset,
			timestamp: null,
			key: null,
			value: null,
			headers: {},
		});

		expect(toCommitOffsets([consumed(1, "9"), consumed(0, "3"), consumed(1, "12"), consumed(1, "10")])).toEqual([
			{ topic: "orders", partition: 1, offset: "13" },
			{ topic: "orders", partition: 0, offset: "4" },
		]);
	});
});

// =============================================================================
// Adapter
// =============================================================================

describe("KafkaBrokerAdapter", () => {
	describe("producer", () => {
		it("should connect a producer with the tuning applied", async () => {
			const producer = new FakeKafkaProducer();
			const { factory, configs, producerConfigs } = createFactory(producer, new FakeKafkaConsumer());
			const adapter = new KafkaBrokerAdapter({ clientId: "orders-tests" }, factory);

			await adapter.createProducer({ client: plaintext, tuning: { idempotent: true, retries: 2 } });

			expect(adapter.type).toBe("kafka");
			expect(producer.connected).toBe(true);
			expect(configs[0]?.clientId).toBe("orders-tests");
			expect(producerConfigs).toEqual([{ idempotent: true, retry: { retries: 2 } }]);
		});

		it("should send messages as KafkaJS records", async () => {
			const producer = new FakeKafkaProducer(() => [
				{ topicName: "orders", partition: 2, errorCode: 0, baseOffset: "41" },
			]);
			const adapter = new KafkaBrokerAdapter({}, createFactory(producer, new FakeKafkaConsumer()).factory);
			const client = await adapter.createProducer({ client: plaintext, tuning: {} });

			const reports = await client.send(
				"orders",
				[outgoing({ key: "k1", headers: { source: "test" }, partition: 2, timestamp: 1_700_000_000_000 })],
				{ acks: "leader", compression: "gzip" }
			);

			expect(producer.records).toEqual([
				{
					topic: "orders",
					messages: [{ key: "k1", value: "v", headers: { source: "test" }, partition: 2, timestamp: "1700000000000" }],
					acks: 1,
					compression: CompressionTypes.GZIP,
				},
			]);
			expect(reports).toEqual([
				{ topic: "orders", partition: 2, offset: "41", timestamp: 1_700_000_000_000, status: "persisted" },
			]);
		});

		it("should send in chunks of batchSize", async () => {
			const producer = new FakeKafkaProducer(() => [{ topicName: "orders", partition: 0, errorCode: 0, baseOffset: "0" }]);
			const adapter = new KafkaBrokerAdapter({}, createFactory(producer, new FakeKafkaConsumer()).factory);
			const client = await adapter.createProducer({ client: plaintext, tuning: {} });

			const reports = await client.send("orders", [outgoing(), outgoing(), outgoing()], { batchSize: 2 });

			expect(producer.records.map((record) => record.messages.length)).toEqual([2, 1]);
			expect(reports.map((report) => report.offset)).toEqual(["0", "1", "0"]);
		});

		it("should report a failed send for every message in the chunk", async () => {
			const producer = new FakeKafkaProducer(() => {
				throw new Error("Leader not available");
			});
			const adapter = new KafkaBrokerAdapter({}, createFactory(producer, new FakeKafkaConsumer()).factory);
			const client = await adapter.createProducer({ client: plaintext, tuning: {} });

			const reports = await client.send("orders", [outgoing(), outgoing()], {});

			expect(reports.map((report) => [report.status, report.error])).toEqual([
				["notPersisted", "Leader not available"],
				["notPersisted", "Leader not available"],
			]);
		});

		it("should refuse to send before connecting", async () => {
			const producer = new KafkaBrokerProducer(new FakeKafkaProducer());

			await expect(producer.send("orders", [outgoing()], {})).rejects.toThrow("Producer is not connected");
		});

		it("should disconnect on close", async () => {
			const producer = new FakeKafkaProducer();
			const adapter = new KafkaBrokerAdapter({}, createFactory(producer, new FakeKafkaConsumer()).factory);
			const client = await adapter.createProducer({ client: plaintext, tuning: {} });

			await client.close();

			expect(producer.connected).toBe(false);
		});
	});

	describe("consumer", () => {
		it("should create a consumer in the step's group", async () => {
			const consumer = new FakeKafkaConsumer();
			const { factory, consumerConfigs } = createFactory(new FakeKafkaProducer(), consumer);
			const adapter = new KafkaBrokerAdapter({}, factory);

			await adapter.createConsumer({
				client: plaintext,
				groupId: "orders-group",
				tuning: { sessionTimeoutMs: 10_000, heartbeatIntervalMs: 1_000 },
			});

			expect(consumer.connected).toBe(true);
			expect(consumerConfigs).toEqual([{ groupId: "orders-group", sessionTimeout: 10_000, heartbeatInterval: 1_000 }]);
		});

		it("should collect messages until the count is reached", async () => {
			const consumer = new FakeKafkaConsumer([
				payload("5", '{"n":1}', "k1"),
				payload("6", '{"n":2}'),
				payload("7", '{"n":3}'),
			]);
			const adapter = new KafkaBrokerAdapter({}, createFactory(new FakeKafkaProducer(), consumer).factory);
			const client = await adapter.createConsumer({ client: plaintext, groupId: "g", tuning: {} });

			const messages = await client.consume("orders", { count: 2, timeoutMs: 1_000 });

			expect(consumer.subscriptions).toEqual([{ topics: ["orders"], fromBeginning: true }]);
			expect(consumer.runConfigs[0]?.autoCommit).toBe(false);
			expect(consumer.committed).toEqual([[{ topic: "orders", partition: 1, offset: "7" }]]);
			expect(messages).toEqual([
				{
					topic: "orders",
					partition: 1,
					offset: "5",
					timestamp: 1_700_000_000_000,
					key: "k1",
					value: '{"n":1}',
					headers: { "event-type": "OrderCreated", trace: "a,b" },
				},
				{
					topic: "orders",
					partition: 1,
					offset: "6",
					timestamp: 1_700_000_000_000,
					key: null,
					value: '{"n":2}',
					headers: { "event-type": "OrderCreated", trace: "a,b" },
				},
			]);
		});

		it("should leave messages past the count uncommitted", async () => {
			const consumer = new FakeKafkaConsumer([
				payload("0", "a", null, 0),
				payload("4", "b", null, 2),
				payload("1", "c", null, 0),
				payload("2", "d", null, 0),
			]);
			const adapter = new KafkaBrokerAdapter({}, createFactory(new FakeKafkaProducer(), consumer).factory);
			const client = await adapter.createConsumer({ client: plaintext, groupId: "g", tuning: {} });

			const messages = await client.consume("orders", { count: 3, timeoutMs: 1_000 });

			expect(messages.map((message) => message.value)).toEqual(["a", "b", "c"]);
			expect(consumer.committed).toEqual([
				[
					{ topic: "orders", partition: 0, offset: "2" },
					{ topic: "orders", partition: 2, offset: "5" },
				],
			]);
		});

		it("should commit nothing when nothing arrived", async () => {
			const consumer = new FakeKafkaConsumer();
			const adapter = new KafkaBrokerAdapter({}, createFactory(new FakeKafkaProducer(), consumer).factory);
			const client = await adapter.createConsumer({ client: plaintext, groupId: "g", tuning: {} });

			await expect(client.consume("orders", { count: 1, timeoutMs: 10 })).resolves.toEqual([]);
			expect(consumer.committed).toEqual([]);
		});

		it("should resolve with what arrived when the timeout passes", async () => {
			const consumer = new FakeKafkaConsumer([payload("0", "only")]);
			const adapter = new KafkaBrokerAdapter({}, createFactory(new FakeKafkaProducer(), consumer).factory);
			const client = await adapter.createConsumer({ client: plaintext, groupId: "g", tuning: { fromBeginning: false } });

			const messages = await client.consume("orders", { count: 2, timeoutMs: 10 });

			expect(messages.map((message) => message.value)).toEqual(["only"]);
			expect(consumer.subscriptions).toEqual([{ topics: ["orders"], fromBeginning: false }]);
		});

		it("should reject when the consumer fails to run", async () => {
			const consumer = new FakeKafkaConsumer([], new Error("Group coordinator not available"));
			const adapter = new KafkaBrokerAdapter({}, createFactory(new FakeKafkaProducer(), consumer).factory);
			const client = await adapter.createConsumer({ client: plaintext, groupId: "g", tuning: {} });

			await expect(client.consume("orders", { count: 1, timeoutMs: 1_000 })).rejects.toThrow(
				"Group coordinator not available"
			);
		});

		it("should stop and disconnect on close", async () => {
			const consumer = new FakeKafkaConsumer([payload("0", "a")]);
			const adapter = new KafkaBrokerAdapter({}, createFactory(new FakeKafkaProducer(), consumer).factory);
			const client = await adapter.createConsumer({ client: plaintext, groupId: "g", tuning: {} });
			await client.consume("orders", { count: 1, timeoutMs: 1_000 });

			await client.close();

			expect(consumer.stopped).toBe(true);
			expect(consumer.connected).toBe(false);
		});
	});
});
