/**
 * Kafka Broker Consumer
 *
 * Implements BrokerConsumer with a KafkaJS consumer: subscribe, run, and
 * collect messages until the count is reached or the timeout passes. Offsets
 * are committed for the collected messages only, so anything delivered past
 * the count stays available to the group.
 */

import type { BrokerConsumer, ConsumedMessage } from "flowcheck";
import { toError } from "flowcheck";
import type { EachMessagePayload, IHeaders, TopicPartitionOffsetAndMetadata } from "kafkajs";
import type { KafkaConsumerClient } from "./kafka.types";

function decodeHeaders(headers: IHeaders | undefined): Record<string, string> {
	const decoded: Record<string, string> = {};
	for (const [name, value] of Object.entries(headers ?? {})) {
		if (value === undefined) continue;
		decoded[name] = Array.isArray(value) ? value.map((item) => item.toString()).join(",") : value.toString();
	}
	return decoded;
}

export function toConsumedMessage({ topic, partition, message }: EachMessagePayload): ConsumedMessage {
	const timestamp = Number.parseInt(message.timestamp, 10);
	return {
		topic,
		partition,
		offset: message.offset,
		timestamp: Number.isFinite(timestamp) ? timestamp : null,
		key: message.key ? message.key.toString() : null,
		value: message.value ? message.value.toString() : null,
		headers: decodeHeaders(message.headers),
	};
}

/**
 * Offsets to commit after consuming `messages`: one past the highest
 * collected offset of each partition.
 */
export function toCommitOffsets(messages: readonly ConsumedMessage[]): TopicPartitionOffsetAndMetadata[] {
	const next = new Map<string, TopicPartitionOffsetAndMetadata>();
	for (const message of messages) {
		const key = `${message.topic}:${message.partition}`;
		const offset = (BigInt(message.offset) + 1n).toString();
		const current = next.get(key);
		if (current === undefined || BigInt(current.offset) < BigInt(offset)) {
			next.set(key, { topic: message.topic, partition: message.partition, offset });
		}
	}
	return [...next.values()];
}

export class KafkaBrokerConsumer implements BrokerConsumer {
	private _isConnected = false;
	private _isRunning = false;

	constructor(
		private readonly consumer: KafkaConsumerClient,
		private readonly fromBeginning: boolean = true
	) {}

	get isConnected(): boolean {
		return this._isConnected;
	}

	async connect(): Promise<void> {
		await this.consumer.connect();
		this._isConnected = true;
	}

	async consume(topic: string, options: { count: number; timeoutMs: number }): Promise<ConsumedMessage[]> {
		if (!this._isConnected) {
			throw new Error("Consumer is not connected");
		}
		if (this._isRunning) {
			throw new Error("Consumer is already running");
		}

		await this.consumer.subscribe({ topics: [topic], fromBeginning: this.fromBeginning });

		const collected: ConsumedMessage[] = [];

		return new Promise<ConsumedMessage[]>((resolve, reject) => {
			let settled = false;
			const timer = setTimeout(() => finish(), options.timeoutMs);

			const finish = (error?: Error) => {
				if (settled) return;
				settled = true;
				clearTimeout(timer);
				if (error) {
					reject(error);
					return;
				}
				const messages = collected.slice(0, options.count);
				const offsets = toCommitOffsets(messages);
				if (offsets.length === 0) {
					resolve(messages);
					return;
				}
				this.consumer.commitOffsets(offsets).then(
					() => resolve(messages),
					(commitError: unknown) => reject(toError(commitError))
				);
			};

			this._isRunning = true;
			this.consumer
				.run({
					autoCommit: false,
					eachMessage: async (payload) => {
						if (settled) return;
						collected.push(toConsumedMessage(payload));
						if (collected.length >= options.count) {
							finish();
						}
					},
				})
				.catch((error: unknown) => finish(toError(error)));
		});
	}

	async close(): Promise<void> {
		if (this._isRunning) {
			await this.consumer.stop();
			this._isRunning = false;
		}
		if (this._isConnected) {
			await this.consumer.disconnect();
			this._isConnected = false;
		}
	}
}
