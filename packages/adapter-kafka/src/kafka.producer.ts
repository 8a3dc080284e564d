/**
 * Kafka Broker Producer
 *
 * Implements BrokerProducer with a KafkaJS producer. Messages are sent in
 * chunks of `batchSize`, and each send's record metadata is mapped back to
 * one delivery report per message.
 */

import type { BrokerProducer, DeliveryReport, OutgoingMessage, ProducerTuning } from "flowcheck";
import { sleep, toError } from "flowcheck";
import type { Message, RecordMetadata } from "kafkajs";
import { toKafkaAcks, toKafkaCompression } from "./kafka.config";
import type { KafkaProducerClient } from "./kafka.types";

function toKafkaMessage(message: OutgoingMessage): Message {
	const kafkaMessage: Message = {
		key: message.key,
		value: message.value,
		headers: { ...message.headers },
	};
	if (message.partition !== null) kafkaMessage.partition = message.partition;
	if (message.timestamp !== null) kafkaMessage.timestamp = String(message.timestamp);
	return kafkaMessage;
}

function addOffset(base: string | undefined, index: number): string | null {
	if (base === undefined || !/^\d+$/.test(base)) {
		return null;
	}
	return (BigInt(base) + BigInt(index)).toString();
}

function appendTime(metadata: RecordMetadata, fallback: number | null): number | null {
	const time = Number(metadata.logAppendTime ?? metadata.timestamp);
	return Number.isFinite(time) && time > 0 ? time : fallback;
}

/**
 * Map one send's record metadata to a report per message.
 *
 * A message sent to an explicit partition is matched to that partition's
 * entry. A message without one is matched only when the response names a
 * single partition; otherwise the broker's partitioner placed it and the
 * report carries no partition or offset. Offsets follow the base offset in
 * message order, and are left out whenever an unplaced message could share a
 * partition with a placed one.
 */
export function toDeliveryReports(
	topic: string,
	messages: readonly OutgoingMessage[],
	metadata: readonly RecordMetadata[],
	tuning: ProducerTuning
): DeliveryReport[] {
	const single = metadata.length === 1 ? metadata[0] : undefined;
	const spread = metadata.length > 1 && messages.some((message) => message.partition === null);
	const acknowledged = tuning.acks === "none" ? "possiblyPersisted" : "persisted";
	const positions = new Map<number, number>();

	return messages.map((message): DeliveryReport => {
		const entry =
			message.partition === null ? single : metadata.find((item) => item.partition === message.partition);

		if (entry === undefined) {
			if (message.partition === null && metadata.length > 1) {
				const failed = metadata.find((item) => item.errorCode !== 0);
				return failed === undefined
					? { topic, partition: null, offset: null, timestamp: message.timestamp, status: acknowledged }
					: {
							topic,
							partition: null,
							offset: null,
							timestamp: message.timestamp,
							status: "possiblyPersisted",
							error: `Broker returned error code ${failed.errorCode} for partition ${failed.partition}`,
						};
			}
			return { topic, partition: message.partition, offset: null, timestamp: message.timestamp, status: "possiblyPersisted" };
		}

		const position = positions.get(entry.partition) ?? 0;
		positions.set(entry.partition, position + 1);

		if (entry.errorCode !== 0) {
			return {
				topic,
				partition: entry.partition,
				offset: null,
				timestamp: message.timestamp,
				status: "notPersisted",
				error: `Broker returned error code ${entry.errorCode}`,
			};
		}

		return {
			topic,
			partition: entry.partition,
			offset: spread ? null : addOffset(entry.baseOffset ?? entry.offset, position),
			timestamp: appendTime(entry, message.timestamp),
			status: acknowledged,
		};
	});
}

export class KafkaBrokerProducer implements BrokerProducer {
	private _isConnected = false;

	constructor(private readonly producer: KafkaProducerClient) {}

	get isConnected(): boolean {
		return this._isConnected;
	}

	async connect(): Promise<void> {
		await this.producer.connect();
		this._isConnected = true;
	}

	async send(topic: string, messages: OutgoingMessage[], tuning: ProducerTuning): Promise<DeliveryReport[]> {
		if (!this._isConnected) {
			throw new Error("Producer is not connected");
		}

		if (tuning.lingerMs) {
			await sleep(tuning.lingerMs);
		}

		const chunkSize = tuning.batchSize ?? messages.length;
		const reports: DeliveryReport[] = [];

		for (let start = 0; start < messages.length; start += chunkSize) {
			const chunk = messages.slice(start, start + chunkSize);
			try {
				const metadata = await this.producer.send({
					topic,
					messages: chunk.map(toKafkaMessage),
					acks: toKafkaAcks(tuning.acks),
					compression: toKafkaCompression(tuning.compression),
				});
				reports.push(...toDeliveryReports(topic, chunk, metadata, tuning));
			} catch (error) {
				const reason = toError(error).message;
				reports.push(
					...chunk.map(
						(message): DeliveryReport => ({
							topic,
							partition: message.partition,
							offset: null,
							timestamp: message.timestamp,
							status: "notPersisted",
							error: reason,
						})
					)
				);
			}
		}

		return reports;
	}

	async close(): Promise<void> {
		if (this._isConnected) {
			await this.producer.disconnect();
			this._isConnected = false;
		}
	}
}
