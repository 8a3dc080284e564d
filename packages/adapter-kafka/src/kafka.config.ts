/**
 * Kafka Client Configuration
 *
 * Translates a resolved MessagingClientConfig and producer tuning into
 * KafkaJS options.
 */

import { readFileSync } from "node:fs";
import type { ConnectionOptions } from "node:tls";
import type { AcknowledgmentMode, CompressionType, MessagingClientConfig, SslSettings } from "flowcheck";
import { CompressionTypes, type KafkaConfig, logLevel, type SASLOptions } from "kafkajs";
import type { KafkaAdapterConfig } from "./kafka.types";

const ACKS: Record<AcknowledgmentMode, number> = {
	all: -1,
	leader: 1,
	none: 0,
};

const COMPRESSION: Record<CompressionType, CompressionTypes> = {
	none: CompressionTypes.None,
	gzip: CompressionTypes.GZIP,
	snappy: CompressionTypes.Snappy,
	lz4: CompressionTypes.LZ4,
	zstd: CompressionTypes.ZSTD,
};

export function toKafkaAcks(mode: AcknowledgmentMode = "all"): number {
	return ACKS[mode];
}

export function toKafkaCompression(type: CompressionType = "none"): CompressionTypes {
	return COMPRESSION[type];
}

function readFile(options: KafkaAdapterConfig): (path: string) => Buffer {
	return options.readFile ?? ((path) => readFileSync(path));
}

/**
 * TLS options with the CA, certificate and key read from their files
 */
export function toTlsOptions(ssl: SslSettings, options: KafkaAdapterConfig = {}): ConnectionOptions {
	const read = readFile(options);
	const tls: ConnectionOptions = {
		rejectUnauthorized: ssl.enableCertificateVerification ?? true,
	};
	if (ssl.caLocation) tls.ca = [read(ssl.caLocation)];
	if (ssl.certificateLocation) tls.cert = read(ssl.certificateLocation);
	if (ssl.keyLocation) tls.key = read(ssl.keyLocation);
	if (ssl.keyPassword) tls.passphrase = ssl.keyPassword;
	return tls;
}

export function toSaslOptions(sasl: NonNullable<MessagingClientConfig["sasl"]>): SASLOptions {
	const { username, password } = sasl;
	switch (sasl.mechanism) {
		case "plain":
			return { mechanism: "plain", username, password };
		case "scram-sha-256":
			return { mechanism: "scram-sha-256", username, password };
		case "scram-sha-512":
			return { mechanism: "scram-sha-512", username, password };
	}
}

/**
 * Build the KafkaJS client configuration for one step's connection
 */
export function toKafkaConfig(client: MessagingClientConfig, options: KafkaAdapterConfig = {}): KafkaConfig {
	const testModeOptions: Partial<KafkaConfig> = options.testMode
		? {
				connectionTimeout: 3000,
				requestTimeout: 5000,
				enforceRequestTimeout: true,
				retry: { initialRetryTime: 100, retries: 3, maxRetryTime: 1000 },
			}
		: {};

	const config: KafkaConfig = {
		clientId: options.clientId ?? "flowcheck",
		brokers: [...client.brokers],
		connectionTimeout: options.connectionTimeout ?? 30_000,
		requestTimeout: options.requestTimeout ?? 30_000,
		logLevel: options.logLevel ?? logLevel.NOTHING,
		...testModeOptions,
		...options.kafkaOptions,
	};

	if (client.ssl) {
		config.ssl = toTlsOptions(client.ssl, options);
	} else if (client.securityProtocol === "ssl" || client.securityProtocol === "sasl_ssl") {
		config.ssl = true;
	}
	if (client.sasl) {
		config.sasl = toSaslOptions(client.sasl);
	}
	return config;
}
