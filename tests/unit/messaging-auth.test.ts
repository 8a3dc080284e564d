/**
 * Messaging Authentication Strategy Tests
 */

import {
	ConfigurationError,
	type MessagingAuthConfig,
	type MessagingClientConfig,
	composeMessagingStrategies,
	createSslOverlay,
	messagingAuthStrategies,
	normalizeSslSettings,
	resolveMessagingAuthStrategy,
	validateMessagingAuthConfig,
} from "flowcheck";
import { describe, expect, it } from "vitest";

function createConfig(): MessagingClientConfig {
	return { brokers: ["localhost:9092"], securityProtocol: "plaintext" };
}

function applyAuth(auth: MessagingAuthConfig): MessagingClientConfig {
	const config = createConfig();
	resolveMessagingAuthStrategy(auth).apply(config);
	return config;
}

describe("resolveMessagingAuthStrategy", () => {
	it("should leave the configuration untouched without auth", () => {
		const config = createConfig();
		resolveMessagingAuthStrategy(undefined).apply(config);

		expect(config).toEqual({ brokers: ["localhost:9092"], securityProtocol: "plaintext" });
	});

	describe("SASL", () => {
		it("should set PLAIN credentials over TLS by default", () => {
			const config = applyAuth({ type: "saslPlain", saslPlain: { username: "svc", password: "test-secret" } });

			expect(config.sasl).toEqual({ mechanism: "plain", username: "svc", password: "test-secret" });
			expect(config.securityProtocol).toBe("sasl_ssl");
		});

		it("should use plaintext transport when SSL is disabled", () => {
			const config = applyAuth({
				type: "saslPlain",
				saslPlain: { username: "svc", password: "test-secret", useSsl: false },
			});

			expect(config.securityProtocol).toBe("sasl_plaintext");
		});

		it("should select the SCRAM mechanism from the variant", () => {
			const scram256 = applyAuth({ type: "saslScram256", saslScram: { username: "svc", password: "test-secret" } });
			const scram512 = applyAuth({ type: "saslScram512", saslScram: { username: "svc", password: "test-secret" } });

			expect(scram256.sasl?.mechanism).toBe("scram-sha-256");
			expect(scram512.sasl?.mechanism).toBe("scram-sha-512");
		});

		it("should require the credentials block", () => {
			expect(() => resolveMessagingAuthStrategy({ type: "saslScram512" })).toThrow(
				"Authentication type 'saslScram512' requires a 'saslScram' configuration block."
			);
		});

		it("should require a username and a password", () => {
			expect(() =>
				resolveMessagingAuthStrategy({ type: "saslPlain", saslPlain: { username: "", password: "test-secret" } })
			).toThrow("SASL username is required for SASL/PLAIN authentication.");
			expect(() =>
				resolveMessagingAuthStrategy({ type: "saslScram256", saslScram: { username: "svc", password: " " } })
			).toThrow("SASL password is required for SASL/SCRAM-SHA-256 authentication.");
		});

		it("should apply an SSL overlay alongside the credentials", () => {
			const config = applyAuth({
				type: "saslPlain",
				saslPlain: { username: "svc", password: "test-secret", useSsl: false },
				ssl: { caLocation: "/certs/ca.pem" },
			});

			expect(config.securityProtocol).toBe("sasl_ssl");
			expect(config.ssl).toEqual({ caLocation: "/certs/ca.pem", enableCertificateVerification: true });
			expect(config.sasl?.username).toBe("svc");
		});
	});

	describe("SSL", () => {
		it("should set the TLS block with verification enabled", () => {
			const config = applyAuth({ type: "ssl", ssl: { caLocation: "/certs/ca.pem" } });

			expect(config).toEqual({
				brokers: ["localhost:9092"],
				securityProtocol: "ssl",
				ssl: { caLocation: "/certs/ca.pem", enableCertificateVerification: true },
			});
		});

		it("should require the ssl block", () => {
			expect(() => resolveMessagingAuthStrategy({ type: "ssl" })).toThrow(
				"Authentication type 'ssl' requires an 'ssl' configuration block."
			);
		});

		it("should require both client certificate and key for mutual TLS", () => {
			const error = captureError(() =>
				resolveMessagingAuthStrategy({ type: "mutualTls", ssl: { certificateLocation: "/certs/client.pem" } })
			);

			expect(error).toBeInstanceOf(ConfigurationError);
			expect(error?.message).toBe("Mutual TLS requires both certificateLocation and keyLocation.");
		});

		it("should accept mutual TLS with certificate and key", () => {
			const config = applyAuth({
				type: "mutualTls",
				ssl: { certificateLocation: "/certs/client.pem", keyLocation: "/certs/client.key", keyPassword: "test-secret" },
			});

			expect(config.ssl).toEqual({
				certificateLocation: "/certs/client.pem",
				keyLocation: "/certs/client.key",
				keyPassword: "test-secret",
				enableCertificateVerification: true,
			});
		});
	});
});

describe("strategy composition", () => {
	const sasl = messagingAuthStrategies.saslPlain({
		type: "saslPlain",
		saslPlain: { username: "svc", password: "test-secret", useSsl: false },
	});
	const ssl = createSslOverlay("ssl", { enableCertificateVerification: false });

	it("should produce the same configuration in either order", () => {
		const saslFirst = createConfig();
		composeMessagingStrategies("saslPlain", [sasl, ssl]).apply(saslFirst);
		const sslFirst = createConfig();
		composeMessagingStrategies("saslPlain", [ssl, sasl]).apply(sslFirst);

		expect(saslFirst).toEqual(sslFirst);
		expect(saslFirst.securityProtocol).toBe("sasl_ssl");
		expect(saslFirst.ssl).toEqual({ enableCertificateVerification: false });
	});

	it("should be idempotent", () => {
		const once = createConfig();
		ssl.apply(once);
		const twice = createConfig();
		ssl.apply(twice);
		ssl.apply(twice);

		expect(twice).toEqual(once);
	});
});

describe("normalizeSslSettings", () => {
	it("should drop blank locations", () => {
		expect(normalizeSslSettings({ caLocation: "", keyPassword: " " })).toEqual({ enableCertificateVerification: true });
	});

	it("should require the certificate and key together", () => {
		expect(() => normalizeSslSettings({ keyLocation: "/certs/client.key" })).toThrow(
			"Certificate and key locations must be provided together."
		);
	});
});

describe("validateMessagingAuthConfig", () => {
	it("should return a complete configuration unchanged", () => {
		const auth: MessagingAuthConfig = { type: "ssl", ssl: {} };

		expect(validateMessagingAuthConfig(auth)).toBe(auth);
	});
});

function captureError(action: () => unknown): Error | undefined {
	try {
		action();
	} catch (error) {
		return error instanceof Error ? error : undefined;
	}
	return undefined;
}
