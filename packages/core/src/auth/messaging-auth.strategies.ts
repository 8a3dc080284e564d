/**
 * Messaging Authentication Strategies
 *
 * SASL strategies set credentials, SSL strategies set the TLS block. They
 * can be combined: a SASL variant with an `ssl` block resolves to both, and
 * the resulting client configuration does not depend on which runs first.
 */

import { ConfigurationError } from "../errors";
import { isBlank } from "../utils";
import type {
	MessagingAuthConfigMap,
	MessagingAuthStrategy,
	MessagingAuthType,
	MessagingClientConfig,
	SaslMechanism,
	SaslSettings,
	SslSettings,
} from "./auth.types";

export type MessagingAuthStrategyFactory<K extends MessagingAuthType> = (
	config: MessagingAuthConfigMap[K]
) => MessagingAuthStrategy;

const MECHANISM_LABELS: Record<SaslMechanism, string> = {
	plain: "SASL/PLAIN",
	"scram-sha-256": "SASL/SCRAM-SHA-256",
	"scram-sha-512": "SASL/SCRAM-SHA-512",
};

function usesTls(config: MessagingClientConfig): boolean {
	return config.ssl !== undefined || config.securityProtocol === "ssl" || config.securityProtocol === "sasl_ssl";
}

// =============================================================================
// SASL
// =============================================================================

function createSaslStrategy(
	type: MessagingAuthType,
	mechanism: SaslMechanism,
	settings: SaslSettings | null | undefined,
	blockName: string
): MessagingAuthStrategy {
	const label = MECHANISM_LABELS[mechanism];
	if (!settings) {
		throw new ConfigurationError(`Authentication type '${type}' requires a '${blockName}' configuration block.`, blockName);
	}
	if (isBlank(settings.username)) {
		throw new ConfigurationError(`SASL username is required for ${label} authentication.`, `${blockName}.username`);
	}
	if (isBlank(settings.password)) {
		throw new ConfigurationError(`SASL password is required for ${label} authentication.`, `${blockName}.password`);
	}
	const sasl = { mechanism, username: settings.username, password: settings.password };
	const useSsl = settings.useSsl ?? true;

	return {
		type,
		apply(config) {
			config.sasl = { ...sasl };
			config.securityProtocol = useSsl || usesTls(config) ? "sasl_ssl" : "sasl_plaintext";
		},
	};
}

// =============================================================================
// SSL
// =============================================================================

/**
 * Validate SSL settings and fill defaults. Keys left unset stay absent.
 */
export function normalizeSslSettings(
	settings: SslSettings,
	requireClientCertificate = false
): SslSettings & { enableCertificateVerification: boolean } {
	const hasCertificate = !isBlank(settings.certificateLocation);
	const hasKey = !isBlank(settings.keyLocation);

	if (requireClientCertificate && (!hasCertificate || !hasKey)) {
		throw new ConfigurationError(
			"Mutual TLS requires both certificateLocation and keyLocation.",
			hasCertificate ? "ssl.keyLocation" : "ssl.certificateLocation"
		);
	}
	if (hasCertificate !== hasKey) {
		throw new ConfigurationError(
			"Certificate and key locations must be provided together.",
			hasCertificate ? "ssl.keyLocation" : "ssl.certificateLocation"
		);
	}

	const normalized: SslSettings & { enableCertificateVerification: boolean } = {
		enableCertificateVerification: settings.enableCertificateVerification ?? true,
	};
	if (!isBlank(settings.caLocation)) normalized.caLocation = settings.caLocation;
	if (hasCertificate) normalized.certificateLocation = settings.certificateLocation;
	if (hasKey) normalized.keyLocation = settings.keyLocation;
	if (!isBlank(settings.keyPassword)) normalized.keyPassword = settings.keyPassword;
	return normalized;
}

/**
 * Transport-security overlay. Idempotent.
 */
export function createSslOverlay(
	type: MessagingAuthType,
	settings: SslSettings,
	requireClientCertificate = false
): MessagingAuthStrategy {
	const ssl = normalizeSslSettings(settings, requireClientCertificate);

	return {
		type,
		apply(config) {
			config.ssl = { ...ssl };
			config.securityProtocol = config.sasl ? "sasl_ssl" : "ssl";
		},
	};
}

function createSslStrategy(
	type: MessagingAuthType,
	settings: SslSettings | null | undefined,
	requireClientCertificate: boolean
): MessagingAuthStrategy {
	if (!settings) {
		throw new ConfigurationError(`Authentication type '${type}' requires an 'ssl' configuration block.`, "ssl");
	}
	return createSslOverlay(type, settings, requireClientCertificate);
}

/**
 * Applies several strategies in order
 */
export function composeMessagingStrategies(
	type: MessagingAuthType,
	strategies: readonly MessagingAuthStrategy[]
): MessagingAuthStrategy {
	return {
		type,
		apply(config) {
			for (const strategy of strategies) {
				strategy.apply(config);
			}
		},
	};
}

function withOverlay(primary: MessagingAuthStrategy, ssl: SslSettings | null | undefined): MessagingAuthStrategy {
	if (!ssl) {
		return primary;
	}
	return composeMessagingStrategies(primary.type, [primary, createSslOverlay(primary.type, ssl)]);
}

// =============================================================================
// Factory table
// =============================================================================

export const noMessagingAuth: MessagingAuthStrategy = {
	type: "none",
	apply() {},
};

/**
 * Factory table. Adding a messaging auth variant means adding an entry here.
 */
export const messagingAuthStrategies: { [K in MessagingAuthType]: MessagingAuthStrategyFactory<K> } = {
	none: () => noMessagingAuth,
	saslPlain: (config) =>
		withOverlay(createSaslStrategy("saslPlain", "plain", config.saslPlain, "saslPlain"), config.ssl),
	saslScram256: (config) =>
		withOverlay(createSaslStrategy("saslScram256", "scram-sha-256", config.saslScram, "saslScram"), config.ssl),
	saslScram512: (config) =>
		withOverlay(createSaslStrategy("saslScram512", "scram-sha-512", config.saslScram, "saslScram"), config.ssl),
	ssl: (config) => createSslStrategy("ssl", config.ssl, false),
	mutualTls: (config) => createSslStrategy("mutualTls", config.ssl, true),
};
