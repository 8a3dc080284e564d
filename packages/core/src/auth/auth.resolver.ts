/**
 * Authentication Strategy Resolver
 *
 * Maps an auth configuration to its strategy by discriminant. Resolution
 * validates the configuration, so a missing block or blank required field
 * fails here, before any request is built.
 */

import { ConfigurationError } from "../errors";
import type { HttpTransport } from "../http/http.types";
import type {
	HttpAuthConfig,
	HttpAuthConfigMap,
	HttpAuthStrategy,
	HttpAuthType,
	MessagingAuthConfig,
	MessagingAuthConfigMap,
	MessagingAuthStrategy,
	MessagingAuthType,
} from "./auth.types";
import { type HttpAuthDependencies, httpAuthStrategies, noHttpAuth } from "./http-auth.strategies";
import { messagingAuthStrategies, noMessagingAuth } from "./messaging-auth.strategies";
import { MemoryTokenCache } from "./token-cache";

function isKnownType<T extends object>(table: T, type: unknown): type is keyof T {
	return typeof type === "string" && Object.prototype.hasOwnProperty.call(table, type);
}

function createHttpStrategy<K extends HttpAuthType>(
	type: K,
	config: HttpAuthConfigMap[K],
	deps: HttpAuthDependencies
): HttpAuthStrategy {
	return httpAuthStrategies[type](config, deps);
}

function createMessagingStrategy<K extends MessagingAuthType>(
	type: K,
	config: MessagingAuthConfigMap[K]
): MessagingAuthStrategy {
	return messagingAuthStrategies[type](config);
}

/**
 * Resolve the strategy for an HTTP auth configuration.
 * Missing or unknown types resolve to the no-op strategy.
 *
 * @throws ConfigurationError when the selected variant is incomplete
 */
export function resolveHttpAuthStrategy(
	config: HttpAuthConfig | null | undefined,
	deps: HttpAuthDependencies
): HttpAuthStrategy {
	if (!config || !isKnownType(httpAuthStrategies, config.type)) {
		return noHttpAuth;
	}
	return createHttpStrategy(config.type, config, deps);
}

/**
 * Resolve the strategy for a messaging auth configuration, including the
 * SSL overlay of SASL variants.
 *
 * @throws ConfigurationError when the selected variant is incomplete
 */
export function resolveMessagingAuthStrategy(config: MessagingAuthConfig | null | undefined): MessagingAuthStrategy {
	if (!config || !isKnownType(messagingAuthStrategies, config.type)) {
		return noMessagingAuth;
	}
	return createMessagingStrategy(config.type, config);
}

/**
 * Transport for strategies built only to validate their configuration
 */
const detachedTransport: HttpTransport = {
	send: () => Promise.reject(new ConfigurationError("Strategy was resolved for validation only and cannot send requests.")),
};

/**
 * Validate an HTTP auth configuration at the point it is attached to a step
 *
 * @throws ConfigurationError
 */
export function validateHttpAuthConfig(config: HttpAuthConfig): HttpAuthConfig {
	resolveHttpAuthStrategy(config, { transport: detachedTransport, tokenCache: new MemoryTokenCache() });
	return config;
}

/**
 * Validate a messaging auth configuration at the point it is attached to a step
 *
 * @throws ConfigurationError
 */
export function validateMessagingAuthConfig(config: MessagingAuthConfig): MessagingAuthConfig {
	resolveMessagingAuthStrategy(config);
	return config;
}
