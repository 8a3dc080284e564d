/**
 * Authentication Types
 *
 * Authentication configuration for HTTP requests and messaging clients.
 * Each configuration is a discriminated union on `type`; a variant carries
 * only its own settings block. Blocks are optional in the types because
 * they usually come from loaded settings, and are validated when the
 * strategy is resolved.
 */

import type { HttpRequest } from "../http/http.types";

// =============================================================================
// HTTP Authentication
// =============================================================================

export interface BasicCredentials {
	username: string;
	password: string;
}

export interface BearerSettings {
	token: string;
	/** @default "Bearer" */
	prefix?: string;
}

export type ApiKeyLocation = "header" | "query";

export interface ApiKeySettings {
	/** @default "X-API-Key" */
	keyName?: string;
	value: string;
	/** @default "header" */
	location?: ApiKeyLocation;
}

export interface CustomHeaderSettings {
	headers: Record<string, string>;
}

export type OAuth2GrantType = "client_credentials" | "password" | "refresh_token" | "authorization_code";

export interface OAuth2Settings {
	tokenUrl: string;
	clientId: string;
	clientSecret: string;
	/** @default "client_credentials" */
	grantType?: OAuth2GrantType;
	scopes?: string[];
	/** Resource owner credentials for the password grant */
	username?: string;
	password?: string;
	refreshToken?: string;
	authorizationCode?: string;
	redirectUri?: string;
	additionalParameters?: Record<string, string>;
}

export interface CertificateSettings {
	certificatePath: string;
	password?: string;
}

/**
 * HTTP auth variants keyed by discriminant
 */
export interface HttpAuthConfigMap {
	none: { type: "none" };
	basic: { type: "basic"; basic?: BasicCredentials | null };
	bearer: { type: "bearer"; bearer?: BearerSettings | null };
	apiKey: { type: "apiKey"; apiKey?: ApiKeySettings | null };
	customHeader: { type: "customHeader"; customHeader?: CustomHeaderSettings | null };
	oauth2: { type: "oauth2"; oauth2?: OAuth2Settings | null };
	certificate: { type: "certificate"; certificate?: CertificateSettings | null };
}

export type HttpAuthType = keyof HttpAuthConfigMap;

export type HttpAuthConfig = HttpAuthConfigMap[HttpAuthType];

/**
 * Applies one authentication mechanism to an outgoing request
 */
export interface HttpAuthStrategy {
	readonly type: HttpAuthType;
	apply(request: HttpRequest): Promise<void>;
}

// =============================================================================
// Messaging Authentication
// =============================================================================

export type SecurityProtocol = "plaintext" | "ssl" | "sasl_plaintext" | "sasl_ssl";

export type SaslMechanism = "plain" | "scram-sha-256" | "scram-sha-512";

export interface SaslSettings {
	username: string;
	password: string;
	/** @default true */
	useSsl?: boolean;
}

export interface SslSettings {
	caLocation?: string;
	certificateLocation?: string;
	keyLocation?: string;
	keyPassword?: string;
	/** @default true */
	enableCertificateVerification?: boolean;
}

/**
 * Messaging auth variants keyed by discriminant. SASL variants accept an
 * `ssl` block applied as a transport-security overlay.
 */
export interface MessagingAuthConfigMap {
	none: { type: "none" };
	saslPlain: { type: "saslPlain"; saslPlain?: SaslSettings | null; ssl?: SslSettings | null };
	saslScram256: { type: "saslScram256"; saslScram?: SaslSettings | null; ssl?: SslSettings | null };
	saslScram512: { type: "saslScram512"; saslScram?: SaslSettings | null; ssl?: SslSettings | null };
	ssl: { type: "ssl"; ssl?: SslSettings | null };
	mutualTls: { type: "mutualTls"; ssl?: SslSettings | null };
}

export type MessagingAuthType = keyof MessagingAuthConfigMap;

export type MessagingAuthConfig = MessagingAuthConfigMap[MessagingAuthType];

/**
 * Broker client configuration that messaging strategies mutate.
 * Adapters translate it to their client library's options.
 */
export interface MessagingClientConfig {
	brokers: string[];
	securityProtocol: SecurityProtocol;
	sasl?: {
		mechanism: SaslMechanism;
		username: string;
		password: string;
	};
	ssl?: SslSettings & { enableCertificateVerification: boolean };
}

/**
 * Applies one authentication mechanism to a broker client configuration
 */
export interface MessagingAuthStrategy {
	readonly type: MessagingAuthType;
	apply(config: MessagingClientConfig): void;
}
