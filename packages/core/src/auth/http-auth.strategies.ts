/**
 * HTTP Authentication Strategies
 *
 * One factory per HTTP auth variant. Factories validate the variant's
 * settings eagerly and return a strategy that only mutates the request.
 */

import { AuthenticationError, ConfigurationError, toError } from "../errors";
import type { HttpRequest, HttpTransport } from "../http/http.types";
import { isBlank, isRecord, withTimeout } from "../utils";
import type { HttpAuthConfigMap, HttpAuthStrategy, HttpAuthType, OAuth2Settings } from "./auth.types";
import { type CachedToken, oauth2CacheKey, type TokenCache } from "./token-cache";

/**
 * Collaborators available to strategies that perform I/O
 */
export interface HttpAuthDependencies {
	transport: HttpTransport;
	tokenCache: TokenCache;
	/** @default 30000 */
	tokenRequestTimeoutMs?: number;
}

export type HttpAuthStrategyFactory<K extends HttpAuthType> = (
	config: HttpAuthConfigMap[K],
	deps: HttpAuthDependencies
) => HttpAuthStrategy;

const DEFAULT_API_KEY_NAME = "X-API-Key";
const DEFAULT_TOKEN_LIFETIME_SECONDS = 3600;

function requireBlock<T>(block: T | null | undefined, type: string, name: string): T {
	if (block === undefined || block === null) {
		throw new ConfigurationError(`Authentication type '${type}' requires a '${name}' configuration block.`, name);
	}
	return block;
}

function requireValue(value: string | null | undefined, message: string, field: string): string {
	if (value === undefined || value === null || isBlank(value)) {
		throw new ConfigurationError(message, field);
	}
	return value;
}

// =============================================================================
// Simple strategies
// =============================================================================

export const noHttpAuth: HttpAuthStrategy = {
	type: "none",
	async apply() {},
};

export const createBasicStrategy: HttpAuthStrategyFactory<"basic"> = (config) => {
	const basic = requireBlock(config.basic, "basic", "basic");
	const username = requireValue(basic.username, "Username is required for Basic authentication.", "basic.username");
	const password = requireValue(basic.password, "Password is required for Basic authentication.", "basic.password");
	const encoded = Buffer.from(`${username}:${password}`, "utf-8").toString("base64");

	return {
		type: "basic",
		async apply(request) {
			request.headers.Authorization = `Basic ${encoded}`;
		},
	};
};

export const createBearerStrategy: HttpAuthStrategyFactory<"bearer"> = (config) => {
	const bearer = requireBlock(config.bearer, "bearer", "bearer");
	const token = requireValue(bearer.token, "Token is required for Bearer authentication.", "bearer.token");
	const prefix = bearer.prefix && !isBlank(bearer.prefix) ? bearer.prefix : "Bearer";

	return {
		type: "bearer",
		async apply(request) {
			request.headers.Authorization = `${prefix} ${token}`;
		},
	};
};

export const createApiKeyStrategy: HttpAuthStrategyFactory<"apiKey"> = (config) => {
	const apiKey = requireBlock(config.apiKey, "apiKey", "apiKey");
	const keyName = apiKey.keyName === undefined ? DEFAULT_API_KEY_NAME : apiKey.keyName;
	requireValue(keyName, "API key name is required for API key authentication.", "apiKey.keyName");
	const value = requireValue(apiKey.value, "API key value is required for API key authentication.", "apiKey.value");
	const location = apiKey.location ?? "header";

	return {
		type: "apiKey",
		async apply(request) {
			if (location === "query") {
				request.query.push({ name: keyName, value });
			} else {
				request.headers[keyName] = value;
			}
		},
	};
};

export const createCustomHeaderStrategy: HttpAuthStrategyFactory<"customHeader"> = (config) => {
	const settings = requireBlock(config.customHeader, "customHeader", "customHeader");
	const entries = Object.entries(settings.headers ?? {}).filter(([name, value]) => !isBlank(name) && !isBlank(value));
	if (entries.length === 0) {
		throw new ConfigurationError(
			"At least one header is required for custom header authentication.",
			"customHeader.headers"
		);
	}

	return {
		type: "customHeader",
		async apply(request) {
			for (const [name, value] of entries) {
				request.headers[name] = value;
			}
		},
	};
};

export const createCertificateStrategy: HttpAuthStrategyFactory<"certificate"> = (config) => {
	const certificate = requireBlock(config.certificate, "certificate", "certificate");
	const certificatePath = requireValue(
		certificate.certificatePath,
		"Certificate path is required for certificate authentication.",
		"certificate.certificatePath"
	);

	return {
		type: "certificate",
		async apply(request) {
			request.clientCertificate = { certificatePath, password: certificate.password };
		},
	};
};

// =============================================================================
// OAuth2
// =============================================================================

function validateOAuth2(settings: OAuth2Settings): void {
	requireValue(settings.tokenUrl, "Token URL is required for OAuth2 authentication.", "oauth2.tokenUrl");
	requireValue(settings.clientId, "Client ID is required for OAuth2 authentication.", "oauth2.clientId");
	requireValue(settings.clientSecret, "Client secret is required for OAuth2 authentication.", "oauth2.clientSecret");

	switch (settings.grantType ?? "client_credentials") {
		case "password":
			if (isBlank(settings.username) || isBlank(settings.password)) {
				throw new ConfigurationError(
					"Username and password are required for the OAuth2 password grant.",
					"oauth2.username"
				);
			}
			break;
		case "refresh_token":
			requireValue(
				settings.refreshToken,
				"Refresh token is required for the OAuth2 refresh_token grant.",
				"oauth2.refreshToken"
			);
			break;
		case "authorization_code":
			if (isBlank(settings.authorizationCode) || isBlank(settings.redirectUri)) {
				throw new ConfigurationError(
					"Authorization code and redirect URI are required for the OAuth2 authorization_code grant.",
					"oauth2.authorizationCode"
				);
			}
			break;
		case "client_credentials":
			break;
	}
}

/**
 * Build the form body of a token request
 */
export function buildTokenRequestBody(settings: OAuth2Settings): string {
	const grantType = settings.grantType ?? "client_credentials";
	const form = new URLSearchParams();
	form.set("grant_type", grantType);
	form.set("client_id", settings.clientId);
	form.set("client_secret", settings.clientSecret);

	if (grantType === "password") {
		form.set("username", settings.username ?? "");
		form.set("password", settings.password ?? "");
	} else if (grantType === "refresh_token") {
		form.set("refresh_token", settings.refreshToken ?? "");
	} else if (grantType === "authorization_code") {
		form.set("code", settings.authorizationCode ?? "");
		form.set("redirect_uri", settings.redirectUri ?? "");
	}

	if (settings.scopes && settings.scopes.length > 0) {
		form.set("scope", settings.scopes.join(" "));
	}
	for (const [name, value] of Object.entries(settings.additionalParameters ?? {})) {
		form.set(name, value);
	}
	return form.toString();
}

async function requestToken(settings: OAuth2Settings, deps: HttpAuthDependencies): Promise<CachedToken> {
	const timeoutMs = deps.tokenRequestTimeoutMs ?? 30000;
	const request: HttpRequest = {
		url: settings.tokenUrl,
		method: "POST",
		headers: { "Content-Type": "application/x-www-form-urlencoded", Accept: "application/json" },
		query: [],
		body: buildTokenRequestBody(settings),
	};

	const response = await withTimeout(
		(signal) => deps.transport.send(request, signal),
		timeoutMs,
		`OAuth2 token request to '${settings.tokenUrl}' timed out after ${timeoutMs}ms`
	).catch((error: unknown) => {
		throw new AuthenticationError(`OAuth2 token request to '${settings.tokenUrl}' failed: ${toError(error).message}`, {
			cause: error,
		});
	});

	if (response.status < 200 || response.status > 299) {
		throw new AuthenticationError(
			`OAuth2 token request to '${settings.tokenUrl}' failed with status ${response.status} ${response.statusText}`.trim()
		);
	}

	let payload: unknown;
	try {
		payload = JSON.parse(response.body);
	} catch (error) {
		throw new AuthenticationError(`OAuth2 token response from '${settings.tokenUrl}' is not valid JSON`, { cause: error });
	}

	const accessToken = isRecord(payload) ? payload.access_token : undefined;
	if (!isRecord(payload) || typeof accessToken !== "string" || accessToken.length === 0) {
		throw new AuthenticationError(`OAuth2 token response from '${settings.tokenUrl}' has no access_token`);
	}

	const expiresIn = Number(payload.expires_in ?? DEFAULT_TOKEN_LIFETIME_SECONDS);
	const tokenType = payload.token_type;
	return {
		accessToken,
		tokenType: typeof tokenType === "string" ? tokenType : "Bearer",
		expiresAt: Date.now() + (Number.isFinite(expiresIn) ? expiresIn : DEFAULT_TOKEN_LIFETIME_SECONDS) * 1000,
	};
}

export const createOAuth2Strategy: HttpAuthStrategyFactory<"oauth2"> = (config, deps) => {
	const settings = requireBlock(config.oauth2, "oauth2", "oauth2");
	validateOAuth2(settings);
	const cacheKey = oauth2CacheKey(settings.clientId, settings.tokenUrl);

	return {
		type: "oauth2",
		async apply(request) {
			let token = deps.tokenCache.get(cacheKey);
			if (!token) {
				token = await requestToken(settings, deps);
				deps.tokenCache.set(cacheKey, token);
			}
			request.headers.Authorization = `Bearer ${token.accessToken}`;
		},
	};
};

/**
 * Factory table. Adding an HTTP auth variant means adding an entry here.
 */
export const httpAuthStrategies: { [K in HttpAuthType]: HttpAuthStrategyFactory<K> } = {
	none: () => noHttpAuth,
	basic: createBasicStrategy,
	bearer: createBearerStrategy,
	apiKey: createApiKeyStrategy,
	customHeader: createCustomHeaderStrategy,
	oauth2: createOAuth2Strategy,
	certificate: createCertificateStrategy,
};
