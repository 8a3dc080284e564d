/**
 * HTTP Authentication Strategy Tests
 */

import {
	AuthenticationError,
	ConfigurationError,
	type HttpAuthConfig,
	type HttpRequest,
	MemoryTokenCache,
	buildTokenRequestBody,
	resolveHttpAuthStrategy,
	validateHttpAuthConfig,
} from "flowcheck";
import { beforeEach, describe, expect, it } from "vitest";
import { FakeHttpTransport, jsonResponse } from "../mocks/fakeHttpTransport";

const TOKEN_URL = "https://auth.test/token";

function createRequest(): HttpRequest {
	return { url: "https://api.test/items", method: "GET", headers: {}, query: [] };
}

describe("resolveHttpAuthStrategy", () => {
	let transport: FakeHttpTransport;
	let tokenCache: MemoryTokenCache;

	const resolve = (config: HttpAuthConfig | null | undefined) => resolveHttpAuthStrategy(config, { transport, tokenCache });

	const applyTo = async (config: HttpAuthConfig): Promise<HttpRequest> => {
		const request = createRequest();
		await resolve(config).apply(request);
		return request;
	};

	beforeEach(() => {
		transport = new FakeHttpTransport();
		tokenCache = new MemoryTokenCache();
	});

	it("should resolve a missing configuration to the no-op strategy", async () => {
		const strategy = resolve(null);
		const request = createRequest();
		await strategy.apply(request);

		expect(strategy.type).toBe("none");
		expect(request.headers).toEqual({});
	});

	describe("basic", () => {
		it("should set a Basic Authorization header", async () => {
			const request = await applyTo({ type: "basic", basic: { username: "user", password: "test-secret" } });

			expect(request.headers.Authorization).toBe("Basic dXNlcjp0ZXN0LXNlY3JldA==");
		});

		it("should require the basic block", () => {
			expect(() => resolve({ type: "basic" })).toThrow(
				"Authentication type 'basic' requires a 'basic' configuration block."
			);
		});

		it("should require a username and a password", () => {
			expect(() => resolve({ type: "basic", basic: { username: " ", password: "test-secret" } })).toThrow(
				"Username is required for Basic authentication."
			);
			expect(() => resolve({ type: "basic", basic: { username: "user", password: "" } })).toThrow(
				"Password is required for Basic authentication."
			);
		});
	});

	describe("bearer", () => {
		it("should use the Bearer prefix by default", async () => {
			const request = await applyTo({ type: "bearer", bearer: { token: "test-token" } });

			expect(request.headers.Authorization).toBe("Bearer test-token");
		});

		it("should use a custom prefix", async () => {
			const request = await applyTo({ type: "bearer", bearer: { token: "test-token", prefix: "Token" } });

			expect(request.headers.Authorization).toBe("Token test-token");
		});

		it("should require a token", () => {
			const error = captureError(() => resolve({ type: "bearer", bearer: { token: "" } }));

			expect(error).toBeInstanceOf(ConfigurationError);
			expect(error?.message).toBe("Token is required for Bearer authentication.");
		});
	});

	describe("apiKey", () => {
		it("should send the key in the X-API-Key header by default", async () => {
			const request = await applyTo({ type: "apiKey", apiKey: { value: "test-key" } });

			expect(request.headers["X-API-Key"]).toBe("test-key");
		});

		it("should send the key as a query parameter", async () => {
			const request = await applyTo({
				type: "apiKey",
				apiKey: { keyName: "api_key", value: "test-key", location: "query" },
			});

			expect(request.query).toEqual([{ name: "api_key", value: "test-key" }]);
			expect(request.headers).toEqual({});
		});

		it("should require a value", () => {
			expect(() => resolve({ type: "apiKey", apiKey: { value: "" } })).toThrow(
				"API key value is required for API key authentication."
			);
		});
	});

	describe("customHeader", () => {
		it("should set every non-blank header", async () => {
			const request = await applyTo({
				type: "customHeader",
				customHeader: { headers: { "X-Tenant": "acme", "X-Empty": " " } },
			});

			expect(request.headers).toEqual({ "X-Tenant": "acme" });
		});

		it("should require at least one usable header", () => {
			expect(() => resolve({ type: "customHeader", customHeader: { headers: { "X-Empty": "" } } })).toThrow(
				"At least one header is required for custom header authentication."
			);
		});
	});

	describe("certificate", () => {
		it("should attach the client certificate to the request", async () => {
			const request = await applyTo({
				type: "certificate",
				certificate: { certificatePath: "/certs/client.p12", password: "test-secret" },
			});

			expect(request.clientCertificate).toEqual({ certificatePath: "/certs/client.p12", password: "test-secret" });
		});

		it("should require a certificate path", () => {
			expect(() => resolve({ type: "certificate", certificate: { certificatePath: "" } })).toThrow(
				"Certificate path is required for certificate authentication."
			);
		});
	});

	describe("oauth2", () => {
		const oauth2 = { tokenUrl: TOKEN_URL, clientId: "client-1", clientSecret: "test-secret" };

		it("should fetch a token and set it as a Bearer header", async () => {
			transport.on(`POST ${TOKEN_URL}`, jsonResponse(200, { access_token: "issued-token", expires_in: 3600 }));

			const request = await applyTo({ type: "oauth2", oauth2 });

			expect(request.headers.Authorization).toBe("Bearer issued-token");
			expect(transport.lastRequest?.headers).toEqual({
				"Content-Type": "application/x-www-form-urlencoded",
				Accept: "application/json",
			});
			expect(transport.lastRequest?.body).toBe(
				"grant_type=client_credentials&client_id=client-1&client_secret=test-secret"
			);
		});

		it("should reuse a cached token", async () => {
			transport.on(`POST ${TOKEN_URL}`, jsonResponse(200, { access_token: "issued-token" }));
			const strategy = resolve({ type: "oauth2", oauth2 });

			await strategy.apply(createRequest());
			await strategy.apply(createRequest());

			expect(transport.requests).toHaveLength(1);
		});

		it("should fail with AuthenticationError on a rejected token request", async () => {
			transport.on(`POST ${TOKEN_URL}`, jsonResponse(401, { error: "invalid_client" }, "Unauthorized"));

			const request = createRequest();
			const failure = resolve({ type: "oauth2", oauth2 }).apply(request);

			await expect(failure).rejects.toBeInstanceOf(AuthenticationError);
			await expect(failure).rejects.toThrow(
				`OAuth2 token request to '${TOKEN_URL}' failed with status 401 Unauthorized`
			);
		});

		it("should fail when the response has no access token", async () => {
			transport.on(`POST ${TOKEN_URL}`, jsonResponse(200, { token_type: "Bearer" }));

			await expect(resolve({ type: "oauth2", oauth2 }).apply(createRequest())).rejects.toThrow(
				`OAuth2 token response from '${TOKEN_URL}' has no access_token`
			);
		});

		it("should require grant-specific fields", () => {
			expect(() => resolve({ type: "oauth2", oauth2: { ...oauth2, grantType: "password" } })).toThrow(
				"Username and password are required for the OAuth2 password grant."
			);
			expect(() => resolve({ type: "oauth2", oauth2: { ...oauth2, grantType: "refresh_token" } })).toThrow(
				"Refresh token is required for the OAuth2 refresh_token grant."
			);
		});

		it("should require a token URL", () => {
			expect(() => resolve({ type: "oauth2", oauth2: { ...oauth2, tokenUrl: "" } })).toThrow(
				"Token URL is required for OAuth2 authentication."
			);
		});
	});
});

describe("buildTokenRequestBody", () => {
	it("should add scopes and additional parameters after the grant fields", () => {
		const body = buildTokenRequestBody({
			tokenUrl: TOKEN_URL,
			clientId: "client-1",
			clientSecret: "test-secret",
			scopes: ["read", "write"],
			additionalParameters: { audience: "api" },
		});

		expect(body).toBe(
			"grant_type=client_credentials&client_id=client-1&client_secret=test-secret&scope=read+write&audience=api"
		);
	});

	it("should include credentials for the password grant", () => {
		const body = buildTokenRequestBody({
			tokenUrl: TOKEN_URL,
			clientId: "client-1",
			clientSecret: "test-secret",
			grantType: "password",
			username: "ada",
			password: "test-password",
		});

		expect(body).toBe(
			"grant_type=password&client_id=client-1&client_secret=test-secret&username=ada&password=test-password"
		);
	});
});

describe("validateHttpAuthConfig", () => {
	it("should return a complete configuration unchanged", () => {
		const config: HttpAuthConfig = { type: "bearer", bearer: { token: "test-token" } };

		expect(validateHttpAuthConfig(config)).toBe(config);
	});

	it("should throw for an incomplete configuration", () => {
		expect(() => validateHttpAuthConfig({ type: "oauth2" })).toThrow(
			"Authentication type 'oauth2' requires a 'oauth2' configuration block."
		);
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
