/**
 * Scenario Settings
 *
 * Connection defaults, timeouts and fallback authentication for scenarios.
 * Loading and merging settings files is left to the caller; this module
 * validates what it is given.
 */

import { z } from "zod";
import type { HttpAuthConfig, MessagingAuthConfig } from "../auth/auth.types";
import { ConfigurationError } from "../errors";

export interface ScenarioSettings {
	bootstrapServers: string[];
	consumerGroupId: string;
	httpTimeoutMs: number;
	messageTimeoutMs: number;
	batchTimeoutMs: number;
	/** Used by HTTP steps that configure no auth */
	httpAuth?: HttpAuthConfig;
	/** Used by messaging steps that configure no auth */
	messagingAuth?: MessagingAuthConfig;
}

// =============================================================================
// Schemas
// =============================================================================

const saslSchema = z.object({
	username: z.string(),
	password: z.string(),
	useSsl: z.boolean().optional(),
});

const sslSchema = z.object({
	caLocation: z.string().optional(),
	certificateLocation: z.string().optional(),
	keyLocation: z.string().optional(),
	keyPassword: z.string().optional(),
	enableCertificateVerification: z.boolean().optional(),
});

export const httpAuthConfigSchema = z.discriminatedUnion("type", [
	z.object({ type: z.literal("none") }),
	z.object({
		type: z.literal("basic"),
		basic: z.object({ username: z.string(), password: z.string() }).nullish(),
	}),
	z.object({
		type: z.literal("bearer"),
		bearer: z.object({ token: z.string(), prefix: z.string().optional() }).nullish(),
	}),
	z.object({
		type: z.literal("apiKey"),
		apiKey: z
			.object({
				keyName: z.string().optional(),
				value: z.string(),
				location: z.enum(["header", "query"]).optional(),
			})
			.nullish(),
	}),
	z.object({
		type: z.literal("customHeader"),
		customHeader: z.object({ headers: z.record(z.string()) }).nullish(),
	}),
	z.object({
		type: z.literal("oauth2"),
		oauth2: z
			.object({
				tokenUrl: z.string(),
				clientId: z.string(),
				clientSecret: z.string(),
				grantType: z.enum(["client_credentials", "password", "refresh_token", "authorization_code"]).optional(),
				scopes: z.array(z.string()).optional(),
				username: z.string().optional(),
				password: z.string().optional(),
				refreshToken: z.string().optional(),
				authorizationCode: z.string().optional(),
				redirectUri: z.string().optional(),
				additionalParameters: z.record(z.string()).optional(),
			})
			.nullish(),
	}),
	z.object({
		type: z.literal("certificate"),
		certificate: z.object({ certificatePath: z.string(), password: z.string().optional() }).nullish(),
	}),
]);

export const messagingAuthConfigSchema = z.discriminatedUnion("type", [
	z.object({ type: z.literal("none") }),
	z.object({ type: z.literal("saslPlain"), saslPlain: saslSchema.nullish(), ssl: sslSchema.nullish() }),
	z.object({ type: z.literal("saslScram256"), saslScram: saslSchema.nullish(), ssl: sslSchema.nullish() }),
	z.object({ type: z.literal("saslScram512"), saslScram: saslSchema.nullish(), ssl: sslSchema.nullish() }),
	z.object({ type: z.literal("ssl"), ssl: sslSchema.nullish() }),
	z.object({ type: z.literal("mutualTls"), ssl: sslSchema.nullish() }),
]);

const timeoutSchema = z.number().int().positive();

export const scenarioSettingsSchema = z.object({
	bootstrapServers: z.array(z.string().min(1)).min(1).default(["localhost:9092"]),
	consumerGroupId: z.string().min(1).default("flowcheck-consumer"),
	httpTimeoutMs: timeoutSchema.default(30_000),
	messageTimeoutMs: timeoutSchema.default(30_000),
	batchTimeoutMs: timeoutSchema.default(60_000),
	httpAuth: httpAuthConfigSchema.optional(),
	messagingAuth: messagingAuthConfigSchema.optional(),
});

const envSchema = z.object({
	FLOWCHECK_BOOTSTRAP_SERVERS: z.string().optional(),
	FLOWCHECK_CONSUMER_GROUP: z.string().optional(),
	FLOWCHECK_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
	FLOWCHECK_MESSAGE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
	FLOWCHECK_BATCH_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

// =============================================================================
// Parsing
// =============================================================================

function formatIssues(error: z.ZodError): string {
	return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

/**
 * Validate settings and fill defaults
 *
 * @throws ConfigurationError listing every invalid field
 */
export function parseSettings(raw: unknown = {}): ScenarioSettings {
	const result = scenarioSettingsSchema.safeParse(raw);
	if (!result.success) {
		throw new ConfigurationError(`Invalid scenario settings: ${formatIssues(result.error)}`);
	}
	return result.data;
}

/**
 * Read settings from FLOWCHECK_* environment variables, layered over `base`
 */
export function settingsFromEnv(env: Record<string, string | undefined> = process.env, base: unknown = {}): ScenarioSettings {
	const parsed = envSchema.safeParse(env);
	if (!parsed.success) {
		throw new ConfigurationError(`Invalid environment settings: ${formatIssues(parsed.error)}`);
	}
	const vars = parsed.data;
	const overrides: Record<string, unknown> = {};

	if (vars.FLOWCHECK_BOOTSTRAP_SERVERS) {
		overrides.bootstrapServers = vars.FLOWCHECK_BOOTSTRAP_SERVERS.split(",")
			.map((server) => server.trim())
			.filter((server) => server.length > 0);
	}
	if (vars.FLOWCHECK_CONSUMER_GROUP) overrides.consumerGroupId = vars.FLOWCHECK_CONSUMER_GROUP;
	if (vars.FLOWCHECK_HTTP_TIMEOUT_MS !== undefined) overrides.httpTimeoutMs = vars.FLOWCHECK_HTTP_TIMEOUT_MS;
	if (vars.FLOWCHECK_MESSAGE_TIMEOUT_MS !== undefined) overrides.messageTimeoutMs = vars.FLOWCHECK_MESSAGE_TIMEOUT_MS;
	if (vars.FLOWCHECK_BATCH_TIMEOUT_MS !== undefined) overrides.batchTimeoutMs = vars.FLOWCHECK_BATCH_TIMEOUT_MS;

	const baseObject = typeof base === "object" && base !== null ? base : {};
	return parseSettings({ ...baseObject, ...overrides });
}

export const DEFAULT_SETTINGS: Readonly<ScenarioSettings> = Object.freeze(parseSettings());
