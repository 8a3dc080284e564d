/**
 * HTTP Step Builder
 *
 * Configures the method, body, headers, query and authentication of the
 * scenario's current HTTP step.
 *
 * @example
 * ```typescript
 * const response = await given()
 *   .apiResource("https://api.example.com/products")
 *   .withBearerToken("test-token")
 *   .post({ name: "Laptop" })
 *   .execute();
 * ```
 */

import { validateHttpAuthConfig } from "../auth/auth.resolver";
import type { ApiKeyLocation, HttpAuthConfig, OAuth2Settings } from "../auth/auth.types";
import type { HttpMethod } from "../http/http.types";
import type { StepResult } from "../results/result.types";
import { requireStepKind, withStep } from "../steps/step.factory";
import type { HttpStep, StepSpecification } from "../steps/step.types";
import { HttpValidationBuilder } from "../validation/http.validation";
import { requireName, StepBuilder, unexpectedResult } from "./step-builder";

export class HttpStepBuilder extends StepBuilder<HttpStep, HttpValidationBuilder> {
	protected narrow(step: StepSpecification | undefined): HttpStep {
		return requireStepKind(step, ["http"]);
	}

	protected validate(result: StepResult): HttpValidationBuilder {
		if (result.kind !== "http") {
			throw unexpectedResult("http", result);
		}
		return new HttpValidationBuilder(result);
	}

	// =========================================================================
	// Method and body
	// =========================================================================

	withMethod(method: HttpMethod, body?: unknown): this {
		return this.update((step) => withStep(step, { method, body }));
	}

	get(): this {
		return this.withMethod("GET");
	}

	post(body?: unknown): this {
		return this.withMethod("POST", body);
	}

	put(body?: unknown): this {
		return this.withMethod("PUT", body);
	}

	patch(body?: unknown): this {
		return this.withMethod("PATCH", body);
	}

	delete(): this {
		return this.withMethod("DELETE");
	}

	head(): this {
		return this.withMethod("HEAD");
	}

	options(): this {
		return this.withMethod("OPTIONS");
	}

	withBody(body: unknown): this {
		return this.update((step) => withStep(step, { body }));
	}

	// =========================================================================
	// Headers and query
	// =========================================================================

	withHeader(name: string, value: string): this {
		requireName(name, "Header name");
		return this.update((step) => withStep(step, { headers: { ...step.headers, [name]: value } }));
	}

	withHeaders(headers: Readonly<Record<string, string>>): this {
		for (const name of Object.keys(headers)) {
			requireName(name, "Header name");
		}
		return this.update((step) => withStep(step, { headers: { ...step.headers, ...headers } }));
	}

	/**
	 * Append a query parameter. Repeated names are sent once per call.
	 */
	withQueryParam(name: string, value: string | number | boolean): this {
		requireName(name, "Query parameter name");
		return this.update((step) =>
			withStep(step, { queryParams: [...step.queryParams, { name, value: String(value) }] })
		);
	}

	withQueryParams(params: Readonly<Record<string, string | number | boolean>>): this {
		for (const [name, value] of Object.entries(params)) {
			this.withQueryParam(name, value);
		}
		return this;
	}

	// =========================================================================
	// Authentication
	// =========================================================================

	/**
	 * Attach an auth configuration. The configuration is validated now, so an
	 * incomplete variant fails before anything is sent.
	 */
	withAuthConfig(auth: HttpAuthConfig): this {
		validateHttpAuthConfig(auth);
		return this.update((step) => withStep(step, { auth }));
	}

	withNoAuth(): this {
		return this.withAuthConfig({ type: "none" });
	}

	withBasicAuth(username: string, password: string): this {
		return this.withAuthConfig({ type: "basic", basic: { username, password } });
	}

	withBearerToken(token: string, prefix?: string): this {
		return this.withAuthConfig({ type: "bearer", bearer: { token, prefix } });
	}

	withApiKey(keyName: string, value: string, location: ApiKeyLocation = "header"): this {
		return this.withAuthConfig({ type: "apiKey", apiKey: { keyName, value, location } });
	}

	/**
	 * Add a header to custom header auth, keeping headers added by earlier calls
	 */
	withCustomHeader(name: string, value: string): this {
		const current = this.step.auth;
		const headers = current?.type === "customHeader" ? { ...current.customHeader?.headers } : {};
		return this.withAuthConfig({ type: "customHeader", customHeader: { headers: { ...headers, [name]: value } } });
	}

	withCustomHeaders(headers: Readonly<Record<string, string>>): this {
		const current = this.step.auth;
		const existing = current?.type === "customHeader" ? current.customHeader?.headers : undefined;
		return this.withAuthConfig({ type: "customHeader", customHeader: { headers: { ...existing, ...headers } } });
	}

	withOAuth(settings: OAuth2Settings): this {
		return this.withAuthConfig({ type: "oauth2", oauth2: settings });
	}

	withCertificate(certificatePath: string, password?: string): this {
		return this.withAuthConfig({ type: "certificate", certificate: { certificatePath, password } });
	}
}
