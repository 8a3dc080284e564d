/**
 * Fetch Transport
 *
 * Default HttpTransport backed by the global fetch.
 */

import { ConfigurationError } from "../errors";
import { buildRequestUrl, type HttpRequest, type HttpResponse, type HttpTransport } from "./http.types";

export interface FetchTransportOptions {
	/** Headers added to every request unless the request sets them */
	defaultHeaders?: Record<string, string>;
	/** Alternative fetch implementation */
	fetch?: typeof fetch;
}

export class FetchHttpTransport implements HttpTransport {
	private readonly fetchFn: typeof fetch;
	private readonly defaultHeaders: Record<string, string>;

	constructor(options: FetchTransportOptions = {}) {
		this.fetchFn = options.fetch ?? fetch;
		this.defaultHeaders = options.defaultHeaders ?? {};
	}

	async send(request: HttpRequest, signal: AbortSignal): Promise<HttpResponse> {
		if (request.clientCertificate) {
			throw new ConfigurationError(
				"Client certificates are not supported by the fetch transport. Provide an HttpTransport that supports TLS client authentication.",
				"clientCertificate"
			);
		}

		const response = await this.fetchFn(buildRequestUrl(request), {
			method: request.method,
			headers: { ...this.defaultHeaders, ...request.headers },
			body: request.body,
			signal,
		});

		const headers: Record<string, string> = {};
		response.headers.forEach((value, key) => {
			headers[key.toLowerCase()] = value;
		});

		return {
			status: response.status,
			statusText: response.statusText,
			headers,
			body: await response.text(),
		};
	}
}
