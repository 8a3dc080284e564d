/**
 * HTTP Transport Types
 */

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE" | "PATCH" | "HEAD" | "OPTIONS";

export interface QueryParam {
	name: string;
	value: string;
}

/**
 * Client certificate attached by certificate authentication
 */
export interface ClientCertificate {
	certificatePath: string;
	password?: string;
}

/**
 * Outgoing request. Mutable: auth strategies add headers, query
 * parameters or a client certificate before it is sent.
 */
export interface HttpRequest {
	url: string;
	method: HttpMethod;
	headers: Record<string, string>;
	query: QueryParam[];
	body?: string;
	clientCertificate?: ClientCertificate;
}

export interface HttpResponse {
	status: number;
	statusText: string;
	/** Header names are lower-cased */
	headers: Record<string, string>;
	body: string;
}

/**
 * HTTP transport client
 */
export interface HttpTransport {
	send(request: HttpRequest, signal: AbortSignal): Promise<HttpResponse>;
}

/**
 * Build the final URL, appending query parameters in order
 */
export function buildRequestUrl(request: Pick<HttpRequest, "url" | "query">): string {
	if (request.query.length === 0) {
		return request.url;
	}
	const url = new URL(request.url);
	for (const param of request.query) {
		url.searchParams.append(param.name, param.value);
	}
	return url.toString();
}
