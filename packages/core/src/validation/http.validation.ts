/**
 * HTTP Validation Builder
 */

import { AssertionFailureError } from "../errors";
import type { HttpStepResult } from "../results/result.types";
import { ValidationBuilder } from "./validation-builder";

export class HttpValidationBuilder extends ValidationBuilder<HttpStepResult> {
	get statusCode(): number {
		return this.result.statusCode;
	}

	assertStatusCode(expected: number): this {
		if (this.result.statusCode !== expected) {
			throw new AssertionFailureError(`Expected HTTP status code ${expected} but got ${this.result.statusCode}`, {
				expected,
				actual: this.result.statusCode,
			});
		}
		return this;
	}

	/**
	 * Assert a response header is present, optionally with an exact value.
	 * Header names are matched case-insensitively.
	 */
	assertHeader(name: string, expected?: string): this {
		const actual = this.result.headers[name.toLowerCase()];
		if (actual === undefined) {
			throw new AssertionFailureError(`Expected header '${name}' to be present`, { expected: expected ?? name });
		}
		if (expected !== undefined && actual !== expected) {
			throw new AssertionFailureError(`Expected header '${name}' to be '${expected}' but got '${actual}'`, {
				expected,
				actual,
			});
		}
		return this;
	}

	assertContentType(fragment: string): this {
		const actual = this.result.contentType;
		if (actual === null || !actual.toLowerCase().includes(fragment.toLowerCase())) {
			throw new AssertionFailureError(`Expected content type containing '${fragment}' but got '${actual ?? "none"}'`, {
				expected: fragment,
				actual,
			});
		}
		return this;
	}

	assertBodyContains(text: string): this {
		if (this.result.body === null || !this.result.body.includes(text)) {
			throw new AssertionFailureError(`Expected response body to contain '${text}'`, {
				expected: text,
				actual: this.result.body,
			});
		}
		return this;
	}
}
