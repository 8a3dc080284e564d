/**
 * Message Validation Builder
 *
 * Assertions over a produced delivery report or a consumed message.
 */

import { isDeepStrictEqual } from "node:util";
import { AssertionFailureError, formatValue } from "../errors";
import type { DeliveryStatus } from "../messaging/broker.types";
import type { MessageStepResult } from "../results/result.types";
import { ValidationBuilder } from "./validation-builder";

export class MessageValidationBuilder extends ValidationBuilder<MessageStepResult> {
	assertTopic(expected: string): this {
		return this.expectField("topic", expected, this.result.topic);
	}

	assertKey(expected: string | null): this {
		return this.expectField("key", expected, this.result.key);
	}

	assertPartition(expected: number): this {
		return this.expectField("partition", expected, this.result.partition);
	}

	/**
	 * Offsets are compared by their decimal string form
	 */
	assertOffset(expected: string | number | bigint): this {
		return this.expectField("offset", String(expected), this.result.offset);
	}

	assertDeliveryStatus(expected: DeliveryStatus): this {
		return this.expectField("delivery status", expected, this.result.status);
	}

	assertHeader(name: string, expected: string): this {
		const actual = this.result.headers[name];
		if (actual !== expected) {
			throw new AssertionFailureError(
				`Expected message header '${name}' to be '${expected}' but got ${actual === undefined ? "no header" : `'${actual}'`}`,
				{ expected, actual }
			);
		}
		return this;
	}

	/**
	 * A string expectation is compared with the wire value, anything else
	 * structurally with the parsed payload
	 */
	assertMessage(expected: unknown): this {
		const actual = typeof expected === "string" ? this.result.value : this.result.data;
		if (!isDeepStrictEqual(actual, expected)) {
			throw new AssertionFailureError(
				`Expected message ${formatValue(expected)} but got ${formatValue(actual)}`,
				{ expected, actual }
			);
		}
		return this;
	}

	assertMessageMatches(predicate: (payload: unknown, result: MessageStepResult) => boolean, message?: string): this {
		if (!predicate(this.result.data, this.result)) {
			throw new AssertionFailureError(message ?? `Message ${formatValue(this.result.data)} did not satisfy the predicate`, {
				actual: this.result.data,
			});
		}
		return this;
	}

	private expectField(label: string, expected: unknown, actual: unknown): this {
		if (actual !== expected) {
			throw new AssertionFailureError(`Expected ${label} ${formatValue(expected)} but got ${formatValue(actual)}`, {
				expected,
				actual,
			});
		}
		return this;
	}
}
