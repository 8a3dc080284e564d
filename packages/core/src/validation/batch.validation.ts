/**
 * Batch Validation Builder
 */

import { AssertionFailureError } from "../errors";
import type { BatchConsumeResult, BatchProduceResult } from "../results/result.types";
import { MessageValidationBuilder } from "./message.validation";
import { ValidationBuilder } from "./validation-builder";

export class BatchValidationBuilder<R extends BatchProduceResult | BatchConsumeResult> extends ValidationBuilder<R> {
	get count(): number {
		return this.result.results.length;
	}

	assertBatchCount(expected: number): this {
		if (this.result.results.length !== expected) {
			throw new AssertionFailureError(
				`Expected ${expected} messages in batch but got ${this.result.results.length}`,
				{ expected, actual: this.result.results.length }
			);
		}
		return this;
	}

	assertAllPersisted(): this {
		const index = this.result.results.findIndex((result) => result.status !== "persisted");
		if (index >= 0) {
			throw new AssertionFailureError(
				`Expected every message to be persisted but message ${index} is ${this.result.results[index]?.status}`,
				{ expected: "persisted", actual: this.result.results[index]?.status }
			);
		}
		return this;
	}

	/**
	 * Validation builder for one message of the batch
	 */
	message(index: number): MessageValidationBuilder {
		const result = this.result.results[index];
		if (result === undefined) {
			throw new AssertionFailureError(
				`Batch has no message at index ${index} (${this.result.results.length} message(s))`,
				{ expected: index, actual: this.result.results.length }
			);
		}
		return new MessageValidationBuilder(result, this.evaluator);
	}

	forEachMessage(assert: (message: MessageValidationBuilder, index: number) => void): this {
		this.result.results.forEach((result, index) => assert(new MessageValidationBuilder(result, this.evaluator), index));
		return this;
	}
}
