/**
 * Step Specification Tests
 */

import {
	IncompatibleStepError,
	createBatchConsumeStep,
	createBatchProduceStep,
	createConsumeStep,
	createHttpStep,
	createProduceStep,
	describeStep,
	isStepOfKind,
	requireStepKind,
	snapshot,
	withStep,
} from "flowcheck";
import { describe, expect, it } from "vitest";

describe("step construction", () => {
	it("should create an HTTP step with defaults", () => {
		expect(createHttpStep("https://api.test/items")).toEqual({
			kind: "http",
			url: "https://api.test/items",
			method: "GET",
			body: undefined,
			headers: {},
			queryParams: [],
			timeoutMs: 30_000,
			auth: null,
		});
	});

	it("should create messaging steps with defaults", () => {
		const produce = createProduceStep("orders", { id: 1 }, "order-1");
		const consume = createConsumeStep("orders", 5_000);
		const batch = createBatchConsumeStep("orders", 3);

		expect(produce).toMatchObject({ kind: "produce", topic: "orders", key: "order-1", timeoutMs: 30_000 });
		expect(produce.partition).toBeNull();
		expect(consume).toMatchObject({ kind: "consume", groupId: null, expectedType: "json", timeoutMs: 5_000 });
		expect(batch).toMatchObject({ kind: "batchConsume", messageCount: 3, timeoutMs: 60_000 });
	});

	it("should freeze steps deeply", () => {
		const step = createBatchProduceStep("orders", [{ key: null, value: { id: 1 } }]);

		expect(Object.isFrozen(step)).toBe(true);
		expect(Object.isFrozen(step.messages)).toBe(true);
		expect(Object.isFrozen(step.messages[0])).toBe(true);
	});

	it("should not share message values with the caller", () => {
		const value = { id: 1 };
		const step = createProduceStep("orders", value);
		value.id = 2;

		expect(step.value).toEqual({ id: 1 });
	});
});

describe("withStep", () => {
	it("should return a new step and leave the original unchanged", () => {
		const original = createHttpStep("https://api.test/items");
		const updated = withStep(original, { method: "POST", headers: { "X-Trace": "1" } });

		expect(updated).not.toBe(original);
		expect(updated.method).toBe("POST");
		expect(updated.headers).toEqual({ "X-Trace": "1" });
		expect(original.method).toBe("GET");
		expect(original.headers).toEqual({});
	});

	it("should carry every unchanged field", () => {
		const original = withStep(createProduceStep("orders", "v", "k"), { partition: 2, timestamp: 1_700_000_000_000 });
		const updated = withStep(original, { timeoutMs: 1_000 });

		expect(updated).toEqual({ ...original, timeoutMs: 1_000 });
	});

	it("should freeze the copy", () => {
		const updated = withStep(createConsumeStep("orders"), { groupId: "group-1" });

		expect(Object.isFrozen(updated)).toBe(true);
	});
});

describe("snapshot", () => {
	it("should keep class instances by reference", () => {
		const date = new Date(0);
		const copy = snapshot({ at: date, list: [1, 2] });

		expect(copy.at).toBe(date);
		expect(Object.isFrozen(copy.list)).toBe(true);
	});
});

describe("step kinds", () => {
	const http = createHttpStep("https://api.test/items");

	it("should narrow by kind", () => {
		expect(isStepOfKind(http, ["http"])).toBe(true);
		expect(isStepOfKind(http, ["produce", "consume"])).toBe(false);
		expect(isStepOfKind(undefined, ["http"])).toBe(false);
	});

	it("should reject a step of another kind", () => {
		expect(() => requireStepKind(http, ["consume"])).toThrow(IncompatibleStepError);
	});

	it("should describe steps for reports", () => {
		expect(describeStep(http)).toBe("GET https://api.test/items");
		expect(describeStep(createProduceStep("orders", 1, "k1"))).toBe("Produce to 'orders' (key: k1)");
		expect(describeStep(createConsumeStep("orders"))).toBe("Consume from 'orders'");
		expect(describeStep(createBatchConsumeStep("orders", 2))).toBe("Consume 2 message(s) from 'orders'");
	});
});
