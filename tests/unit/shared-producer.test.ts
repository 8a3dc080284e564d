/**
 * Shared Producer Tests
 */

import { ScenarioStateError, SharedProducer, type ProducerConnection } from "flowcheck";
import { beforeEach, describe, expect, it } from "vitest";
import { FakeBrokerAdapter, InMemoryBroker } from "../mocks/fakeBrokerAdapter";

const connection: ProducerConnection = {
	client: { brokers: ["localhost:9092"], securityProtocol: "plaintext" },
	tuning: {},
};

describe("SharedProducer", () => {
	let adapter: FakeBrokerAdapter;

	beforeEach(() => {
		adapter = new FakeBrokerAdapter();
	});

	it("should create the producer lazily", async () => {
		const shared = new SharedProducer(adapter, connection);

		expect(shared.isCreated).toBe(false);
		expect(adapter.producers).toHaveLength(0);

		await shared.get();
		expect(shared.isCreated).toBe(true);
		expect(adapter.producerConnections).toEqual([connection]);
	});

	it("should give concurrent callers the same producer", async () => {
		const shared = new SharedProducer(adapter, connection);

		const [first, second] = await Promise.all([shared.get(), shared.get()]);

		expect(first).toBe(second);
		expect(adapter.producers).toHaveLength(1);
	});

	it("should retry after a failed creation", async () => {
		const failing = new FakeBrokerAdapter(new InMemoryBroker(), { failOnConnect: true });
		const shared = new SharedProducer(failing, connection);

		await expect(shared.get()).rejects.toThrow("Connection failed");
		expect(shared.isCreated).toBe(false);
	});

	it("should close the producer once on dispose", async () => {
		const shared = new SharedProducer(adapter, connection);
		await shared.get();

		await shared.dispose();
		await shared.dispose();

		expect(adapter.producers[0]?.closed).toBe(true);
		expect(shared.isDisposed).toBe(true);
		await expect(shared.get()).rejects.toBeInstanceOf(ScenarioStateError);
	});

	it("should dispose without creating a producer", async () => {
		const shared = new SharedProducer(adapter, connection);

		await shared.dispose();

		expect(adapter.producers).toHaveLength(0);
	});
});
