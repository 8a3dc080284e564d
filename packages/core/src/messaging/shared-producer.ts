/**
 * Shared Producer
 *
 * Lazily created producer reused by every produce step that does not
 * customize its connection. Concurrent first callers receive the same
 * producer; a failed creation is forgotten so the next call retries.
 */

import { ScenarioStateError } from "../errors";
import type { BrokerProducer, MessageBrokerAdapter, ProducerConnection } from "./broker.types";

export class SharedProducer {
	private pending?: Promise<BrokerProducer>;
	private disposed = false;

	constructor(
		private readonly adapter: MessageBrokerAdapter,
		private readonly connection: ProducerConnection
	) {}

	/**
	 * Whether the producer has been requested at least once
	 */
	get isCreated(): boolean {
		return this.pending !== undefined;
	}

	get isDisposed(): boolean {
		return this.disposed;
	}

	get(): Promise<BrokerProducer> {
		if (this.disposed) {
			return Promise.reject(new ScenarioStateError("Shared producer has been disposed", "disposed"));
		}
		if (!this.pending) {
			const creation = this.adapter.createProducer(this.connection);
			this.pending = creation;
			void creation.catch(() => {
				if (this.pending === creation) {
					this.pending = undefined;
				}
			});
		}
		return this.pending;
	}

	/**
	 * Close the producer if it was ever created. Subsequent calls do nothing.
	 */
	async dispose(): Promise<void> {
		if (this.disposed) {
			return;
		}
		this.disposed = true;
		const pending = this.pending;
		this.pending = undefined;
		if (!pending) {
			return;
		}
		const producer = await pending.catch(() => undefined);
		await producer?.close();
	}
}
