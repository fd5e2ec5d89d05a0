// src/cloudhome/listener-set.ts
import type { HomeLogger } from './types.js';

/**
 * Fan-out helper. A listener that throws is logged and does not stop the
 * others from being called.
 */
export class ListenerSet<T extends unknown[]> {
	private readonly listeners = new Set<(...args: T) => void>();

	public constructor(
		private readonly log: HomeLogger,
		private readonly label: string,
	) {}

	/** Returns an unsubscribe function. */
	public add(listener: (...args: T) => void): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	public emit(...args: T): void {
		for (const listener of [...this.listeners]) {
			try {
				listener(...args);
			} catch (err) {
				this.log.error('%s listener threw: %s', this.label, err instanceof Error ? err.message : String(err));
			}
		}
	}

	public clear(): void {
		this.listeners.clear();
	}

	public get size(): number {
		return this.listeners.size;
	}
}
