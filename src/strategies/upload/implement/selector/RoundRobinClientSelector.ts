// src/strategies/upload/implement/selector/RoundRobinClientSelector.ts
import type { IClientSelector } from '../../interfaces/IClientSelector';

/**
 * Cycles through the clients in order. Deterministic.
 */
export class RoundRobinClientSelector implements IClientSelector {
	private next = 0;

	public select<T>(clients: readonly T[]): T {
		const client = clients[this.next % clients.length];
		if (client === undefined) {
			throw new Error('[RoundRobinClientSelector] No client to select from.');
		}
		this.next++;
		return client;
	}
}
