// src/strategies/upload/implement/selector/RandomClientSelector.ts
import type { IClientSelector } from '../../interfaces/IClientSelector';

/**
 * Uniform random choice for every upload.
 */
export class RandomClientSelector implements IClientSelector {
	constructor(private readonly random: () => number = Math.random) { }

	public select<T>(clients: readonly T[]): T {
		const index = Math.min(Math.floor(this.random() * clients.length), clients.length - 1);
		const client = clients[index];
		if (client === undefined) {
			throw new Error('[RandomClientSelector] No client to select from.');
		}
		return client;
	}
}
