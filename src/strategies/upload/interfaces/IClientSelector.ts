// src/strategies/upload/interfaces/IClientSelector.ts

/**
 * Chooses which client carries the next upload.
 */
export interface IClientSelector {
	/**
	 * @param clients non-empty list of candidate clients
	 */
	select<T>(clients: readonly T[]): T;
}
