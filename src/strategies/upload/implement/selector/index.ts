// src/strategies/upload/implement/selector/index.ts
import type { ClientSelectionPolicy } from '../../../../types';
import type { IClientSelector } from '../../interfaces/IClientSelector';
import { RandomClientSelector } from './RandomClientSelector';
import { RoundRobinClientSelector } from './RoundRobinClientSelector';

export { RandomClientSelector, RoundRobinClientSelector };

export function createClientSelector(policy: ClientSelectionPolicy): IClientSelector {
	switch (policy) {
		case 'Random':
			return new RandomClientSelector();
		case 'RoundRobin':
			return new RoundRobinClientSelector();
		default:
			throw new Error(`Unknown client selection policy: ${String(policy)}`);
	}
}
