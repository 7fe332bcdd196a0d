// src/utils/ObjectKeyBuilder.ts
import { randomInt } from 'crypto';
import type { PartitionKey, UploadStrategyName } from '../types';

const OBJECT_FILE_NAME = 'data.csv';

/**
 * Builds `run=<runId>/method=<methodTag>/<col>=<value>/.../data.csv`.
 */
export function buildObjectKey(runId: string, methodTag: string, key: PartitionKey): string {
	const segments = [
		`run=${runId}`,
		`method=${methodTag}`,
		...key.map(([column, value]) => `${column}=${value}`),
		OBJECT_FILE_NAME,
	];
	return segments.join('/');
}

/**
 * Four random integers in [0, 255] concatenated as decimal text (e.g. "17420931").
 */
export function generateRunId(): string {
	return Array.from({ length: 4 }, () => String(randomInt(0, 256))).join('');
}

/**
 * `manager` for the managed transfer, `client` for the shared client, `clients[N]` for a pool of N.
 * A pool keeps its `clients[N]` tag even when N is 1 so it never shares a prefix with the shared client.
 */
export function methodTagFor(strategy: UploadStrategyName, clientCount: number): string {
	switch (strategy) {
		case 'ManagedTransfer':
			return 'manager';
		case 'ClientPool':
			return `clients[${clientCount}]`;
		case 'SharedClient':
			return 'client';
	}
}
