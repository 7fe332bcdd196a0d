// src/storage/interfaces/ITransferManager.ts

export type TransferStatus = 'queued' | 'in-progress' | 'completed' | 'failed';

export interface TransferHandle {
	readonly key: string;
	readonly size: number;
	readonly status: TransferStatus;
}

/**
 * Managed transfer facility: accepts any number of uploads and multiplexes them
 * over an internal pool whose concurrency it owns.
 */
export interface ITransferManager {
	readonly maxConcurrency: number;

	/**
	 * Queues one upload and returns immediately.
	 */
	submit(body: Buffer, bucket: string, key: string): TransferHandle;

	/**
	 * Waits until every submitted transfer has finished. Rejects with the first transfer error.
	 */
	awaitAll(): Promise<void>;

	/**
	 * Releases the underlying client. Call after awaitAll().
	 */
	close(): void;
}
