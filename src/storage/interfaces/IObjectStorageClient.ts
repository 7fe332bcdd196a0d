// src/storage/interfaces/IObjectStorageClient.ts

export interface PutObjectRequest {
	bucket: string;
	key: string;
	body: Buffer | string;
}

/**
 * One handle to the object-storage endpoint, with its own connection pool.
 * Implementations must accept concurrent putObject calls.
 */
export interface IObjectStorageClient {
	readonly id: string;

	/**
	 * Stores one object in a single request. Rejects on any failure.
	 */
	putObject(request: PutObjectRequest): Promise<void>;

	/**
	 * Releases the connection pool. The client is unusable afterwards.
	 */
	destroy(): void;
}
