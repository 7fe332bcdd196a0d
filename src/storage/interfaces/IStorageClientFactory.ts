// src/storage/interfaces/IStorageClientFactory.ts
import type { IObjectStorageClient } from './IObjectStorageClient';
import type { ITransferManager } from './ITransferManager';

/**
 * The "session": holds the credentials and builds clients from them.
 */
export interface IStorageClientFactory {
	/**
	 * @param maxConnections connection pool size; the SDK default when omitted
	 */
	createClient(maxConnections?: number): IObjectStorageClient;

	/**
	 * Builds a transfer manager on a new client whose connection pool matches `maxConcurrency`.
	 */
	createTransferManager(maxConcurrency: number): ITransferManager;
}
