// src/storage/s3/S3StorageClientFactory.ts
import { S3Client } from '@aws-sdk/client-s3';
import { Agent as HttpAgent } from 'http';
import { Agent as HttpsAgent } from 'https';
import type { StorageSettings } from '../../types';
import { log } from '../../utils/logger';
import type { IObjectStorageClient } from '../interfaces/IObjectStorageClient';
import type { IStorageClientFactory } from '../interfaces/IStorageClientFactory';
import type { ITransferManager } from '../interfaces/ITransferManager';
import { S3ObjectStorageClient } from './S3ObjectStorageClient';
import { S3TransferManager } from './S3TransferManager';

/**
 * Builds S3 clients from one set of pre-obtained credentials.
 * Every client gets its own HTTP agent, i.e. its own connection pool.
 */
export class S3StorageClientFactory implements IStorageClientFactory {
	private clientCounter = 0;

	constructor(private readonly settings: StorageSettings) {
		log.debug(`[S3StorageClientFactory] Session for region ${settings.region}${settings.endpoint ? ` (endpoint ${settings.endpoint})` : ''}.`);
	}

	public createS3Client(maxConnections?: number): S3Client {
		const { accessKeyId, secretAccessKey, sessionToken, region, endpoint, forcePathStyle } = this.settings;

		return new S3Client({
			region,
			endpoint,
			forcePathStyle: forcePathStyle || undefined,
			credentials: {
				accessKeyId,
				secretAccessKey,
				sessionToken,
			},
			requestHandler: maxConnections === undefined
				? undefined
				: {
					httpAgent: new HttpAgent({ keepAlive: true, maxSockets: maxConnections }),
					httpsAgent: new HttpsAgent({ keepAlive: true, maxSockets: maxConnections }),
				},
		});
	}

	public createClient(maxConnections?: number): IObjectStorageClient {
		this.clientCounter++;
		return new S3ObjectStorageClient(`s3-client-${this.clientCounter}`, this.createS3Client(maxConnections));
	}

	public createTransferManager(maxConcurrency: number): ITransferManager {
		return new S3TransferManager(this.createS3Client(maxConcurrency), maxConcurrency);
	}
}
