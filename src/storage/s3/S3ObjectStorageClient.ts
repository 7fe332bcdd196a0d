// src/storage/s3/S3ObjectStorageClient.ts
import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import type { IObjectStorageClient, PutObjectRequest } from '../interfaces/IObjectStorageClient';

/**
 * IObjectStorageClient over one S3Client (and therefore one HTTP agent).
 */
export class S3ObjectStorageClient implements IObjectStorageClient {
	constructor(
		public readonly id: string,
		private readonly client: S3Client
	) { }

	public async putObject({ bucket, key, body }: PutObjectRequest): Promise<void> {
		await this.client.send(
			new PutObjectCommand({
				Bucket: bucket,
				Key: key,
				Body: body,
				ContentType: 'text/csv',
			})
		);
	}

	public destroy(): void {
		this.client.destroy();
	}
}
