// src/storage/s3/S3TransferManager.ts
import { S3Client } from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { log } from '../../utils/logger';
import { WorkerPool } from '../../utils/WorkerPool';
import type { ITransferManager, TransferHandle, TransferStatus } from '../interfaces/ITransferManager';

/** lib-storage minimum part size; objects below it go up in a single PUT */
const PART_SIZE = 5 * 1024 * 1024;

class S3TransferHandle implements TransferHandle {
	public status: TransferStatus = 'queued';

	constructor(public readonly key: string, public readonly size: number) { }
}

/**
 * Managed transfer facility on @aws-sdk/lib-storage.
 * Every submitted object becomes one `Upload`; at most `maxConcurrency` run at once.
 */
export class S3TransferManager implements ITransferManager {
	private readonly pool: WorkerPool;
	private readonly handles: S3TransferHandle[] = [];

	constructor(
		private readonly client: S3Client,
		public readonly maxConcurrency: number
	) {
		this.pool = new WorkerPool(maxConcurrency, 'S3TransferManager');
		log.debug(`[S3TransferManager] Created (maxConcurrency: ${maxConcurrency}).`);
	}

	public submit(body: Buffer, bucket: string, key: string): TransferHandle {
		const handle = new S3TransferHandle(key, body.length);
		this.handles.push(handle);

		this.pool.submit(async () => {
			handle.status = 'in-progress';
			const upload = new Upload({
				client: this.client,
				params: {
					Bucket: bucket,
					Key: key,
					Body: body,
					ContentType: 'text/csv',
				},
				queueSize: 1,
				partSize: PART_SIZE,
				leavePartsOnError: false,
			});
			try {
				await upload.done();
				handle.status = 'completed';
			} catch (error) {
				handle.status = 'failed';
				throw error;
			}
		});

		return handle;
	}

	public async awaitAll(): Promise<void> {
		await this.pool.drain();
		log.debug(`[S3TransferManager] ${this.handles.length} transfer(s) finished (peak concurrency: ${this.pool.peakConcurrency}).`);
	}

	public close(): void {
		this.client.destroy();
	}
}
