// src/strategies/upload/implement/ClientPoolUploadStrategy.ts
import type { IObjectStorageClient } from '../../../storage/interfaces/IObjectStorageClient';
import type { IStorageClientFactory } from '../../../storage/interfaces/IStorageClientFactory';
import type { Dataset, RunnerContext, StrategyTiming } from '../../../types';
import { log } from '../../../utils/logger';
import { methodTagFor } from '../../../utils/ObjectKeyBuilder';
import { WorkerPool } from '../../../utils/WorkerPool';
import { BaseCoreLogic } from '../base/BaseCoreLogic';
import type { IClientSelector } from '../interfaces/IClientSelector';
import type { IUploadStrategy } from '../interfaces/IUploadStrategy';

export type ClientPoolMode = 'ClientPool' | 'SharedClient';

/**
 * Uploads partitions through a bounded worker pool, one putObject per partition.
 *
 * - `ClientPool`: one client per concurrency slot, picked by the selector for every upload.
 * - `SharedClient`: every task goes through the same single client.
 *
 * Clients live for one execute() call.
 */
export class ClientPoolUploadStrategy implements IUploadStrategy {
	public readonly label: string;
	private coreLogic: BaseCoreLogic;

	constructor(
		public readonly name: ClientPoolMode,
		private readonly clientFactory: IStorageClientFactory,
		private readonly selector: IClientSelector
	) {
		this.label = name === 'ClientPool' ? 'multithread_client' : 'multithread_shared_client';
		this.coreLogic = new BaseCoreLogic();
		log.debug(`ClientPoolUploadStrategy created (mode: ${name}, selector: ${selector.constructor.name}).`);
	}

	public async execute(context: RunnerContext, dataset: Dataset): Promise<StrategyTiming> {
		const { tracker, progressManager, bucket, concurrency, partitionCount } = context;
		const clientCount = this.name === 'ClientPool' ? concurrency : 1;
		const clients: IObjectStorageClient[] = Array.from({ length: clientCount }, () => this.clientFactory.createClient());
		const methodTag = methodTagFor(this.name, clients.length);

		try {
			const jobs = this.coreLogic.createUploadJobs(context, dataset, methodTag);
			const pool = new WorkerPool(concurrency, this.label);
			const bar = progressManager.addBar(this.label, partitionCount, { status: 'Uploading...' });

			log.info(`[${this.label}] Uploading ${partitionCount} partition(s) with ${clients.length} client(s), concurrency ${concurrency}...`);
			tracker.markStart();

			for (const job of jobs) {
				const client = this.selector.select(clients);
				pool.submit(async () => {
					const body = this.coreLogic.serializePartition(context, job.partition);
					await client.putObject({ bucket, key: job.key, body });
					tracker.recordUpload(body.length);
					bar.increment(1);
				});
			}

			try {
				await pool.drain();
			} catch (error) {
				bar.updatePayload({ status: 'Failed!' });
				log.error(`[${this.label}] Upload failed after ${pool.completedCount}/${partitionCount} object(s).`);
				throw error;
			}
			tracker.markEnd();
			bar.updatePayload({ status: 'Done' });
			log.debug(`[${this.label}] Peak concurrency: ${pool.peakConcurrency}/${concurrency}.`);

			return tracker.getTiming(this.name, this.label, methodTag);
		} finally {
			clients.forEach(client => client.destroy());
		}
	}
}
