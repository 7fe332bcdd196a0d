// src/strategies/upload/implement/ManagedTransferUploadStrategy.ts
import type { ITransferManager, TransferHandle } from '../../../storage/interfaces/ITransferManager';
import type { Dataset, RunnerContext, StrategyTiming } from '../../../types';
import { log } from '../../../utils/logger';
import { methodTagFor } from '../../../utils/ObjectKeyBuilder';
import { BaseCoreLogic } from '../base/BaseCoreLogic';
import type { IUploadStrategy } from '../interfaces/IUploadStrategy';

/**
 * Hands every partition to a managed transfer facility and waits for its shutdown.
 * The caller owns the transfer manager (and closes it).
 */
export class ManagedTransferUploadStrategy implements IUploadStrategy {
	public readonly name = 'ManagedTransfer' as const;
	public readonly label = 'transfer';
	private coreLogic: BaseCoreLogic;

	constructor(private readonly transferManager: ITransferManager) {
		this.coreLogic = new BaseCoreLogic();
		log.debug(`ManagedTransferUploadStrategy created (maxConcurrency: ${transferManager.maxConcurrency}).`);
	}

	public async execute(context: RunnerContext, dataset: Dataset): Promise<StrategyTiming> {
		const { tracker, progressManager, bucket, partitionCount } = context;
		const methodTag = methodTagFor(this.name, 1);
		const jobs = this.coreLogic.createUploadJobs(context, dataset, methodTag);
		const bar = progressManager.addBar(this.label, partitionCount, { status: 'Submitting...' });
		const handles: TransferHandle[] = [];

		log.info(`[ManagedTransfer] Uploading ${partitionCount} partition(s) with maxConcurrency ${this.transferManager.maxConcurrency}...`);
		tracker.markStart();

		for (const job of jobs) {
			const body = this.coreLogic.serializePartition(context, job.partition);
			handles.push(this.transferManager.submit(body, bucket, job.key));
		}

		bar.updatePayload({ status: 'Waiting for transfers...' });
		try {
			await this.transferManager.awaitAll();
		} catch (error) {
			const failed = handles.filter(h => h.status === 'failed').length;
			bar.updatePayload({ status: 'Failed!' });
			log.error(`[ManagedTransfer] Transfer failed (${failed} failed of ${handles.length} submitted).`);
			throw error;
		}
		tracker.markEnd();

		for (const handle of handles) {
			tracker.recordUpload(handle.size);
		}
		bar.increment(handles.length, { status: 'Done' });

		return tracker.getTiming(this.name, this.label, methodTag);
	}
}
