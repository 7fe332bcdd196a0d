// src/strategies/upload/base/BaseCoreLogic.ts
import { serializeCsv } from '../../../dataset/csv';
import { partitionDataset } from '../../../dataset/partitioner';
import type { Dataset, Partition, RunnerContext } from '../../../types';
import { buildObjectKey } from '../../../utils/ObjectKeyBuilder';

/**
 * One partition ready to be sent: its object key plus the partition itself.
 * The body is produced lazily by serializePartition so that encoding happens
 * where each strategy times it.
 */
export interface UploadJob {
	key: string;
	partition: Partition;
}

/**
 * Steps shared by all upload strategies: partitioning, key building and encoding.
 */
export class BaseCoreLogic {
	/**
	 * Groups the dataset and pairs every partition with its object key.
	 * Grouping happens on call; jobs are produced while the result is iterated.
	 */
	public createUploadJobs(context: RunnerContext, dataset: Dataset, methodTag: string): IterableIterator<UploadJob> {
		const partitions = partitionDataset(dataset, context.config.groupingColumns);
		const runId = context.runId;

		return (function* () {
			for (const partition of partitions) {
				yield {
					key: buildObjectKey(runId, methodTag, partition.key),
					partition,
				};
			}
		})();
	}

	public serializePartition(context: RunnerContext, partition: Partition): Buffer {
		return Buffer.from(serializeCsv(partition.columns, partition.rows, context.config.includeIndex), 'utf8');
	}
}
