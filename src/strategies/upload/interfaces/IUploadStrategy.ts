// src/strategies/upload/interfaces/IUploadStrategy.ts
import type { Dataset, RunnerContext, StrategyTiming, UploadStrategyName } from '../../../types';

/**
 * One way of uploading every partition of a dataset as its own object.
 * Implementations differ only in how requests are spread over storage clients.
 */
export interface IUploadStrategy {
	readonly name: UploadStrategyName;

	/** Name used in the report line and the progress bar */
	readonly label: string;

	/**
	 * Partitions `dataset` by `context.config.groupingColumns`, uploads every partition
	 * under `run=<runId>/method=<tag>/...` and returns the elapsed time.
	 * Rejects with the first upload error.
	 */
	execute(context: RunnerContext, dataset: Dataset): Promise<StrategyTiming>;
}
