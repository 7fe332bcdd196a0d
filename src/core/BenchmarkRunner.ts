// src/core/BenchmarkRunner.ts
import type { IDatasetLoader } from '../dataset/DatasetLoader';
import { countPartitions } from '../dataset/partitioner';
import type { IStorageClientFactory } from '../storage/interfaces/IStorageClientFactory';
import type { ITransferManager } from '../storage/interfaces/ITransferManager';
import {
	ClientPoolUploadStrategy,
	createClientSelector,
	type IUploadStrategy,
	ManagedTransferUploadStrategy,
} from '../strategies/upload';
import type {
	BenchmarkConfig,
	BenchmarkResult,
	RunnerContext,
	StorageSettings,
	StrategyTiming,
	UploadStrategyName,
} from '../types';
import { log } from '../utils/logger';
import { generateRunId } from '../utils/ObjectKeyBuilder';
import type { IProgressManager } from '../utils/ProgressManager/IProgressManager';
import { formatDuration, PerformanceTracker } from './PerformanceTracker';

export interface BenchmarkDependencies {
	datasetLoader: IDatasetLoader;
	clientFactory: IStorageClientFactory;
	progressManager: IProgressManager;
	runIdGenerator?: () => string;
}

export function formatReportLine(timing: StrategyTiming): string {
	return `Method ${timing.label} took ${formatDuration(timing.durationMs)} to complete`;
}

/**
 * Runs the benchmark for one or more concurrency levels.
 *
 * Per level: (1) load the dataset and build the transfer manager whose client
 * pool matches the concurrency, (2) run the strategies in config order under one
 * run id, (3) log one report line per strategy. Any strategy failure aborts the
 * whole run.
 */
export class BenchmarkRunner {
	private readonly tracker = new PerformanceTracker();
	private readonly runIdGenerator: () => string;

	constructor(
		private readonly config: BenchmarkConfig,
		private readonly settings: StorageSettings,
		private readonly deps: BenchmarkDependencies
	) {
		this.runIdGenerator = deps.runIdGenerator ?? generateRunId;
		if (!settings.bucket) {
			log.warn('[BenchmarkRunner] BUCKET is empty; uploads will be sent without a bucket name.');
		}
		log.debug(`BenchmarkRunner created (strategies: ${config.strategies.join(', ')}).`);
	}

	/**
	 * Runs every configured concurrency level in sequence. Nothing is shared between levels.
	 */
	public async runAll(): Promise<BenchmarkResult[]> {
		log.step(`Benchmark: ${this.config.description}`);
		const results: BenchmarkResult[] = [];
		for (const concurrency of this.config.concurrencyLevels) {
			results.push(await this.run(concurrency));
		}
		return results;
	}

	public async run(concurrency: number): Promise<BenchmarkResult> {
		if (!Number.isInteger(concurrency) || concurrency < 1) {
			throw new Error(`[BenchmarkRunner] Concurrency must be a positive integer, got ${concurrency}.`);
		}
		log.info(`Running with concurrency ${concurrency}`);

		// --- 1. Dataset, session and primary client ---
		const dataset = await this.deps.datasetLoader.load(this.config.datasetUrl);
		const partitionCount = countPartitions(dataset, this.config.groupingColumns);
		const runId = this.runIdGenerator();
		log.info(`[BenchmarkRunner] ${partitionCount} partition(s) by [${this.config.groupingColumns.join(', ')}], run id ${runId}.`);

		const transferManager = this.deps.clientFactory.createTransferManager(concurrency);
		const context: RunnerContext = {
			config: this.config,
			bucket: this.settings.bucket,
			runId,
			concurrency,
			partitionCount,
			tracker: this.tracker,
			progressManager: this.deps.progressManager,
		};

		// --- 2. Strategies, in order ---
		const timings: StrategyTiming[] = [];
		this.deps.progressManager.start();
		try {
			for (const name of this.config.strategies) {
				const strategy = this.instantiateStrategy(name, transferManager);
				log.step(`${strategy.label} (concurrency ${concurrency})`);
				this.tracker.reset();
				const timing = await strategy.execute(context, dataset);
				timings.push(timing);
				log.debug(`[BenchmarkRunner] ${strategy.label}: ${timing.objectCount} object(s), ${timing.bytesUploaded} bytes, ${timing.durationMs.toFixed(3)} ms.`);
			}
		} finally {
			this.deps.progressManager.stop();
			transferManager.close();
		}

		// --- 3. Report ---
		const reportLines = timings.map(formatReportLine);
		reportLines.forEach(line => log.success(line));

		return {
			description: this.config.description,
			concurrency,
			runId,
			partitionCount,
			timings,
			reportLines,
		};
	}

	private instantiateStrategy(name: UploadStrategyName, transferManager: ITransferManager): IUploadStrategy {
		switch (name) {
			case 'ManagedTransfer':
				return new ManagedTransferUploadStrategy(transferManager);
			case 'ClientPool':
			case 'SharedClient':
				return new ClientPoolUploadStrategy(name, this.deps.clientFactory, createClientSelector(this.config.clientSelection));
			default:
				throw new Error(`[BenchmarkRunner] Unknown upload strategy: ${String(name)}`);
		}
	}
}
