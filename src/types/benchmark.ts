// src/types/benchmark.ts
import type { PerformanceTracker } from '../core/PerformanceTracker';
import type { IProgressManager } from '../utils/ProgressManager/IProgressManager';

/**
 * IUploadStrategy implementations, in the order the runner executes them by default.
 */
export type UploadStrategyName = 'ManagedTransfer' | 'ClientPool' | 'SharedClient';

/**
 * IClientSelector implementations
 */
export type ClientSelectionPolicy = 'Random' | 'RoundRobin';

export interface BenchmarkConfig {
	description: string;
	/** Remote CSV fetched once per concurrency level */
	datasetUrl: string;
	groupingColumns: string[];
	concurrencyLevels: number[];
	clientSelection: ClientSelectionPolicy;
	strategies: UploadStrategyName[];
	/** Write the original row index as the first (unnamed) CSV column */
	includeIndex: boolean;
}

/**
 * Pre-obtained credentials and endpoint for the target bucket.
 * Built once at startup and handed to the client factory.
 */
export interface StorageSettings {
	accessKeyId: string;
	secretAccessKey: string;
	sessionToken: string;
	bucket: string;
	region: string;
	endpoint?: string;
	forcePathStyle: boolean;
}

export interface StrategyTiming {
	strategy: UploadStrategyName;
	/** Name printed in the report line */
	label: string;
	methodTag: string;
	startTime: bigint;
	endTime: bigint;
	durationMs: number;
	objectCount: number;
	bytesUploaded: number;
}

export interface BenchmarkResult {
	description: string;
	concurrency: number;
	runId: string;
	partitionCount: number;
	timings: StrategyTiming[];
	reportLines: string[];
}

export type LogLevel = 'error' | 'warn' | 'success' | 'info' | 'debug' | 'none';

/**
 * Context object handed to every IUploadStrategy execution.
 */
export interface RunnerContext {
	config: BenchmarkConfig;

	/** Target bucket (may be empty when BUCKET is unset) */
	bucket: string;

	/** Shared by all strategies of one run so their objects never overwrite each other */
	runId: string;

	/** Worker pool size and HTTP connection pool size for this run */
	concurrency: number;

	partitionCount: number;

	tracker: PerformanceTracker;

	progressManager: IProgressManager;
}
