// src/run-benchmark.ts
import * as path from 'path';
import { loadEnvFile, loadStorageSettings, parseBenchmarkConfig } from './config';
import { BenchmarkRunner } from './core/BenchmarkRunner';
import { HttpDatasetLoader } from './dataset/DatasetLoader';
import { S3StorageClientFactory } from './storage';
import type { BenchmarkResult } from './types';
import { log } from './utils/logger';
import type { IProgressManager } from './utils/ProgressManager/IProgressManager';
import { createProgressManager } from './utils/ProgressManager/ProgressManager';

const DEFAULT_CONFIG_PATH = path.resolve(__dirname, '..', 'benchmarks', 'configs', 'default.config');
const LOG_DIR = path.resolve(__dirname, '..', 'benchmarks', 'results', 'logs');

interface CliArgs {
	configPath: string;
	logLevel: string | undefined;
	noProgress: boolean;
}

/**
 * All flags are optional; with none the default config runs at concurrency 4, 8 and 20.
 */
function parseArgs(argv: string[]): CliArgs {
	const configIndex = argv.indexOf('--config');
	const configArg = configIndex !== -1 ? argv[configIndex + 1] : undefined;
	if (configIndex !== -1 && !configArg) {
		throw new Error('Argument error: --config needs a path (e.g. --config benchmarks/configs/round-robin.config.ts).');
	}

	const logLevelIndex = argv.indexOf('--logLevel');
	const logLevel = logLevelIndex !== -1 ? argv[logLevelIndex + 1] : undefined;

	return {
		configPath: configArg ? path.resolve(process.cwd(), configArg) : DEFAULT_CONFIG_PATH,
		logLevel,
		noProgress: argv.includes('--no-progress'),
	};
}

async function loadConfigModule(configPath: string): Promise<unknown> {
	const configModule: unknown = await import(configPath);
	if (typeof configModule === 'object' && configModule !== null && 'default' in configModule) {
		return configModule.default;
	}
	throw new Error(`Config file ${configPath} has no default export.`);
}

function printSummary(results: BenchmarkResult[]): void {
	log.step('Summary');
	for (const result of results) {
		log.info(`concurrency=${result.concurrency} run=${result.runId} partitions=${result.partitionCount}`);
		result.reportLines.forEach(line => log.info(`  ${line}`));
	}
}

async function main() {
	let progressManager: IProgressManager | undefined;

	try {
		// 1. Arguments and logging
		const { configPath, logLevel, noProgress } = parseArgs(process.argv.slice(2));
		if (logLevel) {
			log.setLogLevel(logLevel);
		}
		log.setFileLogging(true, LOG_DIR, path.basename(configPath).replace(/\.config(\.[jt]s)?$/, ''));

		// 2. Configuration (credentials are turned into an explicit settings value here)
		log.info(`Loading benchmark config ${configPath} ...`);
		loadEnvFile();
		const settings = loadStorageSettings();
		const config = parseBenchmarkConfig(await loadConfigModule(configPath));

		// 3. Run
		progressManager = createProgressManager(noProgress);
		const runner = new BenchmarkRunner(config, settings, {
			datasetLoader: new HttpDatasetLoader(),
			clientFactory: new S3StorageClientFactory(settings),
			progressManager,
		});
		const results = await runner.runAll();

		printSummary(results);
	} catch (error: unknown) {
		log.error('Benchmark aborted.', error);
		process.exitCode = 1;
	} finally {
		progressManager?.stop();
		await log.flushErrorLogs();
		process.exit();
	}
}

void main();
