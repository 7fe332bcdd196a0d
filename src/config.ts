// src/config.ts
import dotenv from 'dotenv';
import { z } from 'zod';
import type { BenchmarkConfig, StorageSettings } from './types';

export const DEFAULT_REGION = 'eu-west-1';
export const DEFAULT_DATASET_URL = 'https://github.com/mwaskom/seaborn-data/raw/master/taxis.csv';
export const DEFAULT_GROUPING_COLUMNS = ['color', 'payment', 'pickup_zone'];
export const DEFAULT_CONCURRENCY_LEVELS = [4, 8, 20];

const requiredSecret = (name: string) =>
	z.string({ required_error: `${name} is not set` }).min(1, `${name} is empty`);

const envSchema = z.object({
	KEY: requiredSecret('KEY'),
	SECRET: requiredSecret('SECRET'),
	SESSION: requiredSecret('SESSION'),
	BUCKET: z.string().default(''),
	REGION: z.string().min(1).default(DEFAULT_REGION),
	ENDPOINT: z.string().url().optional(),
	FORCE_PATH_STYLE: z
		.enum(['true', 'false', '1', '0'])
		.optional()
		.transform(value => value === 'true' || value === '1'),
});

const benchmarkConfigSchema = z.object({
	description: z.string().min(1),
	datasetUrl: z.string().url().default(DEFAULT_DATASET_URL),
	groupingColumns: z.array(z.string().min(1)).min(1).default(DEFAULT_GROUPING_COLUMNS),
	concurrencyLevels: z.array(z.number().int().positive()).min(1).default(DEFAULT_CONCURRENCY_LEVELS),
	clientSelection: z.enum(['Random', 'RoundRobin']).default('Random'),
	strategies: z
		.array(z.enum(['ManagedTransfer', 'ClientPool', 'SharedClient']))
		.min(1)
		.default(['ManagedTransfer', 'ClientPool', 'SharedClient'])
		.refine(list => new Set(list).size === list.length, 'strategies must not repeat'),
	includeIndex: z.boolean().default(true),
});

export type BenchmarkConfigInput = z.input<typeof benchmarkConfigSchema>;

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
		.join('; ');
}

/**
 * Loads `.env` (if present) into the process environment. Existing variables win.
 */
export function loadEnvFile(): void {
	dotenv.config();
}

/**
 * Reads credentials and bucket settings from an environment map.
 */
export function loadStorageSettings(env: NodeJS.ProcessEnv = process.env): StorageSettings {
	const parsed = envSchema.safeParse(env);
	if (!parsed.success) {
		throw new Error(`[Config] Invalid storage settings: ${formatIssues(parsed.error)}`);
	}
	const { KEY, SECRET, SESSION, BUCKET, REGION, ENDPOINT, FORCE_PATH_STYLE } = parsed.data;

	return {
		accessKeyId: KEY,
		secretAccessKey: SECRET,
		sessionToken: SESSION,
		bucket: BUCKET,
		region: REGION,
		endpoint: ENDPOINT,
		forcePathStyle: FORCE_PATH_STYLE,
	};
}

/**
 * Validates a benchmark config module's default export and fills in defaults.
 */
export function parseBenchmarkConfig(input: unknown): BenchmarkConfig {
	const parsed = benchmarkConfigSchema.safeParse(input);
	if (!parsed.success) {
		throw new Error(`[Config] Invalid benchmark config: ${formatIssues(parsed.error)}`);
	}
	return parsed.data;
}
