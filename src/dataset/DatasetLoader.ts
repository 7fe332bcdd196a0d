// src/dataset/DatasetLoader.ts
import fetch from 'node-fetch';
import type { Dataset } from '../types';
import { log } from '../utils/logger';
import { parseCsv } from './csv';

export interface IDatasetLoader {
	load(url: string): Promise<Dataset>;
}

/**
 * The subset of the fetch API the loader needs.
 */
export type FetchLike = (url: string) => Promise<{
	ok: boolean;
	status: number;
	statusText: string;
	text(): Promise<string>;
}>;

/**
 * Fetches a remote CSV file over HTTP(S) and parses it.
 * No caching: every call downloads the file again.
 */
export class HttpDatasetLoader implements IDatasetLoader {
	constructor(private readonly fetchImpl: FetchLike = fetch) { }

	public async load(url: string): Promise<Dataset> {
		log.info(`[DatasetLoader] Fetching ${url} ...`);
		const response = await this.fetchImpl(url);
		if (!response.ok) {
			throw new Error(`[DatasetLoader] GET ${url} failed: ${response.status} ${response.statusText}`);
		}

		const text = await response.text();
		const dataset = parseCsv(text);
		log.info(`[DatasetLoader] Loaded ${dataset.rows.length} rows x ${dataset.columns.length} columns (${text.length} chars).`);
		return dataset;
	}
}
