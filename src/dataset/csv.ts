// src/dataset/csv.ts
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import type { Dataset, DatasetRow } from '../types';

function isRecordList(value: unknown): value is string[][] {
	return Array.isArray(value)
		&& value.every(record => Array.isArray(record) && record.every(field => typeof field === 'string'));
}

function parseRecords(text: string): string[][] {
	let records: unknown;
	try {
		records = parse(text, {
			skip_empty_lines: true,
			relax_quotes: false,
			relax_column_count: true,
		});
	} catch (error: unknown) {
		const message = error instanceof Error ? error.message : String(error);
		throw new Error(`[CSV] ${message}`, { cause: error });
	}
	if (!isRecordList(records)) {
		throw new Error('[CSV] Parser returned unexpected records.');
	}
	return records;
}

/**
 * Parses CSV text with a header line into a Dataset.
 * Rows are numbered from 0 in file order; blank lines are skipped.
 */
export function parseCsv(text: string): Dataset {
	const records = parseRecords(text);
	const header = records[0];
	if (!header) {
		throw new Error('[CSV] Input has no header line.');
	}

	const columns = header.map(c => c.trim());
	const rows: DatasetRow[] = records.slice(1).map((record, r) => {
		if (record.length !== columns.length) {
			throw new Error(`[CSV] Line ${r + 2} has ${record.length} fields, expected ${columns.length}.`);
		}
		const values: Record<string, string> = {};
		columns.forEach((column, c) => {
			values[column] = record[c] ?? '';
		});
		return { index: r, values };
	});

	return { columns, rows };
}

/**
 * Serializes rows to CSV text, one `\n`-terminated line per row.
 * With `includeIndex` the first column is the unnamed row index.
 */
export function serializeCsv(columns: string[], rows: DatasetRow[], includeIndex: boolean): string {
	const header = includeIndex ? ['', ...columns] : columns;
	const records = rows.map(row => {
		const fields = columns.map(column => row.values[column] ?? '');
		return includeIndex ? [String(row.index), ...fields] : fields;
	});

	return stringify([header, ...records], { record_delimiter: 'unix' });
}
