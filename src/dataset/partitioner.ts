// src/dataset/partitioner.ts
import type { Dataset, DatasetRow, Partition, PartitionKey } from '../types';

/**
 * Groups the dataset rows by the given columns.
 *
 * Columns are validated immediately; partitions are yielded one at a time
 * while the returned iterator is consumed. Partition order follows the first
 * appearance of each key in the dataset. Empty grouping values form their own
 * partition so that every row lands in exactly one partition.
 */
export function partitionDataset(dataset: Dataset, groupingColumns: string[]): IterableIterator<Partition> {
	if (groupingColumns.length === 0) {
		throw new Error('[Partitioner] At least one grouping column is required.');
	}
	const missing = groupingColumns.filter(column => !dataset.columns.includes(column));
	if (missing.length > 0) {
		throw new Error(`[Partitioner] Grouping column(s) not found in dataset: ${missing.join(', ')}`);
	}

	const groups = new Map<string, { key: PartitionKey; rows: DatasetRow[] }>();
	for (const row of dataset.rows) {
		const key: PartitionKey = groupingColumns.map(column => [column, row.values[column] ?? '']);
		const groupId = JSON.stringify(key.map(([, value]) => value));
		const group = groups.get(groupId);
		if (group) {
			group.rows.push(row);
		} else {
			groups.set(groupId, { key, rows: [row] });
		}
	}

	return (function* () {
		for (const { key, rows } of groups.values()) {
			yield { key, columns: [...dataset.columns], rows };
		}
	})();
}

export function countPartitions(dataset: Dataset, groupingColumns: string[]): number {
	let count = 0;
	for (const _ of partitionDataset(dataset, groupingColumns)) {
		count++;
	}
	return count;
}
