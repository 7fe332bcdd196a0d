// src/types/dataset.ts

export interface DatasetRow {
	/** Zero-based position in the source file */
	index: number;
	values: Record<string, string>;
}

/**
 * In-memory table. Missing cells are the empty string.
 */
export interface Dataset {
	columns: string[];
	rows: DatasetRow[];
}

/**
 * Ordered [column, value] pairs of the grouping columns.
 */
export type PartitionKey = Array<[string, string]>;

export interface Partition {
	key: PartitionKey;
	columns: string[];
	rows: DatasetRow[];
}
