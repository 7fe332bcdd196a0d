// src/utils/ProgressManager/IProgressManager.ts

/**
 * Payload rendered by the `{status}` token of the bar format.
 */
export interface ProgressPayload {
	status?: string;
}

/**
 * One bar (one strategy run) of the multi-bar display.
 */
export interface IProgressBar {
	/**
	 * @param value amount to add (default 1)
	 */
	increment(value?: number, payload?: ProgressPayload): void;

	/**
	 * Updates the payload only; the progress value stays as it is.
	 */
	updatePayload(payload: ProgressPayload): void;
}

/**
 * Owns the whole multi-bar display.
 */
export interface IProgressManager {
	start(): void;

	stop(): void;

	/**
	 * @param name label shown left of the bar (e.g. 'transfer')
	 * @param total number of partitions the strategy will upload
	 */
	addBar(name: string, total: number, payload?: ProgressPayload): IProgressBar;
}
