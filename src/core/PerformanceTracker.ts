// src/core/PerformanceTracker.ts
import type { StrategyTiming, UploadStrategyName } from '../types';
import { log } from '../utils/logger';

const NS_PER_MS = 1_000_000;

/**
 * Records timing and upload counters for one strategy run.
 * The runner resets it before every strategy.
 */
export class PerformanceTracker {
	private startTime: bigint = 0n;
	private endTime: bigint = 0n;
	private objectCount = 0;
	private bytesUploaded = 0;

	constructor() {
		this.reset();
	}

	public reset(): void {
		this.startTime = 0n;
		this.endTime = 0n;
		this.objectCount = 0;
		this.bytesUploaded = 0;
	}

	public markStart(): void {
		this.startTime = process.hrtime.bigint();
	}

	public markEnd(): void {
		this.endTime = process.hrtime.bigint();
	}

	/**
	 * Called once per successfully stored object. Safe to call from concurrent tasks.
	 */
	public recordUpload(bytes: number): void {
		this.objectCount += 1;
		this.bytesUploaded += bytes;
	}

	public getTiming(strategy: UploadStrategyName, label: string, methodTag: string): StrategyTiming {
		if (this.startTime === 0n || this.endTime === 0n) {
			log.warn(`[PerformanceTracker] getTiming("${label}") called before markStart/markEnd.`);
		}
		const durationNs = this.endTime - this.startTime;

		return {
			strategy,
			label,
			methodTag,
			startTime: this.startTime,
			endTime: this.endTime,
			durationMs: durationNs < 0n ? 0 : Number(durationNs) / NS_PER_MS,
			objectCount: this.objectCount,
			bytesUploaded: this.bytesUploaded,
		};
	}
}

/**
 * Formats milliseconds as `H:MM:SS.ffffff`.
 */
export function formatDuration(durationMs: number): string {
	const totalMicros = Math.max(0, Math.round(durationMs * 1000));
	const micros = totalMicros % 1_000_000;
	const totalSeconds = Math.floor(totalMicros / 1_000_000);
	const seconds = totalSeconds % 60;
	const minutes = Math.floor(totalSeconds / 60) % 60;
	const hours = Math.floor(totalSeconds / 3600);
	return `${hours}:${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}.${String(micros).padStart(6, '0')}`;
}
