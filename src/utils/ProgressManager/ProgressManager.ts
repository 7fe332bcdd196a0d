// src/utils/ProgressManager/ProgressManager.ts
import cliProgress from 'cli-progress';
import type { IProgressBar, IProgressManager, ProgressPayload } from './IProgressManager';

// No-op bar handed out when progress output is disabled
class SilentProgressBar implements IProgressBar {
	increment(): void { }
	updatePayload(): void { }
}

/**
 * IProgressManager that renders nothing.
 * Used when stdout is not a TTY, with --no-progress, and in tests.
 */
export class SilentProgressManager implements IProgressManager {
	start(): void { }
	stop(): void { }
	addBar(_name: string, _total: number, _payload?: ProgressPayload): IProgressBar {
		return new SilentProgressBar();
	}
}

class ProgressBarWrapper implements IProgressBar {
	constructor(private readonly bar: cliProgress.SingleBar) { }

	increment(value: number = 1, payload?: ProgressPayload): void {
		this.bar.increment(value, payload);
	}

	updatePayload(payload: ProgressPayload): void {
		this.bar.update(payload);
	}
}

/**
 * cli-progress backed IProgressManager
 */
class RealProgressManager implements IProgressManager {
	private multiBar: cliProgress.MultiBar | null = null;

	public start(): void {
		if (this.multiBar) {
			return;
		}

		this.multiBar = new cliProgress.MultiBar({
			stream: process.stdout,
			hideCursor: true,
			clearOnComplete: false,
			format: '{name} | {bar} | {percentage}% ({value}/{total}) | {duration_formatted} | {status}',
		}, cliProgress.Presets.shades_classic);
	}

	public stop(): void {
		if (this.multiBar) {
			this.multiBar.stop();
			this.multiBar = null;
		}
	}

	public addBar(name: string, total: number, payload: ProgressPayload = { status: 'Waiting...' }): IProgressBar {
		const multiBar = this.multiBar ?? this.startAndGet();
		const bar = multiBar.create(total, 0, {
			name: name.padEnd(14),
			...payload
		});
		return new ProgressBarWrapper(bar);
	}

	private startAndGet(): cliProgress.MultiBar {
		this.start();
		if (!this.multiBar) {
			throw new Error('[ProgressManager] MultiBar failed to start.');
		}
		return this.multiBar;
	}
}

/**
 * Real bars on a TTY, silent otherwise.
 */
export function createProgressManager(disabled: boolean): IProgressManager {
	if (disabled || !process.stdout.isTTY) {
		return new SilentProgressManager();
	}
	return new RealProgressManager();
}
