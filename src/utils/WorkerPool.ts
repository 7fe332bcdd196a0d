// src/utils/WorkerPool.ts
import { log } from './logger';

type Task = () => Promise<void>;

interface Waiter {
	resolve: () => void;
	reject: (error: unknown) => void;
}

/**
 * Fixed-size pool of async tasks.
 *
 * At most `size` tasks run at once; the rest wait in FIFO order. The first task
 * failure is kept: queued tasks are dropped, `drain()` rejects with it, and tasks
 * already running finish unobserved.
 */
export class WorkerPool {
	private readonly queue: Task[] = [];
	private active = 0;
	private peak = 0;
	private completed = 0;
	private failure: { error: unknown } | null = null;
	private waiters: Waiter[] = [];

	constructor(public readonly size: number, private readonly name = 'WorkerPool') {
		if (!Number.isInteger(size) || size < 1) {
			throw new Error(`[${name}] Pool size must be a positive integer, got ${size}.`);
		}
	}

	public get activeCount(): number {
		return this.active;
	}

	public get pendingCount(): number {
		return this.queue.length;
	}

	/** Highest number of tasks observed running at the same time */
	public get peakConcurrency(): number {
		return this.peak;
	}

	public get completedCount(): number {
		return this.completed;
	}

	public submit(task: Task): void {
		if (this.failure) {
			log.debug(`[${this.name}] Task dropped: the pool already failed.`);
			return;
		}
		this.queue.push(task);
		this.pump();
	}

	/**
	 * Resolves once every submitted task has completed; rejects with the first task error.
	 */
	public drain(): Promise<void> {
		if (this.failure) {
			return Promise.reject(this.failure.error);
		}
		if (this.isIdle()) {
			return Promise.resolve();
		}
		return new Promise<void>((resolve, reject) => {
			this.waiters.push({ resolve, reject });
		});
	}

	private isIdle(): boolean {
		return this.active === 0 && this.queue.length === 0;
	}

	private pump(): void {
		while (!this.failure && this.active < this.size) {
			const task = this.queue.shift();
			if (!task) {
				break;
			}
			this.active++;
			this.peak = Math.max(this.peak, this.active);
			void this.runTask(task);
		}
	}

	private async runTask(task: Task): Promise<void> {
		try {
			await task();
			this.completed++;
		} catch (error: unknown) {
			this.fail(error);
		} finally {
			this.active--;
			if (!this.failure) {
				this.pump();
				if (this.isIdle()) {
					this.settle();
				}
			}
		}
	}

	private fail(error: unknown): void {
		if (this.failure) {
			log.debug(`[${this.name}] Additional task failure after the first one.`, error);
			return;
		}
		this.failure = { error };
		const dropped = this.queue.length;
		this.queue.length = 0;
		log.debug(`[${this.name}] Task failed; ${dropped} queued task(s) dropped, ${this.active - 1} still running.`);
		this.settle();
	}

	private settle(): void {
		const waiters = this.waiters;
		this.waiters = [];
		for (const waiter of waiters) {
			if (this.failure) {
				waiter.reject(this.failure.error);
			} else {
				waiter.resolve();
			}
		}
	}
}
