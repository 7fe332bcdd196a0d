import { describe, expect, it } from 'vitest';
import { WorkerPool } from '../../src/utils/WorkerPool';
import { delay, InFlightCounter } from '../helpers/fakes';

describe('WorkerPool', () => {
	it('never runs more than `size` tasks at once', async () => {
		const pool = new WorkerPool(3);
		const counter = new InFlightCounter();

		for (let i = 0; i < 10; i++) {
			pool.submit(async () => {
				counter.enter();
				await delay(5);
				counter.leave();
			});
		}
		await pool.drain();

		expect(counter.peak).toBe(3);
		expect(pool.peakConcurrency).toBe(3);
		expect(pool.completedCount).toBe(10);
		expect(pool.activeCount).toBe(0);
	});

	it('starts tasks in submission order', async () => {
		const pool = new WorkerPool(1);
		const started: number[] = [];

		[1, 2, 3].forEach(n => pool.submit(async () => {
			started.push(n);
		}));
		await pool.drain();

		expect(started).toEqual([1, 2, 3]);
	});

	it('resolves drain immediately when nothing was submitted', async () => {
		await expect(new WorkerPool(2).drain()).resolves.toBeUndefined();
	});

	it('rejects drain with the first error and drops queued tasks', async () => {
		const pool = new WorkerPool(1);
		let secondStarted = false;

		pool.submit(async () => {
			throw new Error('boom');
		});
		pool.submit(async () => {
			secondStarted = true;
		});

		await expect(pool.drain()).rejects.toThrow('boom');
		expect(secondStarted).toBe(false);
		expect(pool.pendingCount).toBe(0);
	});

	it('keeps rejecting after a failure and ignores new tasks', async () => {
		const pool = new WorkerPool(2);
		pool.submit(async () => {
			throw new Error('first');
		});
		await expect(pool.drain()).rejects.toThrow('first');

		let ran = false;
		pool.submit(async () => {
			ran = true;
		});

		await expect(pool.drain()).rejects.toThrow('first');
		expect(ran).toBe(false);
	});

	it('rejects a non-positive size', () => {
		expect(() => new WorkerPool(0, 'uploads')).toThrow('[uploads] Pool size must be a positive integer, got 0.');
	});
});
