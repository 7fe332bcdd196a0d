import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { describe, expect, it, vi } from 'vitest';
import { S3TransferManager } from '../../src/storage/s3/S3TransferManager';
import { delay, InFlightCounter } from '../helpers/fakes';

interface StubOptions {
	delayMs?: number;
	failOnKey?: string;
	counter?: InFlightCounter;
}

// Local endpoint so lib-storage can build the object location without endpoint rules
function makeStubbedClient(options: StubOptions = {}) {
	const client = new S3Client({
		region: 'eu-west-1',
		endpoint: 'http://localhost:9000',
		forcePathStyle: true,
		credentials: { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' },
	});
	const putKeys: string[] = [];
	vi.spyOn(client, 'send').mockImplementation(async (command: unknown) => {
		if (!(command instanceof PutObjectCommand)) {
			throw new Error('unexpected command');
		}
		const key = command.input.Key ?? '';
		options.counter?.enter();
		try {
			await delay(options.delayMs ?? 0);
			if (key === options.failOnKey) {
				throw new Error(`put failed for ${key}`);
			}
			putKeys.push(key);
			return {};
		} finally {
			options.counter?.leave();
		}
	});
	return { client, putKeys };
}

const body = (text: string) => Buffer.from(text, 'utf8');

describe('S3TransferManager', () => {
	it('uploads every submitted object with one PUT each', async () => {
		const { client, putKeys } = makeStubbedClient();
		const manager = new S3TransferManager(client, 2);

		const handles = ['a.csv', 'b.csv', 'c.csv'].map(key => manager.submit(body('x,y\n'), 'test-bucket', key));
		await manager.awaitAll();

		expect([...putKeys].sort()).toEqual(['a.csv', 'b.csv', 'c.csv']);
		expect(handles.map(h => h.status)).toEqual(['completed', 'completed', 'completed']);
		expect(handles.map(h => h.size)).toEqual([4, 4, 4]);
	});

	it('marks running and waiting transfers', async () => {
		const { client } = makeStubbedClient({ delayMs: 5 });
		const manager = new S3TransferManager(client, 1);

		const first = manager.submit(body('1'), 'test-bucket', 'first.csv');
		const second = manager.submit(body('2'), 'test-bucket', 'second.csv');

		expect(first.status).toBe('in-progress');
		expect(second.status).toBe('queued');
		await manager.awaitAll();
		expect(second.status).toBe('completed');
	});

	it('runs no more than maxConcurrency uploads at once', async () => {
		const counter = new InFlightCounter();
		const { client } = makeStubbedClient({ delayMs: 10, counter });
		const manager = new S3TransferManager(client, 2);

		for (let i = 0; i < 5; i++) {
			manager.submit(body(`row ${i}\n`), 'test-bucket', `part-${i}.csv`);
		}
		await manager.awaitAll();

		expect(counter.peak).toBe(2);
	});

	it('rejects awaitAll when one upload fails and leaves the rest unstarted', async () => {
		const { client, putKeys } = makeStubbedClient({ failOnKey: 'b.csv' });
		const manager = new S3TransferManager(client, 1);

		const handles = ['a.csv', 'b.csv', 'c.csv'].map(key => manager.submit(body('x\n'), 'test-bucket', key));

		await expect(manager.awaitAll()).rejects.toThrow('put failed for b.csv');
		expect(handles.map(h => h.status)).toEqual(['completed', 'failed', 'queued']);
		expect(putKeys).toEqual(['a.csv']);
	});

	it('destroys its client on close', () => {
		const { client } = makeStubbedClient();
		const destroy = vi.spyOn(client, 'destroy');

		new S3TransferManager(client, 1).close();

		expect(destroy).toHaveBeenCalledTimes(1);
	});
});
