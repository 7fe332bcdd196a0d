import { describe, expect, it } from 'vitest';
import { serializeCsv } from '../../src/dataset/csv';
import { ClientPoolUploadStrategy } from '../../src/strategies/upload/implement/ClientPoolUploadStrategy';
import { RandomClientSelector } from '../../src/strategies/upload/implement/selector/RandomClientSelector';
import { RoundRobinClientSelector } from '../../src/strategies/upload/implement/selector/RoundRobinClientSelector';
import {
	FakeClientFactory,
	InFlightCounter,
	makeContext,
	makeTaxiDataset,
	TAXI_PARTITION_COUNT,
} from '../helpers/fakes';

describe('ClientPoolUploadStrategy (SharedClient)', () => {
	it('sends every upload through exactly one client', async () => {
		const dataset = makeTaxiDataset();
		const factory = new FakeClientFactory();
		const strategy = new ClientPoolUploadStrategy('SharedClient', factory, new RoundRobinClientSelector());

		const timing = await strategy.execute(makeContext(dataset, { concurrency: 4 }), dataset);

		expect(factory.clients).toHaveLength(1);
		expect(factory.clients[0]?.requests).toHaveLength(TAXI_PARTITION_COUNT);
		expect(timing.strategy).toBe('SharedClient');
		expect(timing.label).toBe('multithread_shared_client');
		expect(timing.methodTag).toBe('client');
		expect(timing.objectCount).toBe(TAXI_PARTITION_COUNT);
	});

	it('writes each partition as CSV under its run/method key', async () => {
		const dataset = makeTaxiDataset();
		const factory = new FakeClientFactory();
		const strategy = new ClientPoolUploadStrategy('SharedClient', factory, new RoundRobinClientSelector());

		await strategy.execute(makeContext(dataset, { concurrency: 1 }), dataset);

		const first = factory.allRequests().find(r => r.key === 'run=run-1/method=client/color=yellow/payment=cash/data.csv');
		const expectedRows = dataset.rows.filter(row => [0, 2, 5].includes(row.index));
		expect(first?.bucket).toBe('test-bucket');
		expect(first?.body.toString()).toBe(serializeCsv(dataset.columns, expectedRows, true));
		expect(first?.body.toString()).toBe(
			',pickup,color,payment,fare\n0,2019-03-23 20:21:09,yellow,cash,7.0\n2,2019-03-27 17:53:01,yellow,cash,7.5\n5,2019-03-11 10:37:23,yellow,cash,9.0\n'
		);
	});

	it('destroys its client when done', async () => {
		const dataset = makeTaxiDataset();
		const factory = new FakeClientFactory();

		await new ClientPoolUploadStrategy('SharedClient', factory, new RoundRobinClientSelector())
			.execute(makeContext(dataset), dataset);

		expect(factory.clients.every(client => client.destroyed)).toBe(true);
	});

	it('keeps at most `concurrency` uploads in flight on its single client', async () => {
		const dataset = makeTaxiDataset();
		const counter = new InFlightCounter();
		const factory = new FakeClientFactory({ delayMs: 10, counter });
		const strategy = new ClientPoolUploadStrategy('SharedClient', factory, new RoundRobinClientSelector());

		await strategy.execute(makeContext(dataset, { concurrency: 3 }), dataset);

		expect(counter.peak).toBe(3);
		expect(factory.clients).toHaveLength(1);
	});
});

describe('ClientPoolUploadStrategy (ClientPool)', () => {
	it('builds one client per concurrency slot and tags keys with the pool size', async () => {
		const dataset = makeTaxiDataset();
		const factory = new FakeClientFactory();
		const strategy = new ClientPoolUploadStrategy('ClientPool', factory, new RoundRobinClientSelector());

		const timing = await strategy.execute(makeContext(dataset, { concurrency: 3 }), dataset);

		expect(factory.clients).toHaveLength(3);
		expect(timing.methodTag).toBe('clients[3]');
		expect(factory.allRequests().every(r => r.key.startsWith('run=run-1/method=clients[3]/'))).toBe(true);
	});

	it('reuses clients when there are more uploads than clients', async () => {
		const dataset = makeTaxiDataset();
		const factory = new FakeClientFactory();
		const strategy = new ClientPoolUploadStrategy('ClientPool', factory, new RoundRobinClientSelector());

		await strategy.execute(makeContext(dataset, { concurrency: 2 }), dataset);

		const perClient = factory.clients.map(client => client.requests.length);
		expect(perClient).toEqual([3, 2]);
		expect(Math.max(...perClient)).toBeGreaterThanOrEqual(2);
	});

	it('uses the selector for every upload', async () => {
		const dataset = makeTaxiDataset();
		const factory = new FakeClientFactory();
		const strategy = new ClientPoolUploadStrategy('ClientPool', factory, new RandomClientSelector(() => 0.99));

		await strategy.execute(makeContext(dataset, { concurrency: 3 }), dataset);

		expect(factory.clients.map(client => client.requests.length)).toEqual([0, 0, TAXI_PARTITION_COUNT]);
	});

	it('keeps at most `concurrency` uploads in flight', async () => {
		const dataset = makeTaxiDataset();
		const counter = new InFlightCounter();
		const factory = new FakeClientFactory({ delayMs: 10, counter });
		const strategy = new ClientPoolUploadStrategy('ClientPool', factory, new RoundRobinClientSelector());

		await strategy.execute(makeContext(dataset, { concurrency: 2 }), dataset);

		expect(counter.peak).toBe(2);
	});

	it('propagates the first upload failure and still releases its clients', async () => {
		const dataset = makeTaxiDataset();
		const factory = new FakeClientFactory({ failOnKeyContaining: 'payment=credit card' });
		const strategy = new ClientPoolUploadStrategy('ClientPool', factory, new RoundRobinClientSelector());

		await expect(strategy.execute(makeContext(dataset, { concurrency: 1 }), dataset)).rejects.toThrow(
			'simulated failure for run=run-1/method=clients[1]/color=green/payment=credit card/data.csv'
		);
		expect(factory.clients.every(client => client.destroyed)).toBe(true);
		expect(factory.allRequests()).toHaveLength(1);
	});

	it('reports a non-negative time that grows with per-upload latency', async () => {
		const dataset = makeTaxiDataset();
		const fast = await new ClientPoolUploadStrategy('ClientPool', new FakeClientFactory(), new RoundRobinClientSelector())
			.execute(makeContext(dataset, { concurrency: 1 }), dataset);
		const slow = await new ClientPoolUploadStrategy('ClientPool', new FakeClientFactory({ delayMs: 20 }), new RoundRobinClientSelector())
			.execute(makeContext(dataset, { concurrency: 1 }), dataset);

		expect(fast.durationMs).toBeGreaterThanOrEqual(0);
		expect(slow.durationMs).toBeGreaterThan(fast.durationMs);
		expect(slow.endTime).toBeGreaterThan(slow.startTime);
	});
});
