// benchmarks/configs/round-robin.config.ts
import type { BenchmarkConfigInput } from '../../src/config';

const config: BenchmarkConfigInput = {
	description: 'Client pool vs shared client with deterministic round-robin client selection',
	groupingColumns: ['color', 'payment', 'pickup_zone'],
	concurrencyLevels: [4, 8, 20, 32],
	clientSelection: 'RoundRobin',
	strategies: ['ClientPool', 'SharedClient'],
};
export default config;
