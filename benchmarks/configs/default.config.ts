// benchmarks/configs/default.config.ts
import type { BenchmarkConfigInput } from '../../src/config';

const config: BenchmarkConfigInput = {
	description: 'Taxi trips by color/payment/pickup_zone: managed transfer vs client pool vs shared client',
	datasetUrl: 'https://github.com/mwaskom/seaborn-data/raw/master/taxis.csv',
	groupingColumns: ['color', 'payment', 'pickup_zone'],
	concurrencyLevels: [4, 8, 20],
	clientSelection: 'Random',
	strategies: ['ManagedTransfer', 'ClientPool', 'SharedClient'],
};
export default config;
