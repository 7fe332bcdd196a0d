import { log } from '../src/utils/logger';

log.setLogLevel('none');
