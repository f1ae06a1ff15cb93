import { initializeLogger } from './server/src/log';

initializeLogger({ pretty: false, level: 'silent' });
