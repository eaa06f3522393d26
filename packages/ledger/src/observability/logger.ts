import { createPinoLogger } from '@stakebook/shared';
import { getConfig } from '../config';

const logger = createPinoLogger({ level: getConfig().logLevel, name: 'stakebook-ledger' });

export default logger;
