import { logger } from '../src/utils/logger.js';

logger.silent = true;
