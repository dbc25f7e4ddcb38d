import rootLogger from '../src/logger.js';

rootLogger.disable();
