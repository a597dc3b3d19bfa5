import * as dotenv from 'dotenv';
dotenv.config();

import logger from './utils/logger';
import { config } from './config/env';
import { createRandomSource } from './services/random';
import { logReport, runDemo } from './services/demo';
import { handleError } from './utils/errorHandler';

try {
  logger.info(config.demoSeed === undefined ? 'Running demo with an unseeded source' : `Running demo with seed ${config.demoSeed}`);
  runDemo(createRandomSource(config.demoSeed)).forEach(logReport);
} catch (error) {
  process.exitCode = handleError(error);
}
