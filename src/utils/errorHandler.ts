import { VectorError } from './errors';
import logger from './logger';

// Logs the failure and returns the exit code for the process.
export const handleError = (err: unknown): number => {
  if (err instanceof VectorError) {
    logger.warn(`Vector Error: ${err.message}`, {
        name: err.name,
        details: err.details,
    });
  } else if (err instanceof Error) {
    logger.error(`Unexpected Error: ${err.message}`, { stack: err.stack });
  } else {
    logger.error('Unexpected Error', { error: String(err) });
  }
  return 1;
};
