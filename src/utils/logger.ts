import winston, { format } from 'winston';
import { config } from '../config/env';

const logger = winston.createLogger({
    level: config.logLevel,
    format: format.combine(
        format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        format.simple()
      ),    
    transports: [
        new winston.transports.Console(),
        ...(config.logFile ? [new winston.transports.File({ filename: config.logFile })] : []),
    ],
});

export default logger;
