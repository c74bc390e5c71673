import path from 'path';
import winston from 'winston';
import { config } from '../config/env.js';

// ANSI color codes for better visibility
const colors: Record<string, string> = {
  reset: '\x1b[0m',
  info: '\x1b[36m',    // Cyan
  warn: '\x1b[33m',    // Yellow
  error: '\x1b[31m',   // Red
  debug: '\x1b[35m',   // Magenta
};

interface LogInfo {
  level: string;
  message: unknown;
  [key: string]: unknown;
}

const entry = (service: string, info: LogInfo) => {
  const { timestamp, level, message, tags = [], ...rest } = info;
  return {
    timestamp,
    service,
    level,
    tags: Array.isArray(tags) ? tags : [tags],
    message,
    data: rest
  };
};

// Create a Winston logger for a service with proper formatting
export const createServiceLogger = (service: string, filename = config.logging.file) => {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.printf(info => {
        const colorizedLevel = colors[info.level.toLowerCase()] || '';
        return `${colorizedLevel}${JSON.stringify(entry(service, info))}${colors.reset}`;
      })
    })
  ];

  if (filename) {
    transports.push(new winston.transports.File({
      filename: path.resolve(filename),
      format: winston.format.printf(info => JSON.stringify(entry(service, info)))
    }));
  }

  return winston.createLogger({
    level: config.logging.level,
    silent: config.env === 'test',
    format: winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss.SSS'
    }),
    transports
  });
};

const logger = createServiceLogger('server');
const searchLogger = createServiceLogger('search');

// Fare search events
const logFareSearch = {
  dayFailed: (day: string, error: unknown) => {
    searchLogger.error(`Error fetching fares for ${day}`, {
      tags: ['fetch', 'outbound'],
      day,
      error: error instanceof Error ? error.message : String(error)
    });
  },
  daysFetched: (origin: string, days: number, fares: number) => {
    searchLogger.info('Outbound fares fetched', {
      tags: ['fetch', 'outbound'],
      origin,
      days,
      fares
    });
  },
  returnWindow: (route: string, earliest: string, latest: string) => {
    searchLogger.debug('Return window computed', {
      tags: ['match', 'return'],
      route,
      earliest,
      latest
    });
  },
  returnUnavailable: (route: string, reason: string, status?: number) => {
    searchLogger.debug('No return fare available', {
      tags: ['match', 'return'],
      route,
      reason,
      status
    });
  },
  invalidFare: (issues: string[]) => {
    searchLogger.warn('Dropping malformed fare from API response', {
      tags: ['validation'],
      issues
    });
  },
  pairAccepted: (summary: string[], details: Record<string, unknown>) => {
    searchLogger.info(summary.join('\n'), {
      tags: ['day-trip', 'accepted'],
      ...details
    });
  }
};

// Stream for morgan request logging
export const httpLogStream = {
  write: (message: string) => {
    logger.http(message.trim());
  }
};

export {
  logger,
  searchLogger,
  logFareSearch
};

export default logger;
