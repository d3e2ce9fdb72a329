import winston from 'winston';
import type TransportStream from 'winston-transport';
import { mkdirSync } from 'fs';
import { join } from 'path';

const { combine, printf, colorize, errors } = winston.format;

// Plain ISO timestamp; winston's timestamp() goes through fecha
const simpleTimestamp = winston.format((info) => {
  info.timestamp = new Date().toISOString();
  return info;
});

const logFormat = printf(({ level, message, timestamp, ...metadata }) => {
  let msg = `${String(timestamp)} [${level}]: ${String(message)}`;

  if (Object.keys(metadata).length > 0 && metadata.stack === undefined) {
    const metaStr = JSON.stringify(metadata);
    msg += ` ${metaStr.length > 1000 ? metaStr.slice(0, 1000) + '...' : metaStr}`;
  }

  if (metadata.stack) {
    msg += `\n${String(metadata.stack)}`;
  }

  return msg;
});

const consoleTransport = new winston.transports.Console({
  format: combine(colorize(), simpleTimestamp(), logFormat),
});

const createFileTransports = (dir: string): TransportStream[] => {
  mkdirSync(dir, { recursive: true });
  return [
    new winston.transports.File({
      filename: join(dir, 'error.log'),
      level: 'error',
      maxsize: 1048576, // 1MB
      maxFiles: 3,
    }),
    new winston.transports.File({
      filename: join(dir, 'combined.log'),
      maxsize: 1048576, // 1MB
      maxFiles: 3,
    }),
  ];
};

let currentLogDir: string | null = null;
let fileTransports: TransportStream[] = [];

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.CONDUCTOR_SILENT === '1',
  format: combine(errors({ stack: true }), simpleTimestamp(), logFormat),
  transports: [consoleTransport],
});

/**
 * Route file logs into `dir`. Until this is called only the console
 * transport is active.
 */
export function configureLogDirectory(dir: string): void {
  if (!dir || dir === currentLogDir) {
    return;
  }

  const newTransports = createFileTransports(dir);

  for (const transport of fileTransports) {
    logger.remove(transport);
    transport.close?.();
  }

  for (const transport of newTransports) {
    logger.add(transport);
  }

  fileTransports = newTransports;
  currentLogDir = dir;
}

export default logger;
