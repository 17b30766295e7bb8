import { beforeEach } from 'vitest';
import { LoggerManager } from '../logging/LoggerManager.js';
import { LogLevel } from '../types/log-types.js';

const discard = (): void => undefined;

// Every log call still formats its entry; nothing reaches the console.
LoggerManager.initialize({ level: LogLevel.DEBUG, colors: false, sink: discard });

beforeEach(() => {
  const logger = LoggerManager.getLogger();
  logger.setLevel(LogLevel.DEBUG);
  logger.setSink(discard);
});
