import type { FlashLogger, LogLevel } from './types';

export const consoleLogger: FlashLogger = (message: string, level: LogLevel) => {
  const line = `[${level.toUpperCase()}] ${message}`;
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warning') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export const silentLogger: FlashLogger = () => {};
