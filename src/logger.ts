import log from 'electron-log/node';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug';

export interface LoggingOptions {
  level: LogLevel;
  file?: string;
}

log.transports.console.level = 'info';
log.transports.file.level = false;

export const configureLogging = ({ level, file }: LoggingOptions): void => {
  log.transports.console.level = level;
  if (!file) {
    log.transports.file.level = false;
    return;
  }
  log.transports.file.level = level;
  log.transports.file.resolvePathFn = () => file;
};

export default log;
