import log from 'electron-log/node';

type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'];

const parseLevel = (value: string | undefined, fallback: LogLevel): LogLevel => {
  const normalised = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalised) ?? fallback;
};

let configured = false;

const configureTransports = () => {
  if (configured) return;
  configured = true;

  const level = parseLevel(process.env.PDF_CATALOG_LOG_LEVEL, 'info');
  log.transports.console.level = process.env.NODE_ENV === 'test' ? false : level;

  const logFile = process.env.PDF_CATALOG_LOG_FILE;
  if (logFile) {
    log.transports.file.level = level;
    log.transports.file.resolvePathFn = () => logFile;
  } else {
    log.transports.file.level = false;
  }
};

export type ScopedLogger = ReturnType<typeof log.scope>;

export const createLogger = (scope: string): ScopedLogger => {
  configureTransports();
  return log.scope(scope);
};
