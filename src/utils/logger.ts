import pino, { type LoggerOptions } from 'pino';

const env = process.env['NODE_ENV'];
const isProduction = env === 'production';
// Pretty output is for interactive use; test runs and production stay on plain JSON
const usePretty = !isProduction && env !== 'test';

function defaultLevel(): string {
  if (isProduction) return 'info';
  return env === 'test' ? 'silent' : 'debug';
}

const options: LoggerOptions = {
  level: process.env['MIGRASCOPE_LOG_LEVEL'] ?? defaultLevel(),
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

if (usePretty) {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      destination: 2,
    },
  };
}

// Logs go to stderr so command output on stdout stays parseable
export const logger = usePretty ? pino(options) : pino(options, pino.destination(2));

export function createLogger(module: string): pino.Logger {
  return logger.child({ module });
}
