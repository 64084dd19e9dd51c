import pino from 'pino';
import config from 'config';
import metrics, { MetricsRegistry } from './metrics/index.js';

const level = config.has('logging.level') ? config.get<string>('logging.level') : 'info';
const name = config.has('app.name') ? config.get<string>('app.name') : 'motion-preview-bridge';

function extractMessage(args: unknown[]): string | undefined {
  for (const value of args) {
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return undefined;
}

const logger = pino({
  name,
  level,
  hooks: {
    logMethod(inputArgs, method, logLevel) {
      metrics.incrementLogLevel(MetricsRegistry.levelLabel(logLevel), {
        message: extractMessage(inputArgs)
      });
      return method.apply(this, inputArgs);
    }
  }
});

type LogFn = (obj: unknown, msg?: string) => void;

export type Logger = {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
};

export default logger;
