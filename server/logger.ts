import pino from 'pino';

const logger: pino.Logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level(label: string) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/** Child logger tagged with the emitting module, e.g. `{ module: 'chunk-store' }`. */
function moduleLogger(module: string): pino.Logger {
  return logger.child({ module });
}

export { moduleLogger };
export default logger;
