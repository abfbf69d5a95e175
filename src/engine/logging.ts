import { getLogger, getLoggers, Logger, LogLevelDesc } from 'loglevel';

/**
 * Obtains a logger whose lines are prefixed with a timestamp, the given
 * identity and the class name.
 */
export function getIdLogger(
  ctor: { name: string },
  id: string,
  logLevel: LogLevelDesc = 'info'
): Logger {
  const loggerName = `${ctor.name}.${id}`;
  const loggerInitialised = loggerName in getLoggers();
  const log = getLogger(loggerName);
  if (!loggerInitialised) {
    const originalFactory = log.methodFactory;
    log.methodFactory = (methodName, logLevel, loggerName) => {
      const method = originalFactory(methodName, logLevel, loggerName);
      return (...msg: unknown[]) => method.apply(
        undefined, [new Date().toISOString(), id, ctor.name, ...msg]);
    };
  }
  log.setLevel(logLevel);
  return log;
}
