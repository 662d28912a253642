import log from 'loglevel';
import type { LogLevelDesc, Logger } from 'loglevel';

export const logger: Logger = log.getLogger('queuectl');

logger.setDefaultLevel('info');

export function setLogLevel(level: LogLevelDesc) {
  logger.setLevel(level, false);
}
