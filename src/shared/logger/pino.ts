import { pino, stdSerializers, type Bindings, type Logger } from 'pino';

import { getEnv } from '../config/env.js';

export const logger: Logger = pino({
  name: 'dmi-metadata',
  level: getEnv().LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    error: stdSerializers.err,
  },
});

export function createChildLogger(bindings: Bindings): Logger {
  return logger.child(bindings);
}
