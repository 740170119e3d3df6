import pino from 'pino';

const level = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info');

export const logger = pino({
  level,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
  // Access tokens travel in query strings and headers; keep them out of the logs
  redact: {
    paths: ['token', 'authorization', 'headers.authorization', 'req.headers.authorization'],
    censor: '[redacted]',
  },
  ...(process.env.NODE_ENV === 'development'
    ? { transport: { target: 'pino/file', options: { destination: 1 } } }
    : {}),
});

/** Child logger scoped to one live subscription */
export function sessionLogger(callId: string, sessionId: string, subject: string): pino.Logger {
  return logger.child({ component: 'stream-session', callId, sessionId, subject });
}
