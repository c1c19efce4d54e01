import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';
// stdout carries JSON-RPC frames, so every log line goes to stderr. Opt-in pretty with LOG_PRETTY=true
const pretty = process.env.LOG_PRETTY === 'true';

export const logger = pino({
  level,
  base: undefined,
  transport: pretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      }
    : undefined,
}, pretty ? undefined : pino.destination({ fd: 2 }));
