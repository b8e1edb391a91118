/**
 * Logger utility using Pino
 */
import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';

function prettyTransport(): pino.DestinationStream | undefined {
  if (level === 'silent') return undefined;
  try {
    return pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: 2,
      },
    });
  } catch {
    // pino-pretty not installed; plain JSON lines
    return undefined;
  }
}

const transport = prettyTransport();
const rootLogger = transport ? pino({ level }, transport) : pino({ level });

export function createLogger(name: string) {
  return rootLogger.child({ name });
}

export { rootLogger as logger };
