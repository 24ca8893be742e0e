import { AsyncLocalStorage } from 'node:async_hooks';
import pino from 'pino';

interface RequestContext {
  requestId: string;
}

const requestContext = new AsyncLocalStorage<RequestContext>();

let baseLogger: pino.Logger | undefined;

export function generateRequestId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

/** Runs `fn` so that every log line written during it carries `requestId`. */
export function runWithRequestId<T>(requestId: string, fn: () => T): T {
  return requestContext.run({ requestId }, fn);
}

export function getRequestId(): string | undefined {
  return requestContext.getStore()?.requestId;
}

function requestMixin(): Record<string, unknown> {
  const requestId = getRequestId();
  return requestId ? { requestId } : {};
}

function buildBaseLogger(level: string, destination?: pino.DestinationStream): pino.Logger {
  if (destination) {
    return pino({ level, mixin: requestMixin }, destination);
  }

  const loggerOptions: pino.LoggerOptions =
    process.env.NODE_ENV === 'development'
      ? {
          level,
          mixin: requestMixin,
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          },
        }
      : { level, mixin: requestMixin };

  return pino(loggerOptions);
}

/**
 * Replaces the root logger. Loggers created afterwards use the new level and
 * destination; call it once at start-up, before building services.
 */
export function configureLogger(level: pino.LevelWithSilent, destination?: pino.DestinationStream): void {
  baseLogger = buildBaseLogger(level, destination);
}

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  baseLogger ??= buildBaseLogger(process.env.LOG_LEVEL || 'info');
  return baseLogger.child({ ...context });
}
