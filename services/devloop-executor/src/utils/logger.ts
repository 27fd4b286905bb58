/**
 * Logger configuration for the devloop executor
 *
 * Standardized logger using pino with pretty printing in dev and JSON in prod
 */

import pino, { stdTimeFunctions, stdSerializers } from 'pino';
import type { Logger as PinoLogger, LoggerOptions } from 'pino';

export type Logger = PinoLogger;

const isProduction = process.env.NODE_ENV === 'production';
const isDevelopment = !isProduction;

const defaultLevel = isProduction ? 'info' : 'debug';
const level = process.env.LOG_LEVEL || defaultLevel;

function createLogger(options: { service: string; component?: string }): PinoLogger {
  const baseConfig: LoggerOptions = {
    level,
    name: options.service,
    timestamp: stdTimeFunctions.isoTime,
    base: {
      service: options.service,
      component: options.component,
      pid: process.pid,
      hostname: process.env.HOSTNAME,
    },
    // Redact sensitive fields
    redact: {
      paths: [
        'token',
        'accessToken',
        '*.token',
        '*.accessToken',
        'authorization',
        'Authorization',
        'req.headers.authorization',
        'req.headers["x-internal-api-key"]',
        'apiKey',
        'api_key',
        '*.apiKey',
        '*.api_key',
        'internalApiKey',
        '*.internalApiKey',
        'openaiApiKey',
        '*.openaiApiKey',
        'redisUrl',
        '*.redisUrl',
      ],
      censor: '[REDACTED]',
    },
    serializers: {
      req: stdSerializers.req,
      res: stdSerializers.res,
      err: stdSerializers.err,
      error: stdSerializers.err,
    },
  };

  // Pretty printing runs in a worker thread; skip it when nothing is logged
  if (isDevelopment && level !== 'silent') {
    return pino({
      ...baseConfig,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
          messageFormat: '{service} | {component} | {msg}',
          errorLikeObjectKeys: ['err', 'error'],
          singleLine: false,
        },
      },
    });
  }

  return pino(baseConfig);
}

export const logger: PinoLogger = createLogger({
  service: 'devloop-executor',
});

export function logError(
  logger: PinoLogger,
  error: unknown,
  message: string,
  context?: Record<string, unknown>
): void {
  const err = error instanceof Error ? error : undefined;
  const code = err && 'code' in err ? err.code : undefined;
  logger.error({
    err: error,
    errorMessage: err?.message ?? String(error),
    errorStack: err?.stack,
    errorCode: code,
    ...context,
  }, message);
}

export function logServiceStartup(logger: PinoLogger, port?: number | string): void {
  const startupInfo = {
    nodeVersion: process.version,
    platform: process.platform,
    arch: process.arch,
    pid: process.pid,
    cwd: process.cwd(),
    env: process.env.NODE_ENV,
    port,
  };

  logger.info(startupInfo, 'devloop-executor service started');
}

export function logServiceShutdown(logger: PinoLogger, reason?: string): void {
  logger.info({ reason }, 'devloop-executor service shutting down');
}

// Service-specific logger categories
export const loggers = {
  server: logger.child({ component: 'server' }),
  orchestrator: logger.child({ component: 'orchestrator' }),
  session: logger.child({ component: 'session' }),
  sandbox: logger.child({ component: 'sandbox' }),
  preferences: logger.child({ component: 'preferences' }),
  planner: logger.child({ component: 'planner' }),
} satisfies Record<string, PinoLogger>;

/**
 * Process-wide handlers; installed by the service entry point only
 */
export function setupGlobalErrorHandlers(target: PinoLogger = logger): void {
  process.on('uncaughtException', (error) => {
    logError(target, error, 'Uncaught exception', { fatal: true });
    process.exit(1);
  });

  process.on('unhandledRejection', (reason, promise) => {
    logError(target, reason, 'Unhandled rejection', {
      promise: String(promise),
    });
  });
}
