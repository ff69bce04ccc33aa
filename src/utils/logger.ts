import { createLogger, format, type Logger, transports } from 'winston';

/** Environment variable read for the default log level. */
export const LOG_LEVEL_ENV = 'LEMMY_CLIENT_LOG_LEVEL';

/** Options for {@link createClientLogger}. */
export interface ClientLoggerOptions {
  /** Minimum level to log, defaults to `LEMMY_CLIENT_LOG_LEVEL`. */
  level?: string;
  /** Mute all output, defaults to true when no level is configured. */
  silent?: boolean;
}

/**
 * Reads the level from the environment, `process` is absent in browsers.
 */
function levelFromEnv(): string | undefined {
  if (typeof process === 'undefined') {
    return undefined;
  }

  return process.env[LOG_LEVEL_ENV] || undefined;
}

/**
 * Creates the winston logger used by the client when none is injected.
 * Silent unless a level comes from the options or the environment.
 */
export function createClientLogger({ level = levelFromEnv(), silent = !level }: ClientLoggerOptions = {}): Logger {
  return createLogger({
    level: level ?? 'info',
    silent,
    format: format.combine(format.timestamp(), format.errors({ stack: true }), format.json()),
    defaultMeta: { service: 'lemmy-client' },
    transports: [new transports.Console()],
  });
}
