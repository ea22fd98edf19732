import pino, { type DestinationStream, type LevelWithSilent, type Logger, type LoggerOptions } from 'pino';

/**
 * Creates a pino logger named after the library. Silent unless a level is given, so that
 * decorating code never writes to the host's output by accident.
 */
export function createLogger(level: LevelWithSilent = 'silent', destination?: DestinationStream): Logger {
  const options: LoggerOptions = { name: 'veneer', level };

  return destination ? pino(options, destination) : pino(options);
}

/** @internal Library-wide logger; replaced through `useLogger`. */
export let logger: Logger = createLogger();

/**
 * Routes the library's diagnostics to `next` and returns the logger used until now, so a
 * caller can restore it. `next` keeps the level it was created with; a later `configure()`
 * applies its `logLevel` to it, and `getConfig()` does not track the level in between.
 */
export function useLogger(next: Logger): Logger {
  const previous = logger;

  logger = next;

  return previous;
}
