import { z } from 'zod';
import { logger } from './logger';

const configSchema = z.object({
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('silent')
});

export type Config = z.infer<typeof configSchema>;

export type ConfigOptions = z.input<typeof configSchema>;

let current: Config = configSchema.parse({});

/**
 * Applies library settings. Options are validated up front; an invalid value throws a
 * `ZodError` and leaves the previous configuration in place.
 *
 * ```typescript
 * configure({ logLevel: 'debug' });
 * ```
 */
export function configure(options: ConfigOptions = {}): Config {
  const next = configSchema.parse(options);

  logger.level = next.logLevel;
  current = next;

  return next;
}

export function getConfig(): Config {
  return current;
}
