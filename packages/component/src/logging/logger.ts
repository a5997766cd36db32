import { pino, type Logger, type LevelWithSilent } from 'pino';

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLevel(value: string | undefined): value is LevelWithSilent {
  return value !== undefined && (LEVELS as readonly string[]).includes(value);
}

/**
 * Level for the package logger.
 *
 * `HINGE_LOG_LEVEL` wins when it names a pino level; otherwise test runs are
 * silent and everything else logs warnings and up. Wiring steps log at debug.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LevelWithSilent {
  const requested = env.HINGE_LOG_LEVEL?.trim().toLowerCase();
  if (isLevel(requested)) return requested;
  return env.NODE_ENV === 'test' ? 'silent' : 'warn';
}

/**
 * Package-wide root logger.
 */
export const logger: Logger = pino({ name: 'hinge', level: resolveLogLevel() });

/**
 * Child logger bound to one component or subsystem.
 */
export function childLogger(bindings: Record<string, unknown>, parent: Logger = logger): Logger {
  return parent.child(bindings);
}
