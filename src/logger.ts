/**
 * Module-scoped color-coded loggers for the SmartCast client.
 *
 * Each module gets its own named logger with an assigned color for
 * easy visual identification in development logs.
 */
import { type Logger as PinoLogger, pino } from "pino";
import { config } from "./config.js";

/**
 * Module color assignments for visual log differentiation.
 * Colors use ANSI escape codes.
 */
const MODULE_COLORS = {
  // Device session and the trees it serves
  session: "\x1b[34m", // blue
  settings: "\x1b[36m", // cyan
  pairing: "\x1b[35m", // magenta
  remote: "\x1b[32m", // green
  apps: "\x1b[33m", // yellow

  // Network collaborators
  discovery: "\x1b[94m", // bright blue
  transport: "\x1b[91m", // bright red
} as const;

const RESET = "\x1b[0m";

/**
 * Valid module names for type safety.
 */
export type ModuleName = keyof typeof MODULE_COLORS;

export type Logger = PinoLogger;

/**
 * Create a module-scoped logger with color-coded output.
 *
 * @example
 * const log = createLogger("session");
 * log.info({ ip, port }, "Connected");
 */
export function createLogger(module: ModuleName): Logger {
  const color = MODULE_COLORS[module];

  if (config.NODE_ENV === "development") {
    // Pretty printing for development
    return pino({
      name: module,
      level: config.LOG_LEVEL,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          messageFormat: `${color}[{name}]${RESET} {msg}`,
          ignore: "pid,hostname",
          translateTime: "HH:MM:ss",
        },
      },
    });
  }

  // Structured JSON otherwise
  return pino({
    name: module,
    level: config.LOG_LEVEL,
  });
}

/**
 * Log operation entry with consistent format.
 */
export function logOperationStart(
  logger: Logger,
  operation: string,
  context: Record<string, unknown> = {},
): void {
  logger.debug({ operation, ...context }, `→ ${operation} started`);
}

/**
 * Log operation completion with duration.
 */
export function logOperationComplete(
  logger: Logger,
  operation: string,
  startTime: number,
  context: Record<string, unknown> = {},
): void {
  const durationMs = Date.now() - startTime;
  logger.debug(
    { operation, durationMs, ...context },
    `✓ ${operation} completed (${durationMs}ms)`,
  );
}

/**
 * Log operation failure with error details.
 */
export function logOperationFailed(
  logger: Logger,
  operation: string,
  error: string,
  context: Record<string, unknown> = {},
): void {
  logger.warn(
    { operation, error, ...context },
    `✗ ${operation} failed: ${error}`,
  );
}
