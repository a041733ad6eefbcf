/**
 * Module-scoped color-coded loggers for the push gateway client.
 *
 * Each module gets its own named logger with an assigned color for
 * easy visual identification in development logs.
 */
import pino from "pino";
import { readRuntimeConfig } from "./config.js";

/**
 * Module color assignments for visual log differentiation.
 * Colors use ANSI escape codes.
 */
const MODULE_COLORS = {
  client: "\x1b[34m", // blue
  signer: "\x1b[33m", // yellow
  transport: "\x1b[36m", // cyan
  config: "\x1b[90m", // gray
} as const;

const RESET = "\x1b[0m";

/**
 * Valid module names for type safety.
 */
export type ModuleName = keyof typeof MODULE_COLORS;

/**
 * Create a module-scoped logger with color-coded output.
 *
 * @example
 * const log = createLogger("client");
 * log.info({ deviceToken }, "Sending notification");
 */
export function createLogger(module: ModuleName): pino.Logger {
  const color = MODULE_COLORS[module];
  const config = readRuntimeConfig();

  if (config.NODE_ENV === "development") {
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

  // Structured JSON for production and tests
  return pino({
    name: module,
    level: config.LOG_LEVEL,
  });
}

/**
 * Log operation entry with consistent format.
 */
export function logOperationStart(
  logger: pino.Logger,
  operation: string,
  context: Record<string, unknown> = {},
): void {
  logger.debug({ operation, ...context }, `→ ${operation} started`);
}

/**
 * Log operation completion with duration.
 */
export function logOperationComplete(
  logger: pino.Logger,
  operation: string,
  startTime: number,
  context: Record<string, unknown> = {},
): void {
  const durationMs = Date.now() - startTime;
  logger.info(
    { operation, durationMs, ...context },
    `✓ ${operation} completed (${durationMs}ms)`,
  );
}

/**
 * Log operation failure with a rendered failure and structured context.
 */
export function logOperationFailed(
  logger: pino.Logger,
  operation: string,
  rendered: string,
  context: Record<string, unknown> = {},
): void {
  logger.error(
    { operation, ...context },
    `✗ ${operation} failed: ${rendered}`,
  );
}
