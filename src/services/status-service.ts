import chalk from "chalk";
import { log } from "./logger.js";

export type StatusLevel = "info" | "success" | "warn" | "error" | "debug";

/**
 * Status logger interface - pure function signatures
 */
export interface StatusLogger {
  info(message: string, context?: string): void;
  success(message: string, context?: string): void;
  warn(message: string, context?: string): void;
  error(message: string, context?: string): void;
  debug(message: string, context?: string): void;
}

/**
 * Status change callback type
 */
export type StatusChangeHandler = (level: StatusLevel, message: string) => void;

const PREFIXES: Record<StatusLevel, string> = {
  info: chalk.blue("[INFO]"),
  success: chalk.green("[SUCCESS]"),
  warn: chalk.yellow("[WARNING]"),
  error: chalk.red("[ERROR]"),
  debug: chalk.gray("[DEBUG]"),
};

export function formatStatusLine(level: StatusLevel, message: string): string {
  return `${PREFIXES[level]} ${message}`;
}

/**
 * Writes status lines to stderr so stdout stays free for reports
 */
export const stderrHandler: StatusChangeHandler = (level, message) => {
  if (level === "debug" && !process.env.PATHWISE_DEBUG) return;
  process.stderr.write(`${formatStatusLine(level, message)}\n`);
};

/**
 * Status messages for the user, mirrored into the session log
 */
export class StatusService implements StatusLogger {
  private statusChangeHandler?: StatusChangeHandler;

  constructor(statusChangeHandler?: StatusChangeHandler) {
    this.statusChangeHandler = statusChangeHandler;
  }

  info(message: string, context?: string): void {
    this.setStatus("info", message);
    log.info(message, context || "status");
  }

  success(message: string, context?: string): void {
    this.setStatus("success", message);
    log.info(message, context || "status");
  }

  warn(message: string, context?: string): void {
    this.setStatus("warn", message);
    log.warn(message, context || "status");
  }

  error(message: string, context?: string): void {
    this.setStatus("error", message);
    log.error(message, context || "status");
  }

  debug(message: string, context?: string): void {
    this.setStatus("debug", message);
    log.debug(message, context || "status");
  }

  private setStatus(level: StatusLevel, message: string): void {
    if (this.statusChangeHandler) {
      this.statusChangeHandler(level, message);
    }
  }
}

/**
 * Factory function to create a status service with handler
 */
export function createStatusService(
  handler: StatusChangeHandler = stderrHandler,
): StatusService {
  return new StatusService(handler);
}
