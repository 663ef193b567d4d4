/**
 * Logger Utility
 * Diagnostic output gated by log level; failures are reported by the CLI itself.
 * Everything goes to stderr: stdout carries the rendered document.
 */

import chalk from "chalk";
import type { LogLevel } from "../types";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export class Logger {
  constructor(private level: LogLevel = "warn") {}

  private enabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  debug(message: string): void {
    if (this.enabled("debug")) {
      console.error(`${chalk.dim("[DEBUG]")} ${message}`);
    }
  }

  info(message: string): void {
    if (this.enabled("info")) {
      console.error(`${chalk.cyan("[INFO]")} ${message}`);
    }
  }

  warn(message: string): void {
    if (this.enabled("warn")) {
      console.error(`${chalk.yellow("[WARN]")} ${message}`);
    }
  }
}
