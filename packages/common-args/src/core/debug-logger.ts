/**
 * Debug logger - JSON lines for tracing argument attachment and actions
 * Writes to <root>/logs/debug.log, rotated once it passes 1MB
 */

import fs from "fs";
import path from "path";

import type { DebugLogger, LogCategory } from "../types/index.js";

interface LoggerConfig {
  enabled: boolean;
  categories: LogCategory[] | null; // null = all categories
  logFile: string;
  maxFileSize: number;
}

export function getLogFile(root: string): string {
  return path.join(root, "logs", "debug.log");
}

export class DebugLoggerImpl implements DebugLogger {
  private config: LoggerConfig;

  constructor(root: string, enabled: boolean, categories?: LogCategory[]) {
    this.config = {
      enabled,
      categories: categories?.length ? categories : null,
      logFile: getLogFile(root),
      maxFileSize: 1024 * 1024,
    };
  }

  log(category: LogCategory, message: string, data?: object): void {
    if (!this.config.enabled) return;
    if (this.config.categories && !this.config.categories.includes(category)) return;

    const entry = JSON.stringify({
      ...data, // spread first so reserved keys take precedence
      t: new Date().toISOString(),
      pid: process.pid,
      cat: category,
      msg: message,
    });

    this.write(entry + "\n");
  }

  private write(line: string): void {
    try {
      fs.mkdirSync(path.dirname(this.config.logFile), { recursive: true });
      this.rotate();
      fs.appendFileSync(this.config.logFile, line);
    } catch (err) {
      // an unwritable log location turns logging off for the process
      this.config.enabled = false;
      process.emitWarning(
        `debug logging disabled: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  private rotate(): void {
    if (!fs.existsSync(this.config.logFile)) return;
    if (fs.statSync(this.config.logFile).size <= this.config.maxFileSize) return;

    const backup = this.config.logFile + ".1";
    fs.rmSync(backup, { force: true });
    fs.renameSync(this.config.logFile, backup);
  }
}

class NoopLogger implements DebugLogger {
  log(): void {
    // disabled
  }
}

export function createLogger(
  root: string,
  enabled: boolean,
  categories?: LogCategory[],
): DebugLogger {
  if (!enabled) {
    return new NoopLogger();
  }
  return new DebugLoggerImpl(root, enabled, categories);
}

export function createNoopLogger(): DebugLogger {
  return new NoopLogger();
}
