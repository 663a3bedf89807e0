/**
 * Log Configuration Management
 *
 * Reads workflow logging settings from the environment, with defaults.
 */

import { LogLevel } from "./log-level";

export interface LogConfig {
  fileLoggingEnabled: boolean;
  logDirectory: string;
  logLevel: LogLevel;
}

export class LogConfigManager {
  private static config: LogConfig | null = null;

  /**
   * Gets the current log configuration, initializing it if necessary.
   */
  static getConfig(): LogConfig {
    if (!this.config) {
      this.config = this.loadConfig();
    }
    return this.config;
  }

  private static loadConfig(): LogConfig {
    return {
      fileLoggingEnabled: this.parseBoolean(process.env.WORKFLOW_FILE_LOGGING_ENABLED, false),
      logDirectory: process.env.WORKFLOW_LOG_DIRECTORY || "logs/",
      logLevel: this.parseLogLevel(process.env.WORKFLOW_LOG_LEVEL, LogLevel.INFO),
    };
  }

  static getLogLevel(): LogLevel {
    return this.getConfig().logLevel;
  }

  /**
   * Validates the current configuration.
   */
  static validateConfig(): string[] {
    const config = this.getConfig();
    const errors: string[] = [];

    if (!config.logDirectory) {
      errors.push("Log directory cannot be empty");
    }

    if (process.env.WORKFLOW_LOG_LEVEL && config.logLevel !== process.env.WORKFLOW_LOG_LEVEL.toUpperCase()) {
      errors.push(`Unknown log level "${process.env.WORKFLOW_LOG_LEVEL}", using ${config.logLevel}`);
    }

    return errors;
  }

  /**
   * Resets the configuration cache (useful for testing).
   */
  static resetConfig(): void {
    this.config = null;
  }

  private static parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
    if (value === undefined) return defaultValue;
    return value.toLowerCase() === "true" || value === "1";
  }

  private static parseLogLevel(value: string | undefined, defaultValue: LogLevel): LogLevel {
    if (!value) return defaultValue;

    const upperValue = value.toUpperCase();
    const match = Object.values(LogLevel).find((level) => level === upperValue);
    return match ?? defaultValue;
  }
}
