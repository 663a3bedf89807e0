/**
 * File Log Writer
 *
 * Appends formatted workflow log entries to a file. Write failures disable
 * file output for the rest of the run; console logging is unaffected.
 */

import * as fs from "fs";
import * as path from "path";
import type { LogEntry } from "./logging";

export interface FileLogWriter {
  initialize(logFilePath: string): Promise<boolean>;
  writeEntry(entry: LogEntry): Promise<void>;
  flush(): Promise<void>;
  close(): Promise<void>;
}

export class FileLogWriterImpl implements FileLogWriter {
  private writeStream?: fs.WriteStream;
  private isInitialized = false;
  private hasErrors = false;
  private writeQueue: LogEntry[] = [];
  private isWriting = false;
  private flushInterval?: NodeJS.Timeout;

  constructor() {
    this.flushInterval = setInterval(() => {
      this.flush().catch((error: unknown) => this.handleWriteError(error));
    }, 5000);
    this.flushInterval.unref();
  }

  async initialize(logFilePath: string): Promise<boolean> {
    try {
      await fs.promises.mkdir(path.dirname(logFilePath), { recursive: true, mode: 0o755 });

      this.writeStream = fs.createWriteStream(logFilePath, {
        flags: "a",
        encoding: "utf8",
      });
      this.writeStream.on("error", (error) => {
        this.handleWriteError(error);
      });

      await this.writeToStream(
        `=== ICD REVIEW LOG ===\nStart Time: ${new Date().toISOString()}\n======================\n\n`,
      );

      this.isInitialized = true;
      this.hasErrors = false;
      return true;
    } catch (error) {
      this.hasErrors = true;
      console.warn(
        `[FileLogWriter] Failed to initialize file logging: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  async writeEntry(entry: LogEntry): Promise<void> {
    if (!this.isInitialized || this.hasErrors) {
      return;
    }

    this.writeQueue.push(entry);
    if (!this.isWriting) {
      await this.processWriteQueue();
    }
  }

  async flush(): Promise<void> {
    if (!this.isInitialized || this.hasErrors || this.writeQueue.length === 0) {
      return;
    }
    await this.processWriteQueue();
  }

  async close(): Promise<void> {
    if (this.flushInterval) {
      clearInterval(this.flushInterval);
      this.flushInterval = undefined;
    }

    while (this.isWriting) {
      await new Promise((resolve) => setTimeout(resolve, 50));
    }
    await this.flush();

    const stream = this.writeStream;
    this.writeStream = undefined;
    this.isInitialized = false;

    if (stream && !stream.destroyed) {
      await new Promise<void>((resolve) => {
        stream.end(() => resolve());
      });
    }
  }

  private async processWriteQueue(): Promise<void> {
    if (this.isWriting || !this.writeStream || this.hasErrors) {
      return;
    }

    this.isWriting = true;
    try {
      let entry = this.writeQueue.shift();
      while (entry) {
        await this.writeToStream(this.formatLogEntry(entry));
        entry = this.writeQueue.shift();
      }
    } catch (error) {
      this.handleWriteError(error);
    } finally {
      this.isWriting = false;
    }
  }

  private writeToStream(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.writeStream) {
        reject(new Error("Write stream not available"));
        return;
      }

      this.writeStream.write(data, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  private formatLogEntry(entry: LogEntry): string {
    let logLine = `[${entry.timestamp}] [${entry.level}] [WF:${entry.workflowId}] [Step:${entry.stepNumber}] [${entry.functionName}] ${entry.message}`;

    if (entry.metadata) {
      logLine += ` ${JSON.stringify(entry.metadata)}`;
    }

    return logLine + "\n";
  }

  private handleWriteError(error: unknown): void {
    console.error(
      `[FileLogWriter] Detected write error: ${error instanceof Error ? error.message : String(error)}. Disabling file logging.`,
    );
    this.hasErrors = true;
    this.writeQueue = [];

    if (this.writeStream && !this.writeStream.destroyed) {
      this.writeStream.destroy();
      this.writeStream = undefined;
    }
  }
}
