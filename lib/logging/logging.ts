import { randomUUID } from "crypto";
import * as path from "path";
import { FileLogWriter, FileLogWriterImpl } from "./file-log-writer";
import { LogConfigManager } from "./log-config";
import { LogLevel, meetsThreshold } from "./log-level";

export { LogLevel } from "./log-level";

// --- Workflow Logging Infrastructure ---

// AI usage tracking
export interface AIUsageData {
  model: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  inputCost: number;
  outputCost: number;
  totalCost: number;
  provider: string;
  requestDuration: number;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  workflowId: string;
  stepNumber: number;
  functionName: string;
  message: string;
  metadata?: Record<string, unknown>;
  aiUsage?: AIUsageData;
}

export interface WorkflowLoggerConfig {
  enableFileLogging: boolean;
  logDirectory: string;
  logLevel: LogLevel;
  runLabel?: string;
}

export interface ExecutionSummary {
  workflowId: string;
  totalExecutionTime: number;
  totalSteps: number;
  apiCalls: number;
  failedApiCalls: number;
  totalAiCost: number;
}

const SENSITIVE_KEYS = new Set(["apikey", "api_key", "password", "token", "authorization", "secret"]);

export class WorkflowLogger {
  private readonly workflowId: string;
  private readonly workflowStartTime: number;
  private workflowStepCounter = 0;
  private apiCallCounter = 0;
  private failedApiCalls = 0;
  private totalAiCost = 0;
  private entries: LogEntry[] = [];

  private fileWriter?: FileLogWriter;
  private fileLoggingEnabled: boolean;
  private fileReady?: Promise<void>;
  private config: WorkflowLoggerConfig;

  constructor(initialWorkflowId?: string, config?: Partial<WorkflowLoggerConfig>) {
    this.workflowId = initialWorkflowId || randomUUID();
    this.workflowStartTime = Date.now();

    const globalConfig = LogConfigManager.getConfig();
    this.config = {
      enableFileLogging: config?.enableFileLogging ?? globalConfig.fileLoggingEnabled,
      logDirectory: config?.logDirectory ?? globalConfig.logDirectory,
      logLevel: config?.logLevel ?? globalConfig.logLevel,
      runLabel: config?.runLabel,
    };
    this.fileLoggingEnabled = this.config.enableFileLogging;

    if (this.fileLoggingEnabled) {
      this.fileReady = this.initializeFileLogging();
    }

    this.logWorkflow("WorkflowLogger.constructor", "Initialized workflow logger", {
      workflowId: this.workflowId,
      fileLoggingEnabled: this.fileLoggingEnabled,
      logDirectory: this.config.logDirectory,
    });
  }

  /**
   * Entries that met the configured threshold, in the order they were written.
   */
  public getFullLog(): LogEntry[] {
    return [...this.entries];
  }

  private createLogEntry(
    level: LogLevel,
    functionName: string,
    message: string,
    metadata?: Record<string, unknown>,
  ): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      workflowId: this.workflowId,
      stepNumber: ++this.workflowStepCounter,
      functionName,
      message: this.scrubSensitiveData(message),
      metadata: metadata ? this.scrubMetadata(metadata) : undefined,
    };
  }

  private writeStructuredLog(entry: LogEntry): void {
    if (!meetsThreshold(entry.level, this.config.logLevel)) {
      return;
    }
    this.entries.push(entry);

    const formattedMessage = `[${entry.timestamp}] [${entry.level}] [WF:${entry.workflowId}] [Step:${entry.stepNumber}] [${entry.functionName}] ${entry.message}`;
    const args: unknown[] = entry.metadata ? [formattedMessage, entry.metadata] : [formattedMessage];

    switch (entry.level) {
      case LogLevel.ERROR:
        console.error(...args);
        break;
      case LogLevel.WARN:
        console.warn(...args);
        break;
      case LogLevel.DEBUG:
        console.debug(...args);
        break;
      default:
        console.log(...args);
    }

    if (this.fileLoggingEnabled) {
      this.writeToFile(entry);
    }
  }

  public logDebug(functionName: string, message: string, metadata?: Record<string, unknown>) {
    this.writeStructuredLog(this.createLogEntry(LogLevel.DEBUG, functionName, message, metadata));
  }

  public logInfo(functionName: string, message: string, metadata?: Record<string, unknown>) {
    this.writeStructuredLog(this.createLogEntry(LogLevel.INFO, functionName, message, metadata));
  }

  public logWarn(functionName: string, message: string, metadata?: Record<string, unknown>) {
    this.writeStructuredLog(this.createLogEntry(LogLevel.WARN, functionName, message, metadata));
  }

  public logError(functionName: string, message: string, metadata?: Record<string, unknown>) {
    this.writeStructuredLog(this.createLogEntry(LogLevel.ERROR, functionName, message, metadata));
  }

  public logWorkflow(functionName: string, message: string, metadata?: Record<string, unknown>) {
    this.writeStructuredLog(this.createLogEntry(LogLevel.WORKFLOW, functionName, message, metadata));
  }

  public logAiUsage(functionName: string, aiUsage: AIUsageData) {
    this.totalAiCost += aiUsage.totalCost;

    const entry = this.createLogEntry(
      LogLevel.AI_USAGE,
      functionName,
      `AI API call completed - Model: ${aiUsage.model}, Tokens: ${aiUsage.totalTokens}, Cost: $${aiUsage.totalCost.toFixed(4)}`,
      {
        model: aiUsage.model,
        provider: aiUsage.provider,
        inputTokens: aiUsage.inputTokens,
        outputTokens: aiUsage.outputTokens,
        totalTokens: aiUsage.totalTokens,
        totalCost: aiUsage.totalCost,
        requestDuration: aiUsage.requestDuration,
        cumulativeCost: this.totalAiCost,
      },
    );
    entry.aiUsage = aiUsage;

    this.writeStructuredLog(entry);
  }

  /**
   * Records the start of an external call and returns its call id.
   */
  public logApiCall(service: string, method: string, input: unknown, startTime: number): string {
    const callId = `${this.workflowId}-api-${++this.apiCallCounter}`;
    this.writeStructuredLog(
      this.createLogEntry(LogLevel.DEBUG, `API.${service}.${method}.start`, "Starting API call", {
        service,
        method,
        callId,
        input,
        startTime: new Date(startTime).toISOString(),
      }),
    );
    return callId;
  }

  public logApiResponse(
    callId: string,
    service: string,
    method: string,
    response: unknown,
    error: unknown,
    executionTime: number,
  ): void {
    if (error) {
      this.failedApiCalls++;
    }
    this.writeStructuredLog(
      this.createLogEntry(
        error ? LogLevel.ERROR : LogLevel.DEBUG,
        `API.${service}.${method}.end`,
        `API call ${error ? "failed" : "completed"}`,
        {
          service,
          method,
          callId,
          executionTime,
          success: !error,
          response: error ? undefined : response,
          error: error instanceof Error ? { name: error.name, message: error.message } : error || undefined,
        },
      ),
    );
  }

  public generateExecutionSummary(): ExecutionSummary {
    return {
      workflowId: this.workflowId,
      totalExecutionTime: Date.now() - this.workflowStartTime,
      totalSteps: this.workflowStepCounter,
      apiCalls: this.apiCallCounter,
      failedApiCalls: this.failedApiCalls,
      totalAiCost: this.totalAiCost,
    };
  }

  /**
   * Closes the logger and flushes any remaining file entries.
   */
  public async close(): Promise<void> {
    if (this.fileReady) {
      await this.fileReady;
    }
    if (this.fileWriter) {
      await this.fileWriter.close();
      this.fileWriter = undefined;
    }
  }

  private async initializeFileLogging(): Promise<void> {
    const writer = new FileLogWriterImpl();
    const initialized = await writer.initialize(this.generateLogFilePath());
    if (initialized) {
      this.fileWriter = writer;
    } else {
      this.fileLoggingEnabled = false;
      await writer.close();
      console.warn("[WorkflowLogger] File logging initialization failed, falling back to console only");
    }
  }

  private generateLogFilePath(): string {
    const timestamp = new Date().toISOString().replace(/[:.]/g, "-").replace("Z", "");
    const label = (this.config.runLabel || this.workflowId).replace(/[^a-zA-Z0-9\-_]/g, "-").substring(0, 50);
    return path.join(this.config.logDirectory || path.join(process.cwd(), "logs"), `icd-review-${timestamp}-${label}.log`);
  }

  private writeToFile(entry: LogEntry): void {
    const ready = this.fileReady ?? Promise.resolve();
    ready
      .then(() => this.fileWriter?.writeEntry(entry))
      .catch((error: unknown) => {
        this.fileLoggingEnabled = false;
        console.warn(
          `[WorkflowLogger] File write failed, disabling file logging: ${error instanceof Error ? error.message : String(error)}`,
        );
      });
  }

  private scrubSensitiveData(text: string): string {
    return text
      .replace(/\b(sk|gsk)[-_][A-Za-z0-9_-]{8,}\b/g, "[KEY-REDACTED]")
      .replace(/\bBearer\s+[A-Za-z0-9._~+/=-]+/g, "Bearer [REDACTED]")
      .replace(/\b\d{3}-\d{2}-\d{4}\b/g, "[SSN-REDACTED]")
      .replace(/\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g, "[EMAIL-REDACTED]");
  }

  private scrubMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
    const visited = new WeakSet<object>();
    const scrubbed: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(metadata)) {
      scrubbed[key] = this.scrubValue(key, value, visited);
    }
    return scrubbed;
  }

  private scrubValue(key: string, value: unknown, visited: WeakSet<object>): unknown {
    if (SENSITIVE_KEYS.has(key.toLowerCase())) {
      return "[REDACTED]";
    }
    if (typeof value === "string") {
      return this.scrubSensitiveData(value);
    }
    if (value instanceof Error) {
      return { name: value.name, message: this.scrubSensitiveData(value.message) };
    }
    if (typeof value === "object" && value !== null) {
      if (visited.has(value)) {
        return "[CIRCULAR-REFERENCE]";
      }
      visited.add(value);

      if (Array.isArray(value)) {
        return value.map((item) => this.scrubValue("", item, visited));
      }
      const scrubbed: Record<string, unknown> = {};
      for (const [childKey, childValue] of Object.entries(value)) {
        scrubbed[childKey] = this.scrubValue(childKey, childValue, visited);
      }
      return scrubbed;
    }
    return value;
  }
}
