/**
 * Tests for the workflow logger and its configuration
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { LogLevel, WorkflowLogger } from '../lib/logging/logging';
import { LogConfigManager } from '../lib/logging/log-config';
import { meetsThreshold } from '../lib/logging/log-level';

function quietLogger(level: LogLevel = LogLevel.DEBUG): WorkflowLogger {
  return new WorkflowLogger('wf-test', { logLevel: level, enableFileLogging: false });
}

describe('WorkflowLogger', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('should number steps and carry the workflow id', () => {
    const logger = quietLogger();

    logger.logInfo('step.one', 'first');
    logger.logWarn('step.two', 'second');

    const entries = logger.getFullLog();
    // the constructor writes the first entry
    expect(entries.map((entry) => [entry.stepNumber, entry.level, entry.functionName])).toEqual([
      [1, LogLevel.WORKFLOW, 'WorkflowLogger.constructor'],
      [2, LogLevel.INFO, 'step.one'],
      [3, LogLevel.WARN, 'step.two'],
    ]);
    expect(entries.every((entry) => entry.workflowId === 'wf-test')).toBe(true);
  });

  test('should drop entries below the threshold', () => {
    const logger = quietLogger(LogLevel.WARN);

    logger.logDebug('fn', 'hidden');
    logger.logInfo('fn', 'hidden');
    logger.logError('fn', 'shown');

    expect(logger.getFullLog().map((entry) => entry.message)).toEqual(['shown']);
    expect(console.debug).not.toHaveBeenCalled();
  });

  test('should scrub keys and tokens from messages and metadata', () => {
    const logger = quietLogger();

    logger.logInfo('fn', 'using key sk-test1234567890 with Bearer abc.def', {
      apiKey: 'test-secret',
      nested: { authorization: 'Bearer test-secret', note: 'contact jane@example.com' },
    });

    const entry = logger.getFullLog()[1];
    expect(entry.message).toBe('using key [KEY-REDACTED] with Bearer [REDACTED]');
    expect(entry.metadata).toEqual({
      apiKey: '[REDACTED]',
      nested: { authorization: '[REDACTED]', note: 'contact [EMAIL-REDACTED]' },
    });
  });

  test('should mark circular metadata', () => {
    const logger = quietLogger();
    const node: Record<string, unknown> = { name: 'root' };
    node.self = node;

    logger.logInfo('fn', 'circular', { node });

    expect(logger.getFullLog()[1].metadata).toEqual({ node: { name: 'root', self: '[CIRCULAR-REFERENCE]' } });
  });

  test('should track api calls, failures and cost in the summary', () => {
    const logger = quietLogger();

    const ok = logger.logApiCall('chat-completions', 'generateReply', {}, Date.now());
    logger.logApiResponse(ok, 'chat-completions', 'generateReply', { length: 9 }, null, 12);
    const failed = logger.logApiCall('chat-completions', 'generateReply', {}, Date.now());
    logger.logApiResponse(failed, 'chat-completions', 'generateReply', null, new Error('timeout'), 30);
    logger.logAiUsage('fn', {
      model: 'gpt-4o',
      provider: 'openai',
      inputTokens: 1000,
      outputTokens: 1000,
      totalTokens: 2000,
      inputCost: 0.0025,
      outputCost: 0.01,
      totalCost: 0.0125,
      requestDuration: 12,
    });

    expect(ok).toBe('wf-test-api-1');
    const summary = logger.generateExecutionSummary();
    expect(summary.apiCalls).toBe(2);
    expect(summary.failedApiCalls).toBe(1);
    expect(summary.totalAiCost).toBe(0.0125);
  });

  test('should write entries to a log file when enabled', async () => {
    const logDirectory = fs.mkdtempSync(path.join(os.tmpdir(), 'icd-logs-'));
    try {
      const logger = new WorkflowLogger('wf-file', {
        logLevel: LogLevel.INFO,
        enableFileLogging: true,
        logDirectory,
        runLabel: 'file test',
      });
      logger.logInfo('fn', 'persisted entry');
      await logger.close();

      const files = fs.readdirSync(logDirectory);
      expect(files).toHaveLength(1);
      expect(files[0]).toMatch(/^icd-review-.*-file-test\.log$/);
      const contents = fs.readFileSync(path.join(logDirectory, files[0]), 'utf-8');
      expect(contents).toContain('=== ICD REVIEW LOG ===');
      expect(contents).toContain('persisted entry');
    } finally {
      fs.rmSync(logDirectory, { recursive: true, force: true });
    }
  });
});

describe('LogConfigManager', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
    LogConfigManager.resetConfig();
  });

  test('should read settings from the environment', () => {
    process.env.WORKFLOW_LOG_LEVEL = 'debug';
    process.env.WORKFLOW_FILE_LOGGING_ENABLED = 'true';
    process.env.WORKFLOW_LOG_DIRECTORY = 'run-logs/';
    LogConfigManager.resetConfig();

    expect(LogConfigManager.getConfig()).toEqual({
      fileLoggingEnabled: true,
      logDirectory: 'run-logs/',
      logLevel: LogLevel.DEBUG,
    });
    expect(LogConfigManager.validateConfig()).toEqual([]);
  });

  test('should fall back to INFO for an unknown level', () => {
    process.env.WORKFLOW_LOG_LEVEL = 'verbose';
    LogConfigManager.resetConfig();

    expect(LogConfigManager.getLogLevel()).toBe(LogLevel.INFO);
    expect(LogConfigManager.validateConfig()).toEqual(['Unknown log level "verbose", using INFO']);
  });

  test('should only accept the workflow log levels', () => {
    expect(Object.values(LogLevel)).toEqual(['DEBUG', 'INFO', 'WARN', 'ERROR', 'WORKFLOW', 'AI_USAGE']);

    process.env.WORKFLOW_LOG_LEVEL = 'trace';
    LogConfigManager.resetConfig();

    expect(LogConfigManager.getLogLevel()).toBe(LogLevel.INFO);
  });
});

describe('meetsThreshold', () => {
  test('should rank workflow and usage entries with INFO', () => {
    expect(meetsThreshold(LogLevel.WORKFLOW, LogLevel.INFO)).toBe(true);
    expect(meetsThreshold(LogLevel.AI_USAGE, LogLevel.WARN)).toBe(false);
    expect(meetsThreshold(LogLevel.ERROR, LogLevel.WARN)).toBe(true);
  });
});
