import { Application } from 'express';
import { createApp } from '../../src/app';
import { createConfigChain, LoggingSettings, resolveLoggingSettings } from '../../src/config/logging';
import { configureLogging, LoggingPipeline } from '../../src/observability';
import { MemorySink } from './memorySink';

export const TEST_HOST = { name: 'test-host', ip: '10.0.0.7' };
export const TEST_TIMESTAMP = '2024-01-15T10:30:00.000Z';

/**
 * Settings from defaults plus the given QUICKPAY_* style variables, ignoring the
 * real process environment
 */
export const buildTestSettings = (env: NodeJS.ProcessEnv = {}): LoggingSettings =>
  resolveLoggingSettings(createConfigChain(env));

export interface TestLogging {
  pipeline: LoggingPipeline;
  sink: MemorySink;
  settings: LoggingSettings;
}

/**
 * Install a process-wide pipeline writing to memory with a fixed host and clock
 */
export const setupTestLogging = (env: NodeJS.ProcessEnv = {}): TestLogging => {
  const settings = buildTestSettings(env);
  const sink = new MemorySink();
  const pipeline = configureLogging({
    settings,
    sink,
    host: TEST_HOST,
    clock: () => new Date(TEST_TIMESTAMP),
  });
  return { pipeline, sink, settings };
};

export const createTestApp = (settings: LoggingSettings): Application => createApp({ settings });
