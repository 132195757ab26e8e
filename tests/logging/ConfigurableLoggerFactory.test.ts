import { describe, expect, it } from 'vitest';
import { ConfigurableLoggerFactory, formatLine } from '../../src/logging/ConfigurableLoggerFactory';
import { logContext } from '../../src/logging/LogContext';

describe('formatLine', () => {
  const base = { level: 'info', message: 'Running team TEAM1', label: 'TeamClient', timestamp: '2026-01-01T00:00:00.000Z' };

  it('tags lines written inside a team run with the conversation id', () => {
    expect(formatLine({ ...base, conversationId: 'conv-1' })).toBe(
      `2026-01-01T00:00:00.000Z [Conv:conv-1] [TeamClient] {W-${process.pid}} info: Running team TEAM1`,
    );
  });

  it('omits the tag outside a run and shortens labels on request', () => {
    expect(formatLine({ ...base, label: 'agent/TeamClient' }, true)).toBe(
      `2026-01-01T00:00:00.000Z [TeamClient] {W-${process.pid}} info: Running team TEAM1`,
    );
  });
});

describe('ConfigurableLoggerFactory', () => {
  it('creates console-only loggers when file logging is off', () => {
    const factory = new ConfigurableLoggerFactory('error', { fileName: false });

    const logger = factory.createLogger('Test');

    expect(typeof logger.info).toBe('function');
  });

  it('scopes the conversation id to the run callback', async () => {
    const seen = await logContext.run({ conversationId: 'conv-9' }, async () => logContext.getStore()?.conversationId);

    expect(seen).toBe('conv-9');
    expect(logContext.getStore()).toBeUndefined();
  });
});
