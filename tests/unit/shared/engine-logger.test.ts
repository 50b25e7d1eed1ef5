/**
 * Engine Logger Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockedFunction } from 'vitest';

vi.mock('fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs')>();
  return { ...actual, appendFileSync: vi.fn() };
});

type EngineLoggerClass = typeof import('../../../src/shared/utils/engine-logger.js').EngineLogger;

describe('EngineLogger', () => {
  let EngineLogger: EngineLoggerClass;
  let logPath: string;
  let appended: MockedFunction<typeof import('fs').appendFileSync>;

  // fresh modules so the logger binds to the mocked fs
  beforeEach(async () => {
    vi.resetModules();
    const fs = await import('fs');
    appended = vi.mocked(fs.appendFileSync);
    EngineLogger = (await import('../../../src/shared/utils/engine-logger.js')).EngineLogger;
    logPath = (await import('../../../src/shared/config.js')).LOG_PATH;
    EngineLogger.setEnabled(true);
  });

  afterEach(() => {
    EngineLogger.setEnabled(false);
    vi.clearAllMocks();
  });

  const lines = (): string[] => appended.mock.calls.map((call) => String(call[1]));

  it('should write nothing while disabled', () => {
    EngineLogger.setEnabled(false);
    EngineLogger.info('quiet');

    expect(EngineLogger.isEnabled()).toBe(false);
    expect(appended).not.toHaveBeenCalled();
  });

  it('should append one line per critical issue', () => {
    EngineLogger.criticalIssue('durationMinutes', 'EXPERIENCE_LIMIT_EXCEEDED', 'too long');

    expect(appended).toHaveBeenCalledTimes(1);
    expect(appended.mock.calls[0][0]).toBe(logPath);
    expect(lines()[0]).toMatch(
      /^\[\d{2}:\d{2}:\d{2}\] \[Policy:SAFETY\] 🛑 CRITICAL EXPERIENCE_LIMIT_EXCEEDED at durationMinutes: too long\n$/
    );
  });

  it('should summarize a validation run', () => {
    EngineLogger.validationCompleted('session', { isValid: true, isSafe: true, overallScore: 0.9, issueCount: 1 });
    EngineLogger.validationCompleted('preset', { isValid: false, isSafe: true, overallScore: 0.8, issueCount: 1 });
    EngineLogger.validationCompleted('session', { isValid: false, isSafe: false, overallScore: 0, issueCount: 3 });

    expect(lines()[0]).toContain('[Policy:VALIDATION] ✅ VALID [session] score=0.90 issues=1');
    expect(lines()[1]).toContain('⚠️ INVALID [preset] score=0.80 issues=1');
    expect(lines()[2]).toContain('🛑 UNSAFE [session] score=0.00 issues=3');
  });

  it('should log profile updates', () => {
    EngineLogger.profileUpdated('abc123', 4, 'beginner');
    expect(lines()[0]).toContain('[Policy:PROFILE] 🧠 PROFILE abc123 sessions=4 type=beginner');
  });

  it('should log the error message on a second line', () => {
    EngineLogger.error('Reference reload failed', new Error('file not found'));

    expect(lines()).toHaveLength(2);
    expect(lines()[0]).toContain('[Policy:ERROR] ⚠️ Reference reload failed');
    expect(lines()[1]).toContain('[Policy:ERROR]    file not found');
  });
});
