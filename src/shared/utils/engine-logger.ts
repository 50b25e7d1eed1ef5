/**
 * Engine Logger
 *
 * Centralized logging for validation runs, safety findings and profile updates.
 * Appends to LOG_PATH; never changes what the engine returns.
 */

import * as fs from 'fs';
import { LOG_PATH, SUPPRESS_TEST_LOGS, LOG_LEVEL } from '../config.js';

/**
 * Log categories
 */
export enum EngineLogLevel {
  INFO = 'INFO',
  DEBUG = 'DEBUG',
  VALIDATION = 'VALIDATION',
  SAFETY = 'SAFETY',
  PROFILE = 'PROFILE',
  ERROR = 'ERROR',
}

/**
 * Engine logger utility
 */
export class EngineLogger {
  private static enabled = !SUPPRESS_TEST_LOGS;

  /**
   * Log a message with timestamp and category
   */
  private static log(level: EngineLogLevel, message: string): void {
    if (!this.enabled) return;

    const timestamp = new Date().toISOString().split('T')[1].split('.')[0];
    const logMsg = `[${timestamp}] [Policy:${level}] ${message}`;

    fs.appendFileSync(LOG_PATH, logMsg + '\n');
  }

  /**
   * Log the outcome of one validation call
   */
  static validationCompleted(
    context: string,
    summary: { isValid: boolean; isSafe: boolean; overallScore: number; issueCount: number }
  ): void {
    const status = summary.isSafe ? (summary.isValid ? '✅ VALID' : '⚠️ INVALID') : '🛑 UNSAFE';
    this.log(
      EngineLogLevel.VALIDATION,
      `${status} [${context}] score=${summary.overallScore.toFixed(2)} issues=${summary.issueCount}`
    );
  }

  static criticalIssue(fieldPath: string, code: string, message: string): void {
    this.log(EngineLogLevel.SAFETY, `🛑 CRITICAL ${code} at ${fieldPath}: ${message}`);
  }

  /**
   * Log a profile mutation after a completed session
   */
  static profileUpdated(profileId: string, totalSessions: number, profileType: string): void {
    this.log(
      EngineLogLevel.PROFILE,
      `🧠 PROFILE ${profileId} sessions=${totalSessions} type=${profileType}`
    );
  }

  static referenceLoaded(source: string, stateCount: number, transitionCount: number): void {
    this.debug(`📖 Reference data loaded from ${source} (${stateCount} states, ${transitionCount} transitions)`);
  }

  static error(message: string, error?: Error): void {
    this.log(EngineLogLevel.ERROR, `⚠️ ${message}`);
    if (error) {
      this.log(EngineLogLevel.ERROR, `   ${error.message}`);
    }
  }

  static info(message: string): void {
    this.log(EngineLogLevel.INFO, message);
  }

  static debug(message: string): void {
    if (LOG_LEVEL !== 'DEBUG') return;
    this.log(EngineLogLevel.DEBUG, message);
  }

  /**
   * Enable/disable logging
   */
  static setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  static isEnabled(): boolean {
    return this.enabled;
  }
}
