/**
 * Validation Result
 *
 * Collects issues from every check. Validity, safety and score are derived
 * from the collected issues on read, so they cannot drift apart.
 */

import type {
  IssueCounts,
  IssueSeverity,
  ValidationIssue,
  ValidationMetadata,
  ValidationResultJSON,
} from './types.js';

export const ERROR_PENALTY = 0.2;
export const WARNING_PENALTY = 0.1;

export class ValidationResult {
  private readonly issueList: ValidationIssue[] = [];
  readonly metadata: ValidationMetadata = {};

  addIssue(issue: ValidationIssue): this {
    this.issueList.push(issue);
    return this;
  }

  addIssues(issues: readonly ValidationIssue[]): this {
    for (const issue of issues) {
      this.addIssue(issue);
    }
    return this;
  }

  /**
   * Append another result's issues, optionally nesting their field paths
   */
  merge(other: ValidationResult, pathPrefix?: string): this {
    for (const issue of other.issues) {
      this.addIssue(pathPrefix ? { ...issue, fieldPath: joinPath(pathPrefix, issue.fieldPath) } : issue);
    }
    return this;
  }

  get issues(): readonly ValidationIssue[] {
    return this.issueList;
  }

  bySeverity(severity: IssueSeverity): ValidationIssue[] {
    return this.issueList.filter((issue) => issue.severity === severity);
  }

  get infos(): ValidationIssue[] {
    return this.bySeverity('info');
  }

  get warnings(): ValidationIssue[] {
    return this.bySeverity('warning');
  }

  get errors(): ValidationIssue[] {
    return this.bySeverity('error');
  }

  get criticalIssues(): ValidationIssue[] {
    return this.bySeverity('critical');
  }

  get counts(): IssueCounts {
    const counts: IssueCounts = { info: 0, warning: 0, error: 0, critical: 0 };
    for (const issue of this.issueList) {
      counts[issue.severity]++;
    }
    return counts;
  }

  get isValid(): boolean {
    const { error, critical } = this.counts;
    return error === 0 && critical === 0;
  }

  get isSafe(): boolean {
    return this.counts.critical === 0;
  }

  /**
   * 0 with any critical issue, else max(0, 1 - 0.2·errors - 0.1·warnings)
   */
  get overallScore(): number {
    const { warning, error, critical } = this.counts;
    if (critical > 0) return 0;
    return Math.max(0, 1 - ERROR_PENALTY * error - WARNING_PENALTY * warning);
  }

  /**
   * Distinct suggestions in issue order
   */
  get suggestions(): string[] {
    return [...new Set(this.issueList.map((issue) => issue.suggestion).filter((s) => s.length > 0))];
  }

  hasIssue(code: string): boolean {
    return this.issueList.some((issue) => issue.code === code);
  }

  toJSON(): ValidationResultJSON {
    return {
      isValid: this.isValid,
      isSafe: this.isSafe,
      overallScore: this.overallScore,
      issues: [...this.issueList],
      counts: this.counts,
      suggestions: this.suggestions,
      metadata: structuredClone(this.metadata),
    };
  }
}

function joinPath(prefix: string, fieldPath: string): string {
  if (!fieldPath) return prefix;
  return fieldPath.startsWith('[') ? `${prefix}${fieldPath}` : `${prefix}.${fieldPath}`;
}
