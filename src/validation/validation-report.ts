/**
 * Validation Report
 *
 * Rolls several validation results up into one summary for display or export.
 */

import type { IssueCounts, ValidationIssue } from './types.js';
import type { ValidationResult } from './validation-result.js';

export interface ValidationReportEntry {
  label: string;
  isValid: boolean;
  isSafe: boolean;
  score: number;
  issueCount: number;
  criticalIssues: ValidationIssue[];
}

export interface ValidationReport {
  overallValid: boolean;
  overallSafe: boolean;
  totalIssues: number;
  issuesBySeverity: IssueCounts;
  averageScore: number;
  recommendations: string[];
  detailedResults: ValidationReportEntry[];
}

/**
 * @param results - labelled results, e.g. one per preset
 */
export function createValidationReport(
  results: ReadonlyArray<{ label: string; result: ValidationResult }>
): ValidationReport {
  const report: ValidationReport = {
    overallValid: true,
    overallSafe: true,
    totalIssues: 0,
    issuesBySeverity: { critical: 0, error: 0, warning: 0, info: 0 },
    averageScore: 0,
    recommendations: [],
    detailedResults: [],
  };

  if (results.length === 0) {
    return report;
  }

  let totalScore = 0;
  const recommendations = new Set<string>();

  for (const { label, result } of results) {
    report.overallValid &&= result.isValid;
    report.overallSafe &&= result.isSafe;

    const counts = result.counts;
    for (const severity of ['critical', 'error', 'warning', 'info'] as const) {
      report.issuesBySeverity[severity] += counts[severity];
    }
    report.totalIssues += result.issues.length;

    for (const suggestion of result.suggestions) {
      recommendations.add(suggestion);
    }

    report.detailedResults.push({
      label,
      isValid: result.isValid,
      isSafe: result.isSafe,
      score: result.overallScore,
      issueCount: result.issues.length,
      criticalIssues: result.criticalIssues,
    });
    totalScore += result.overallScore;
  }

  report.averageScore = totalScore / results.length;
  report.recommendations = [...recommendations];

  return report;
}
