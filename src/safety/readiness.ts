/**
 * User Readiness
 *
 * Starts at 1.0 and scales down for each concern:
 *   session complexity above the level's neural-load maximum  ×0.7
 *   previous session less than 24 h ago                       ×0.9
 *   current stress above 0.7                                   ×0.8
 * A user is ready at 0.6 or above.
 */

import { getReferenceData } from '../reference/reference-loader.js';
import { isExperienceLevel, type ReferenceData } from '../shared/types/reference.js';
import { estimateNeuralLoad } from './neural-load.js';
import { neuralLoadInputOf, type SessionMeasures, type SessionProfile } from './safety-compliance.js';

export const READINESS_THRESHOLD = 0.6;

const COMPLEXITY_FACTOR = 0.7;
const RECENT_SESSION_FACTOR = 0.9;
const STRESS_FACTOR = 0.8;
const REST_PERIOD_HOURS = 24;
const HIGH_STRESS = 0.7;

export interface ReadinessReport {
  isReady: boolean;
  readinessScore: number;
  sessionComplexity: number;
  concerns: string[];
  preparationsNeeded: string[];
  recommendedModifications: string[];
}

export function assessUserReadiness(
  profile: SessionProfile,
  session: SessionMeasures,
  reference: ReferenceData = getReferenceData()
): ReadinessReport {
  const report: ReadinessReport = {
    isReady: true,
    readinessScore: 1,
    sessionComplexity: estimateNeuralLoad(neuralLoadInputOf(session)),
    concerns: [],
    preparationsNeeded: [],
    recommendedModifications: [],
  };

  // unknown levels are held to beginner limits
  const level = isExperienceLevel(profile.experienceLevel) ? profile.experienceLevel : 'beginner';
  const maxComplexity = reference.neuralLoadLimits[level].maxNeuralLoad;

  if (report.sessionComplexity > maxComplexity) {
    report.concerns.push(
      `Session complexity (${report.sessionComplexity.toFixed(2)}) exceeds recommended level for ${level} (${maxComplexity})`
    );
    report.recommendedModifications.push('Reduce session complexity or gain more experience');
    report.readinessScore *= COMPLEXITY_FACTOR;
  }

  const hoursSince = profile.hoursSinceLastSession;
  if (hoursSince !== undefined && hoursSince < REST_PERIOD_HOURS) {
    report.concerns.push(`Recent session ${hoursSince} hours ago - consider rest period`);
    report.preparationsNeeded.push('Ensure adequate rest between sessions');
    report.readinessScore *= RECENT_SESSION_FACTOR;
  }

  if ((profile.currentStressLevel ?? 0.5) > HIGH_STRESS) {
    report.concerns.push('High current stress level - may affect session quality');
    report.preparationsNeeded.push('Consider stress reduction before session');
    report.readinessScore *= STRESS_FACTOR;
  }

  report.isReady = report.readinessScore >= READINESS_THRESHOLD;
  return report;
}
