/**
 * Safety Module
 */

export {
  classifyValue,
  classifyAgainstLimit,
  thresholdFromLimit,
  verifyThresholdTable,
  verifyLimitMonotonicity,
  SAFETY_BANDS,
  PERMISSIVE_LIMIT_FIELDS,
} from './threshold-classifier.js';
export type { SafetyBand, LimitField, MonotonicityViolation } from './threshold-classifier.js';

export { estimateNeuralLoad, neuralLoadFactors, NEURAL_LOAD_WEIGHTS } from './neural-load.js';
export type { NeuralLoadInput } from './neural-load.js';

export { checkSafetyCompliance, riskLevelOf, sessionProfileOf, neuralLoadInputOf } from './safety-compliance.js';
export type { SessionProfile, SessionMeasures, ProfileLike } from './safety-compliance.js';

export { assessUserReadiness, READINESS_THRESHOLD } from './readiness.js';
export type { ReadinessReport } from './readiness.js';

export { safetyRecommendations } from './guidance.js';
