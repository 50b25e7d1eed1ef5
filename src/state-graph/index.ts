/**
 * Consciousness State Graph Module
 */

export {
  ConsciousnessStateGraph,
  getStateGraph,
  createStateGraph,
  isDifficultyPermitted,
  edgeKey,
} from './state-graph.js';
export { validateStateTransition, validateJourney } from './transition-validator.js';
export type { JourneyValidationOptions } from './transition-validator.js';
