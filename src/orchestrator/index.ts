/**
 * Validation Orchestrator Module
 */

export {
  ValidationOrchestrator,
  getValidationOrchestrator,
  createValidationOrchestrator,
  validateSessionConfig,
  validatePresetConfig,
  readSessionMeasures,
} from './validation-orchestrator.js';
export type { SessionValidationOptions } from './validation-orchestrator.js';
