/**
 * Validation Types
 *
 * Type definitions for declarative schemas, issues and result metadata.
 */

// ============================================================
// Issues
// ============================================================

/**
 * info: observation only; warning: advisory; error: structural defect (blocks validity);
 * critical: safety violation (blocks validity and safety)
 */
export type IssueSeverity = 'info' | 'warning' | 'error' | 'critical';

export const SEVERITIES: readonly IssueSeverity[] = ['info', 'warning', 'error', 'critical'];

export interface ValidationIssue {
  severity: IssueSeverity;
  /** Dotted path of the offending field, e.g. 'biofieldConfiguration.schumannAlignment' */
  fieldPath: string;
  message: string;
  value?: unknown;
  suggestion: string;
  code: string;
}

export type IssueCounts = Record<IssueSeverity, number>;

// ============================================================
// Declarative schema
// ============================================================

export type FieldType = 'string' | 'integer' | 'float' | 'boolean' | 'array' | 'object' | 'datetime';

export const FIELD_TYPES: readonly FieldType[] = [
  'string',
  'integer',
  'float',
  'boolean',
  'array',
  'object',
  'datetime',
];

export interface FieldSchema {
  type: FieldType;
  required?: boolean;
  description?: string;
  // numbers
  minValue?: number;
  maxValue?: number;
  // strings
  minLength?: number;
  maxLength?: number;
  pattern?: string;
  allowedValues?: readonly string[];
  // arrays
  minItems?: number;
  maxItems?: number;
  items?: FieldSchema;
  // objects
  properties?: SchemaDefinition;
}

export type SchemaDefinition = Readonly<Record<string, FieldSchema>>;

// ============================================================
// Session configuration
// ============================================================

export interface BiofieldConfiguration {
  schumannAlignment?: number;
  solfeggioIntegration?: number;
  goldenRatioHarmonics?: number;
}

export interface SafetyParameters {
  comfortMonitoring?: boolean;
  automaticAdjustment?: boolean;
  emergencyStop?: boolean;
}

/**
 * A session configuration that has passed SESSION_CONFIG_SCHEMA
 */
export interface SessionConfig {
  name: string;
  durationMinutes: number;
  frequencyIntensity: number;
  consciousnessJourney: string[];
  gammaExposureMinutes?: number;
  biofieldConfiguration?: BiofieldConfiguration;
  safetyParameters?: SafetyParameters;
}

// ============================================================
// Result metadata
// ============================================================

export type RiskLevel = 'minimal_risk' | 'low_risk' | 'moderate_risk' | 'high_risk';

export interface NeuralLoadFactors {
  duration: number;
  intensity: number;
  highExposure: number;
  transitions: number;
}

/**
 * Well-known metadata keys; components may add their own
 */
export interface ValidationMetadata {
  neuralLoad?: number;
  neuralLoadFactors?: NeuralLoadFactors;
  riskLevel?: RiskLevel;
  experienceLevel?: string;
  coherenceLevel?: string;
  overallCoherence?: number;
  brainwaveRange?: string;
  solfeggioFrequency?: string;
  schumannMode?: string;
  goldenRatioHarmonic?: string;
  recommendations?: string[];
  [key: string]: unknown;
}

export interface ValidationResultJSON {
  isValid: boolean;
  isSafe: boolean;
  overallScore: number;
  issues: ValidationIssue[];
  counts: IssueCounts;
  suggestions: string[];
  metadata: ValidationMetadata;
}

export type FrequencyKind = 'brainwave' | 'solfeggio' | 'schumann' | 'goldenRatio';
