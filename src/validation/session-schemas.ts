/**
 * Session and Preset Schemas
 *
 * Declarative field rules for the two configuration records the engine accepts.
 */

import type { SchemaDefinition } from './types.js';

export const PRESET_CATEGORIES = ['healing', 'meditation', 'creativity', 'learning', 'transcendence', 'custom'] as const;

const UNIT_INTERVAL = { type: 'float', minValue: 0.0, maxValue: 1.0 } as const;

export const SESSION_CONFIG_SCHEMA: SchemaDefinition = {
  name: {
    type: 'string',
    required: true,
    minLength: 1,
    maxLength: 100,
    pattern: '^[a-zA-Z0-9\\s\\-_\\.]+$',
    description: 'Session name',
  },
  durationMinutes: {
    type: 'integer',
    required: true,
    minValue: 5,
    maxValue: 120,
    description: 'Session duration in minutes',
  },
  frequencyIntensity: {
    type: 'float',
    required: true,
    minValue: 0.1,
    maxValue: 1.0,
    description: 'Frequency intensity (0.1-1.0)',
  },
  consciousnessJourney: {
    type: 'array',
    required: true,
    minItems: 1,
    maxItems: 8,
    items: { type: 'string', minLength: 1 },
    description: 'Ordered consciousness states',
  },
  gammaExposureMinutes: {
    type: 'float',
    minValue: 0,
    maxValue: 120,
    description: 'Minutes of continuous gamma-range exposure',
  },
  biofieldConfiguration: {
    type: 'object',
    properties: {
      schumannAlignment: UNIT_INTERVAL,
      solfeggioIntegration: UNIT_INTERVAL,
      goldenRatioHarmonics: UNIT_INTERVAL,
    },
  },
  safetyParameters: {
    type: 'object',
    properties: {
      comfortMonitoring: { type: 'boolean' },
      automaticAdjustment: { type: 'boolean' },
      emergencyStop: { type: 'boolean' },
    },
  },
};

export const PRESET_CONFIG_SCHEMA: SchemaDefinition = {
  presetId: {
    type: 'string',
    required: true,
    pattern: '^[a-z0-9_]+$',
    minLength: 3,
    maxLength: 50,
  },
  name: {
    type: 'string',
    required: true,
    minLength: 1,
    maxLength: 100,
  },
  description: {
    type: 'string',
    required: true,
    minLength: 10,
    maxLength: 500,
  },
  category: {
    type: 'string',
    required: true,
    allowedValues: PRESET_CATEGORIES,
  },
  experienceLevel: {
    type: 'string',
    required: true,
    allowedValues: ['beginner', 'intermediate', 'advanced', 'expert'],
  },
  // nested session rules run separately so their paths carry this prefix
  baseConfiguration: {
    type: 'object',
    required: true,
  },
  tags: {
    type: 'array',
    maxItems: 10,
    items: { type: 'string', minLength: 1, maxLength: 30 },
  },
  createdDate: {
    type: 'datetime',
  },
  version: {
    type: 'string',
    pattern: '^\\d+\\.\\d+\\.\\d+$',
  },
};
