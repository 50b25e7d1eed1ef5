/**
 * Safety Guidance
 *
 * Human-readable preparation advice: a common base, then advice for the
 * experience level, then advice for the kind of session.
 */

import { isExperienceLevel, type ExperienceLevel } from '../shared/types/reference.js';

const BASE_GUIDANCE: readonly string[] = [
  'Ensure comfortable, safe environment',
  'Have water available',
  'Plan for integration time after session',
  'Use comfortable seating or lying position',
  'Turn off phone and eliminate distractions',
];

const LEVEL_GUIDANCE: Readonly<Record<ExperienceLevel, readonly string[]>> = {
  beginner: [
    'Start with shorter sessions (15-20 minutes)',
    'Use lower intensity settings initially',
    'Have someone nearby if possible',
    'Take breaks if uncomfortable',
    'Read all safety information beforehand',
  ],
  intermediate: [
    'Monitor your comfort level throughout',
    'Be aware of emotional content that may arise',
    'Have integration practices ready',
    'Trust your instincts about session modifications',
  ],
  advanced: [
    'Prepare for deeper states and integration needs',
    'Have advanced integration techniques available',
    'Monitor neural load throughout session',
    'Be prepared for transcendent experiences',
  ],
  expert: [
    'Use advanced monitoring protocols',
    'Have comprehensive integration plan',
    'Monitor biofield coherence patterns',
    'Be prepared for consciousness expansion',
  ],
};

const SESSION_GUIDANCE = new Map<string, readonly string[]>(Object.entries({
  healing: [
    'Allow extra time for healing integration',
    'Be prepared for emotional release',
    'Have healing support resources available',
  ],
  meditation: [
    'Prepare meditation space carefully',
    'Have mindfulness support techniques ready',
    'Allow time for contemplative integration',
  ],
  creativity: [
    'Have creative materials available',
    'Be prepared for inspiration and insights',
    'Plan creative expression time after session',
  ],
  transcendence: [
    'Prepare for expanded states thoroughly',
    'Have grounding techniques readily available',
    'Plan extensive integration time',
    'Consider having experienced guide available',
  ],
}));

/**
 * Unknown levels and session types add nothing beyond the base advice
 */
export function safetyRecommendations(level: string, sessionType?: string): string[] {
  const levelAdvice = isExperienceLevel(level) ? LEVEL_GUIDANCE[level] : [];
  const sessionAdvice = sessionType !== undefined ? SESSION_GUIDANCE.get(sessionType) ?? [] : [];
  return [...BASE_GUIDANCE, ...levelAdvice, ...sessionAdvice];
}
