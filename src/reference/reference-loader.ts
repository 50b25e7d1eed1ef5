/**
 * Reference Loader
 *
 * Loads the static reference tables from reference-data.json once, checks their
 * shape and cross references, and freezes them for the rest of the process.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { REFERENCE_DATA_PATH } from '../shared/config.js';
import { ReferenceDataError } from '../shared/errors.js';
import { EngineLogger } from '../shared/utils/engine-logger.js';
import type {
  ConsciousnessState,
  ExperienceLevel,
  NeuralLoadLimit,
  ReferenceData,
  SafetyThreshold,
  StateTransition,
} from '../shared/types/reference.js';
import { ReferenceDataSchema, findDanglingReferences } from './reference-schema.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    const children: unknown[] = Object.values(value);
    for (const child of children) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate raw JSON against the reference shape and return a frozen copy
 */
export function parseReferenceData(raw: unknown, source: string): ReferenceData {
  const parsed = ReferenceDataSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ReferenceDataError(
      source,
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const dangling = findDanglingReferences(parsed.data);
  if (dangling.length > 0) {
    throw new ReferenceDataError(source, dangling);
  }

  return deepFreeze(parsed.data);
}

/**
 * Reference Loader
 *
 * Owns one immutable copy of the reference tables.
 */
export class ReferenceLoader {
  private data: ReferenceData | null = null;
  private readonly dataPath: string;

  constructor(dataPath?: string) {
    this.dataPath =
      dataPath || REFERENCE_DATA_PATH || path.resolve(__dirname, '../../settings/reference-data.json');
  }

  /**
   * Load tables from JSON file
   */
  load(): ReferenceData {
    if (!fs.existsSync(this.dataPath)) {
      throw new ReferenceDataError(this.dataPath, ['file not found']);
    }

    const content = fs.readFileSync(this.dataPath, 'utf-8');
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ReferenceDataError(this.dataPath, [
        `not valid JSON (${error instanceof Error ? error.message : String(error)})`,
      ]);
    }

    this.data = parseReferenceData(raw, this.dataPath);
    EngineLogger.referenceLoaded(
      this.dataPath,
      Object.keys(this.data.consciousnessStates).length,
      this.data.transitions.length
    );

    return this.data;
  }

  /**
   * Get tables (loads if not loaded)
   */
  getData(): ReferenceData {
    if (!this.data) {
      return this.load();
    }
    return this.data;
  }

  getState(stateId: string): ConsciousnessState | undefined {
    return this.getData().consciousnessStates[stateId];
  }

  getTransitions(): readonly StateTransition[] {
    return this.getData().transitions;
  }

  getThreshold(parameter: string): SafetyThreshold | undefined {
    return this.getData().safetyThresholds[parameter];
  }

  getLimit(level: ExperienceLevel): NeuralLoadLimit {
    return this.getData().neuralLoadLimits[level];
  }

  getVersion(): string {
    return this.getData().version;
  }
}

// Singleton instance
let loaderInstance: ReferenceLoader | null = null;

/**
 * Get the singleton ReferenceLoader instance
 */
export function getReferenceLoader(): ReferenceLoader {
  if (!loaderInstance) {
    loaderInstance = new ReferenceLoader();
  }
  return loaderInstance;
}

/**
 * Create a new ReferenceLoader reading a custom file
 */
export function createReferenceLoader(dataPath: string): ReferenceLoader {
  return new ReferenceLoader(dataPath);
}

/**
 * Shorthand for the process-wide tables
 */
export function getReferenceData(): ReferenceData {
  return getReferenceLoader().getData();
}
