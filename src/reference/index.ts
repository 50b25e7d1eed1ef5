/**
 * Reference Data Module
 */

export { ReferenceLoader, getReferenceLoader, createReferenceLoader, getReferenceData, parseReferenceData } from './reference-loader.js';
export { ReferenceDataSchema, findDanglingReferences } from './reference-schema.js';
