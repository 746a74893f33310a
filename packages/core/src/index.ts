/**
 * @roadvoid/core
 * Configuration schema, coordinate frames, units and road cross-sections
 */

export * from './schema/index.js';
export * from './coords/index.js';
export * from './units/index.js';
export * from './road/index.js';
