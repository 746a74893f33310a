/**
 * @roadvoid/pipeline
 * Configuration loading, scenario and manifest persistence, sequence generation
 */

export * from './config/index.js';
export * from './writer/index.js';
export * from './manifest/index.js';
export * from './generator/index.js';
