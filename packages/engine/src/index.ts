/**
 * @roadvoid/engine
 * Void sampling, evolution, scene composition and scenario text
 */

export * from './api/index.js';
export * from './sampler/index.js';
export * from './evolution/index.js';
export * from './scene/index.js';
export * from './scenario/index.js';
