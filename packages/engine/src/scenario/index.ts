export * from './directives.js';
export * from './builder.js';
export * from './serialize.js';
export * from './parse.js';
