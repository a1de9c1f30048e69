export * from './expression-nodes.js';
export * from './expression-builders.js';
