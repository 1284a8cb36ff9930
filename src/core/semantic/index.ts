export * from './types.js';
export * from './tokenize.js';
export * from './concepts.js';
export * from './domain-tagger.js';
export * from './context-scorer.js';
export * from './workflow-detector.js';
export * from './semantic-index.js';
export * from './index-records.js';
export * from './query-engine.js';
