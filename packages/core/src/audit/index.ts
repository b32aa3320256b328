export * from './masking.js';
export * from './pipeline.js';
export * from './spill.js';
export * from './database-sink.js';
