export * from './types.js';
export * from './tokenize.js';
export * from './rank.js';
export * from './random.js';
export * from './errors.js';
export * from './config.js';
export * from './records.js';
export * from './aggregate.js';
export * from './pipeline.js';
export * as log from './logger.js';
