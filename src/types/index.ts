export * from './track.js';
export * from './adapters.js';
export * from './config.js';
export * from './errors.js';
