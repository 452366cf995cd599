export * from './types.js';
export * from './protocol.js';
