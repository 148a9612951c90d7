export * from './math/index.js';
export * from './pool/index.js';
export * from './errors/index.js';
