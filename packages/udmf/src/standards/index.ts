export * from './standard.js';
export * from './zdoom.js';
