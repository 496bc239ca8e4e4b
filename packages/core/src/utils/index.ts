export * from './id.js';
export * from './render.js';
