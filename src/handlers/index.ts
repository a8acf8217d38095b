export * from './markdown-handlers.js';
export * from './collection-handlers.js';
export * from './svg-handlers.js';
