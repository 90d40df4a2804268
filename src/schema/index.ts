// Schema exports
export * from './grid.js';
