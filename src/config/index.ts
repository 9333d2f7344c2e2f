export * from './types.js';
export * from './defaults.js';
export * from './validator.js';
export * from './loader.js';
export * from './naming.js';
export * from './settings.js';
