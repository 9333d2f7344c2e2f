export * from './types.js';
export * from './command-runner.js';
export * from './preflight.js';
export * from './status-parser.js';
export * from './compose-client.js';
export * from './docker-engine.js';
