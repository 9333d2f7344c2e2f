// Library entry point: everything the CLI is built from
export * from './types/index.js';
export * from './errors/index.js';
export * from './config/index.js';
export * from './output/reporter.js';
export * from './output/prompt.js';
export * from './runtime/index.js';
export * from './readiness/index.js';
export * from './orchestration/index.js';
export * from './maintenance/index.js';

export { startStack as start } from './orchestration/phase-sequencer.js';
