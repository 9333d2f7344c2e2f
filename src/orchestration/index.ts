export * from './types.js';
export * from './startup-plan.js';
export * from './known-defects.js';
export * from './phase-sequencer.js';
