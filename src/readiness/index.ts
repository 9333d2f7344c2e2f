export * from './poller.js';
export * from './prober.js';
