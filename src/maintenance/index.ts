export * from './management-commands.js';
export * from './migration-repair.js';
export * from './superuser.js';
export * from './cleanup-executor.js';
export * from './verification.js';
export * from './diagnostics.js';
export * from './nautobot-init.js';
