export * from './httpkit.types.js';
export * from './kv.types.js';
export * from './logger.types.js';
export * from './rpc.types.js';
