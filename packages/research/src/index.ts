export * from './types/research.types.js';
export * from './types/gateway.types.js';
export * from './errors.js';
export * from './services/result-aggregator.service.js';
export * from './services/keyword-expander.service.js';
export * from './services/progress-channel.service.js';
export * from './services/progress-emitter.service.js';
export * from './services/prompt-builder.service.js';
export * from './services/session-driver.service.js';
export * from './research.js';
