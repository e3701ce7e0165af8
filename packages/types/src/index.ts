export * from './status.schema.js';
export * from './request.schema.js';
export * from './config.schema.js';
export * from './player.schema.js';
