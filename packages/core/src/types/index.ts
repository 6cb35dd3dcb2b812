export * from './record.js';
export * from './schema.js';
export * from './version.js';
