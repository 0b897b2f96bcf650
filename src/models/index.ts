/**
 * Model exports
 */

export * from './confidence.js';
export * from './document.js';
export * from './extraction.js';
export * from './verification.js';
export * from './decision.js';
export * from './entities.js';
