/**
 * kubetun Configuration Module
 */

export * from './config-manager.js';
export * from './constants.js';
export * from './types.js';
