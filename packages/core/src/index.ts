/**
 * @kubetun/core - SSH tunnel and kubeconfig management for kubetun
 */

export * from './config/index.js';
export * from './lib/ids.js';
export * from './profiles/index.js';
export * from './store/index.js';
export * from './tunnels/index.js';
export * from './utils/errors.js';
export * from './utils/logger.js';
