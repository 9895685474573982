/**
 * @notiflux/core
 *
 * Notification model, config, rules and control-channel types shared by
 * the daemon and its clients.
 */

export * from './notifications/index.js';
export * from './config/index.js';
export * from './rules/index.js';
export * from './control/index.js';
export * from './events/index.js';
export * from './logging/index.js';
export * from './errors.js';
