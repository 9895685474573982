/**
 * @notiflux/server
 */

export { startDaemon } from './daemon.js';
export type { Daemon, DaemonOptions } from './daemon.js';
export { runDaemon, EXIT_OK, EXIT_STARTUP_FAILED } from './main.js';
export { resolveServerConfig, DEFAULT_STATE_PORT, DAEMON_VERSION } from './config/server-config.js';
export type { ServerConfig } from './config/server-config.js';
export { NotificationServer } from './protocol/notification-server.js';
export type { ServerSignal, ServerInformation } from './protocol/notification-server.js';
export { NOTIFICATIONS_BUS_NAME, NOTIFICATIONS_OBJECT_PATH } from './protocol/dbus-service.js';
