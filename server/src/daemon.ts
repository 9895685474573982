/**
 * notiflux daemon
 *
 * Builds every owner, wires them together and brings up the three external
 * surfaces: the D-Bus service, the control socket and the state feed.
 *
 * Order matters on the way up:
 *   config -> theme defaults -> owners -> history restore -> DND tick
 *   -> bus name -> control socket -> state feed -> file watching
 * The bus name comes before the control socket so a second instance fails
 * before it can touch the running daemon's socket.
 * Anything started before a StartupError is torn down again.
 */

import {
  CLOSE_REASON_NAMES,
  THEME_ASSET_NAMES,
  getErrorMessage,
  toNotificationView,
} from '@notiflux/core';
import type { ConfigSnapshot, IconPayload, StateServerMessage, ThemeAssetName, ThemePaths } from '@notiflux/core';
import { createLoggerFactory, applyLogLevel } from './logging/logger-factory.js';
import type { Logger } from './logging/logger-factory.js';
import { DAEMON_VERSION, resolveServerConfig } from './config/server-config.js';
import type { ServerConfig } from './config/server-config.js';
import { ConfigStore } from './config/config-store.js';
import { ConfigWatcher } from './config/config-watcher.js';
import type { ConfigChange, DirectoryWatchFn } from './config/config-watcher.js';
import { NotificationServer } from './protocol/notification-server.js';
import type { ServerSignal } from './protocol/notification-server.js';
import { DbusService } from './protocol/dbus-service.js';
import type { NotificationBus } from './protocol/dbus-service.js';
import { HistoryPersistence } from './store/history-persistence.js';
import type { HistoryChange } from './store/history-store.js';
import { DndScheduler } from './dnd/dnd-scheduler.js';
import { CommandBudget } from './commands/command-budget.js';
import type { ProcessSpawner } from './commands/process-spawner.js';
import { WatcherResultStore } from './watchers/watcher-results.js';
import { WatcherManager } from './watchers/watcher-manager.js';
import { SoundPlayer, detectSoundBackend } from './sound/sound-player.js';
import type { SoundBackend } from './sound/sound-player.js';
import { IconCache } from './cache/icon-cache.js';
import type { IconDecoder } from './cache/icon-decoder.js';
import { ThemeAssetCache, ensureThemeFiles } from './cache/theme-cache.js';
import { PanelState } from './panel/panel-state.js';
import { ControlHandler } from './control/control-handler.js';
import { ControlServer } from './control/control-server.js';
import { StatePublisher } from './publish/state-publisher.js';
import { StateSocketServer } from './publish/state-socket-server.js';

// ============================================================
// Types
// ============================================================

export interface DaemonOptions extends Partial<ServerConfig> {
  version?: string;
  /** Replaces the session bus connection. */
  connectBus?: () => NotificationBus;
  spawner?: ProcessSpawner;
  /** Skip detection; null disables sound. */
  soundBackend?: SoundBackend | null;
  iconDecoder?: IconDecoder;
  watchDirectory?: DirectoryWatchFn;
}

export interface Daemon {
  server: NotificationServer;
  config: ConfigStore;
  dnd: DndScheduler;
  panel: PanelState;
  control: ControlHandler;
  /** Bound state feed port, or null when disabled or unavailable. */
  statePort: number | null;
  stop: () => Promise<void>;
}

function cacheOptions(snapshot: ConfigSnapshot, budgetBytes: number) {
  const { negativeTtlMs, maxBackoffMs } = snapshot.config.cache;
  return { budgetBytes, negativeTtlMs, maxBackoffMs };
}

function samePaths(a: ThemePaths, b: ThemePaths): boolean {
  return THEME_ASSET_NAMES.every((name) => a[name] === b[name]);
}

// ============================================================
// Startup
// ============================================================

/**
 * Start the daemon.
 * @throws StartupError when the config dir, bus name or control socket is unusable
 */
export async function startDaemon(options: DaemonOptions = {}): Promise<Daemon> {
  const settings: ServerConfig = { ...resolveServerConfig(), ...options };
  const loggerFor = createLoggerFactory(settings.silent);
  const logger = loggerFor('Daemon');
  const teardown: Array<() => Promise<void> | void> = [];

  const config = await ConfigStore.open(settings.configDir, { logger: loggerFor('Config') });
  const initial = config.current();
  applyLogLevel(initial.config.general.logLevel);
  logger.log(`Config v${initial.version} from ${initial.source === 'file' ? initial.configPath : 'defaults'}`);

  const written = await ensureThemeFiles(initial.themePaths, { logger: loggerFor('Theme') });
  if (written.length > 0) {
    logger.log(`Created default theme files: ${written.join(', ')}`);
  }

  // ----------------------------------------------------------
  // Owners
  // ----------------------------------------------------------

  let stateSocket: StateSocketServer | null = null;
  let dbus: DbusService | null = null;

  const publisher = new StatePublisher({
    sink: (events) => stateSocket?.broadcast(events),
    logger: loggerFor('Publish'),
  });

  const dnd = new DndScheduler({
    dnd: initial.config.dnd,
    manualDefault: initial.config.general.dndDefault,
    onChange: (status) => publisher.publish({ type: 'dnd_changed', status }),
    logger: loggerFor('DND'),
  });

  const commandBudget = new CommandBudget({
    maxConcurrent: initial.config.widgets.maxConcurrent,
    spawner: options.spawner,
    logger: loggerFor('Commands'),
  });
  const soundBudget = new CommandBudget({
    maxConcurrent: initial.config.sound.maxConcurrent,
    spawner: options.spawner,
    logger: loggerFor('Sound'),
  });
  const backend = options.soundBackend !== undefined ? options.soundBackend : await detectSoundBackend();
  const sound = new SoundPlayer({
    sound: initial.config.sound,
    configDir: initial.configDir,
    budget: soundBudget,
    backend,
    logger: loggerFor('Sound'),
  });

  const persistence = new HistoryPersistence({
    stateDir: settings.stateDir,
    readEntries: () => server.history.exportEntries(),
    logger: loggerFor('History'),
  });

  let persistHistory = initial.config.history.persist;
  let discarding: Promise<void> = Promise.resolve();
  const discardSavedHistory = (): void => {
    discarding = persistence.discard().catch((err: unknown) => {
      logger.warn(`Failed to remove saved history: ${getErrorMessage(err)}`);
    });
  };

  const onHistoryChange = (change: HistoryChange): void => {
    publisher.publish({ type: 'history_changed', kinds: [change.kind], ids: change.ids, counts: change.counts });
    if (persistHistory) persistence.scheduleSave();
  };

  const onSignal = (signal: ServerSignal): void => {
    dbus?.emit(signal);
    switch (signal.type) {
      case 'notification_added':
        publisher.publish({
          type: 'notification_added',
          notification: toNotificationView(signal.notification, { includeBody: true }),
        });
        break;
      case 'notification_closed':
        publisher.publish({ type: 'notification_closed', id: signal.id, reason: CLOSE_REASON_NAMES[signal.reason] });
        break;
      case 'action_invoked':
        publisher.publish(signal);
        break;
    }
  };

  const server: NotificationServer = new NotificationServer({
    config,
    dnd,
    version: options.version ?? DAEMON_VERSION,
    sound,
    onSignal,
    onHistoryChange,
    logger: loggerFor('Notify'),
  });

  if (persistHistory) {
    const restored = await persistence.load();
    if (restored.length > 0) {
      server.history.restore(restored);
      logger.log(`Restored ${restored.length} history entries`);
    }
  }

  const results = new WatcherResultStore();
  results.subscribe((updated) => publisher.publish({ type: 'watcher_updated', results: updated }));
  const watchers = new WatcherManager({
    budget: commandBudget,
    writer: results.createWriter(),
    widgets: initial.config.widgets,
    logger: loggerFor('Watchers'),
  });

  const panel = new PanelState({
    onVisibilityChange: (visible) => {
      watchers.setVisible(visible);
      if (visible) server.history.markAllSeen();
    },
    onRequest: (request) => publisher.publish({ type: 'panel_requested', request }),
    logger: loggerFor('Panel'),
  });

  const iconCache = new IconCache({
    ...cacheOptions(initial, initial.config.cache.iconBudgetBytes),
    decoder: options.iconDecoder,
    logger: loggerFor('Icons'),
  });
  const themeCache = new ThemeAssetCache({
    paths: initial.themePaths,
    ...cacheOptions(initial, initial.config.cache.themeBudgetBytes),
    logger: loggerFor('Theme'),
  });

  const control = new ControlHandler({
    server,
    dnd,
    panel,
    configVersion: () => config.current().version,
    logger: loggerFor('Control'),
  });

  // ----------------------------------------------------------
  // Reload
  // ----------------------------------------------------------

  const reloadTheme = (names: readonly ThemeAssetName[], log: Logger): void => {
    themeCache.invalidate(names);
    themeCache
      .loadAll()
      .then((bundle) => {
        for (const failure of bundle.errors) {
          log.warn(`Theme ${failure.name}: ${failure.error}`);
        }
        publisher.publish({ type: 'theme_reloaded', assets: [...names] });
      })
      .catch((err: unknown) => {
        log.error(`Theme reload failed: ${getErrorMessage(err)}`);
      });
  };

  config.subscribe((snapshot, previous) => {
    const { general, dnd: dndConfig, history, widgets, cache } = snapshot.config;
    applyLogLevel(general.logLevel);
    dnd.reconfigure(dndConfig);
    server.applyHistoryConfig(history);
    if (history.persist !== persistHistory) {
      persistHistory = history.persist;
      if (persistHistory) {
        persistence.scheduleSave();
      } else {
        discardSavedHistory();
      }
    }
    watchers.reconfigure(widgets);
    soundBudget.setMaxConcurrent(snapshot.config.sound.maxConcurrent);
    sound.reconfigure(snapshot.config.sound, snapshot.configDir);
    iconCache.configure(cacheOptions(snapshot, cache.iconBudgetBytes));
    themeCache.reconfigure(snapshot.themePaths, cacheOptions(snapshot, cache.themeBudgetBytes));
    configWatcher.setThemePaths(Object.values(snapshot.themePaths));
    if (!samePaths(snapshot.themePaths, previous.themePaths)) {
      reloadTheme(THEME_ASSET_NAMES, logger);
    }
    publisher.publish({ type: 'config_reloaded', version: snapshot.version });
  });
  config.onReloadFailed((error) => {
    publisher.publish({ type: 'config_reload_failed', error: error.message });
  });

  const configWatcher = new ConfigWatcher({
    configPath: initial.configPath,
    themePaths: Object.values(initial.themePaths),
    watchDirectory: options.watchDirectory,
    onChange: (change: ConfigChange) => {
      if (change.config) {
        config.reload().catch((err: unknown) => {
          logger.error(`Config reload failed: ${getErrorMessage(err)}`);
        });
      }
      const names = Array.from(new Set(change.themePaths.flatMap((path) => themeCache.assetsAt(path))));
      if (names.length > 0) {
        reloadTheme(names, logger);
      }
    },
    logger: loggerFor('Watch'),
  });

  // ----------------------------------------------------------
  // Surfaces
  // ----------------------------------------------------------

  const controlServer = new ControlServer({
    socketPath: settings.controlSocketPath,
    handleLine: (line) => control.handleLine(line),
    logger: loggerFor('Control'),
  });

  teardown.push(() => {
    configWatcher.stop();
    watchers.stop();
    dnd.stop();
    server.shutdown();
    soundBudget.stopStreams();
    publisher.stop();
  });
  // A second instance that fails to start must not overwrite the running daemon's file.
  let ready = false;
  teardown.push(async () => {
    await discarding;
    if (ready && persistHistory) await persistence.flush();
    persistence.cancel();
  });

  let statePort: number | null = null;
  try {
    dnd.start();

    if (settings.enableDbus) {
      const service = new DbusService({ server, connect: options.connectBus, logger: loggerFor('DBus') });
      await service.start();
      dbus = service;
      teardown.push(() => service.stop());
    }

    await controlServer.start();
    teardown.push(() => controlServer.stop());

    if (settings.statePort >= 0) {
      const socket = new StateSocketServer({
        port: settings.statePort,
        provider: {
          initialState: () => ({
            history: server.history.list().map((entry) => toNotificationView(entry, { includeBody: true })),
            counts: server.history.counts(),
            dnd: dnd.status(),
            watchers: results.snapshot(),
            panelVisible: panel.isVisible(),
            configVersion: config.current().version,
          }),
          history: (full) => server.history.list().map((entry) => toNotificationView(entry, { includeBody: full })),
          watchers: () => results.snapshot(),
          icon: async (id, size): Promise<IconPayload | null> => {
            const entry = server.history.get(id);
            if (!entry) return null;
            const icon = await iconCache.loadForNotification(entry.image, size);
            return icon
              ? { width: icon.width, height: icon.height, rgba: Buffer.from(icon.data).toString('base64') }
              : null;
          },
          theme: async (): Promise<Extract<StateServerMessage, { type: 'theme' }>> => {
            const bundle = await themeCache.loadAll();
            return {
              type: 'theme',
              assets: bundle.assets.map((asset) => ({ name: asset.name, css: asset.css })),
              errors: bundle.errors,
            };
          },
          setPanelVisible: (visible) => panel.setVisible(visible),
        },
        logger: loggerFor('State'),
      });
      try {
        statePort = await socket.start();
        stateSocket = socket;
        teardown.push(() => socket.stop());
      } catch (err) {
        // The feed is optional; the daemon keeps serving the bus without it.
        logger.warn(`State feed unavailable on port ${settings.statePort}: ${getErrorMessage(err)}`);
      }
    }

    configWatcher.start();
  } catch (err) {
    await runTeardown(teardown, logger);
    throw err;
  }
  ready = true;

  themeCache
    .loadAll()
    .then((bundle) => {
      for (const failure of bundle.errors) {
        logger.warn(`Theme ${failure.name}: ${failure.error}`);
      }
    })
    .catch((err: unknown) => {
      logger.error(`Theme load failed: ${getErrorMessage(err)}`);
    });
  logger.log('Daemon ready');

  let stopping: Promise<void> | null = null;
  return {
    server,
    config,
    dnd,
    panel,
    control,
    statePort,
    stop: () => {
      stopping ??= (async () => {
        logger.log('Shutting down...');
        await runTeardown(teardown, logger);
        logger.log('Shutdown complete');
      })();
      return stopping;
    },
  };
}

/** Run teardown steps newest first; one failing step does not stop the rest. */
async function runTeardown(steps: Array<() => Promise<void> | void>, logger: Logger): Promise<void> {
  for (const step of [...steps].reverse()) {
    try {
      await step();
    } catch (err) {
      logger.error(`Shutdown step failed: ${getErrorMessage(err)}`);
    }
  }
}
