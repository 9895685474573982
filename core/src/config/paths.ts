/**
 * Config, state and runtime locations.
 *
 * Follows the XDG base directory layout:
 *   $XDG_CONFIG_HOME/notiflux  (or ~/.config/notiflux)
 *   $XDG_STATE_HOME/notiflux   (or ~/.local/state/notiflux)
 *   $XDG_RUNTIME_DIR/notiflux  (or the OS temp dir)
 */

import { homedir, tmpdir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';
import type { ThemeConfig } from './schema.js';

export const APP_DIR_NAME = 'notiflux';
export const CONFIG_FILE_NAME = 'config.json';

function xdgDir(env: NodeJS.ProcessEnv, variable: string, fallback: string[]): string {
  const value = env[variable];
  if (value && isAbsolute(value)) {
    return join(value, APP_DIR_NAME);
  }
  return join(env.HOME || homedir(), ...fallback, APP_DIR_NAME);
}

export function resolveConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return xdgDir(env, 'XDG_CONFIG_HOME', ['.config']);
}

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  return xdgDir(env, 'XDG_STATE_HOME', ['.local', 'state']);
}

export function resolveRuntimeDir(env: NodeJS.ProcessEnv = process.env): string {
  const runtime = env.XDG_RUNTIME_DIR;
  if (runtime && isAbsolute(runtime)) {
    return join(runtime, APP_DIR_NAME);
  }
  return join(tmpdir(), `${APP_DIR_NAME}-${process.getuid?.() ?? 'user'}`);
}

/** Control socket path; NOTIFLUX_CONTROL_SOCKET overrides the default. */
export function resolveControlSocketPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.NOTIFLUX_CONTROL_SOCKET || join(resolveRuntimeDir(env), 'control.sock');
}

export function configFilePath(configDir: string): string {
  return join(configDir, CONFIG_FILE_NAME);
}

export type ThemeAssetName = 'base' | 'popup' | 'panel' | 'widgets';

export const THEME_ASSET_NAMES: readonly ThemeAssetName[] = ['base', 'popup', 'panel', 'widgets'];

export type ThemePaths = Record<ThemeAssetName, string>;

/** Theme files are resolved relative to the config directory. */
export function resolveThemePaths(theme: ThemeConfig, configDir: string): ThemePaths {
  return {
    base: resolve(configDir, theme.baseCss),
    popup: resolve(configDir, theme.popupCss),
    panel: resolve(configDir, theme.panelCss),
    widgets: resolve(configDir, theme.widgetsCss),
  };
}
