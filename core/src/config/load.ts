/**
 * Config loading and snapshots.
 *
 * A snapshot bundles everything derived from one read of the config file:
 * the validated config, compiled rules and resolved theme paths. Snapshots
 * are deeply frozen, so a reader can hold one for as long as it likes while
 * a reload installs the next.
 */

import { readFile } from 'node:fs/promises';
import { ConfigError } from '../errors.js';
import { getErrorMessage, isNotFoundError } from '../logging/error-utils.js';
import { compileRules } from '../rules/engine.js';
import type { CompiledRule } from '../rules/types.js';
import { configFilePath, resolveThemePaths } from './paths.js';
import type { ThemePaths } from './paths.js';
import { configSchema } from './schema.js';
import type { NotifluxConfig } from './schema.js';

export type ConfigSource = 'file' | 'defaults';

export interface ConfigSnapshot {
  readonly version: number;
  readonly loadedAt: number;
  readonly source: ConfigSource;
  readonly configDir: string;
  readonly configPath: string;
  readonly config: NotifluxConfig;
  readonly rules: readonly CompiledRule[];
  readonly themePaths: ThemePaths;
}

export function getDefaultConfig(): NotifluxConfig {
  return configSchema.parse({});
}

/**
 * Validate an already-parsed JSON value.
 * @throws ConfigError listing every invalid field
 */
export function parseConfig(raw: unknown): NotifluxConfig {
  const result = configSchema.safeParse(raw);
  if (result.success) {
    return result.data;
  }
  const issues = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
  throw new ConfigError(`invalid config: ${issues.join('; ')}`, issues);
}

/**
 * Read and validate the config file. A missing file yields the defaults.
 */
export async function readConfigFile(
  path: string,
): Promise<{ config: NotifluxConfig; source: ConfigSource }> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    if (isNotFoundError(err)) {
      return { config: getDefaultConfig(), source: 'defaults' };
    }
    throw new ConfigError(`cannot read ${path}: ${getErrorMessage(err)}`, [], { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`${path} is not valid JSON: ${getErrorMessage(err)}`, [], { cause: err });
  }
  return { config: parseConfig(raw), source: 'file' };
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Build an immutable snapshot. Rules are compiled here, so a bad pattern
 * fails the whole load.
 * @throws ConfigError
 */
export function buildConfigSnapshot(options: {
  config: NotifluxConfig;
  source: ConfigSource;
  configDir: string;
  version: number;
  now?: number;
}): ConfigSnapshot {
  const { config, source, configDir, version, now = Date.now() } = options;
  const snapshot: ConfigSnapshot = {
    version,
    loadedAt: now,
    source,
    configDir,
    configPath: configFilePath(configDir),
    config,
    rules: compileRules(config.rules),
    themePaths: resolveThemePaths(config.theme, configDir),
  };
  return deepFreeze(snapshot);
}

/**
 * Read the config file in `configDir` and build a snapshot from it.
 * @throws ConfigError
 */
export async function loadConfigSnapshot(configDir: string, version: number): Promise<ConfigSnapshot> {
  const { config, source } = await readConfigFile(configFilePath(configDir));
  return buildConfigSnapshot({ config, source, configDir, version });
}
