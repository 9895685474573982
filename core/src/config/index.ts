/**
 * @notiflux/core/config — barrel export
 */

export { configSchema, ruleActionSchema, MAX_DELAY_MS, WEEKDAYS } from './schema.js';
export type {
  NotifluxConfig,
  NotifluxConfigInput,
  GeneralConfig,
  PopupsConfig,
  HistoryConfig,
  DndConfig,
  DndWindowConfig,
  RuleConfig,
  RuleMatchConfig,
  RuleActionConfig,
  TextMatcherConfig,
  UrgencyValue,
  WidgetsConfig,
  WatcherConfig,
  WatcherParser,
  SoundConfig,
  ThemeConfig,
  CacheConfig,
  Weekday,
} from './schema.js';
export {
  APP_DIR_NAME,
  CONFIG_FILE_NAME,
  THEME_ASSET_NAMES,
  resolveConfigDir,
  resolveStateDir,
  resolveRuntimeDir,
  resolveControlSocketPath,
  configFilePath,
  resolveThemePaths,
} from './paths.js';
export type { ThemeAssetName, ThemePaths } from './paths.js';
export {
  getDefaultConfig,
  parseConfig,
  readConfigFile,
  buildConfigSnapshot,
  loadConfigSnapshot,
} from './load.js';
export type { ConfigSnapshot, ConfigSource } from './load.js';
