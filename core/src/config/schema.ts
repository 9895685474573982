/**
 * Configuration schema
 *
 * `config.json` in the config directory, validated with zod. Every section
 * and field has a default, so `{}` (or a missing file) is a valid config.
 */

import { z } from 'zod';

// ============================================================
// Shared pieces
// ============================================================

const urgencyValueSchema = z.union([
  z.enum(['low', 'normal', 'critical']),
  z.literal(0),
  z.literal(1),
  z.literal(2),
]);

const clockTimeSchema = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:MM (24h)');

/** setTimeout's upper bound; every delay in the config must fit it. */
export const MAX_DELAY_MS = 2_147_483_647;

export const WEEKDAYS = ['sun', 'mon', 'tue', 'wed', 'thu', 'fri', 'sat'] as const;
export type Weekday = (typeof WEEKDAYS)[number];

// ============================================================
// Sections
// ============================================================

const generalConfigSchema = z
  .object({
    logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    /** Start the daemon with do-not-disturb switched on. */
    dndDefault: z.boolean().default(false),
  })
  .strict();

const popupsConfigSchema = z
  .object({
    defaultTimeoutMs: z.number().int().min(0).max(MAX_DELAY_MS).default(5000),
    /** null = critical notifications stay until closed. */
    criticalTimeoutMs: z.number().int().min(0).max(MAX_DELAY_MS).nullable().default(null),
  })
  .strict();

const historyConfigSchema = z
  .object({
    maxEntries: z.number().int().min(1).max(10_000).default(200),
    transientToHistory: z.boolean().default(false),
    dedupWindowMs: z.number().int().min(0).default(2000),
    persist: z.boolean().default(false),
  })
  .strict();

const dndWindowSchema = z
  .object({
    start: clockTimeSchema,
    end: clockTimeSchema,
    days: z.array(z.enum(WEEKDAYS)).min(1).default([...WEEKDAYS]),
  })
  .strict();

const dndConfigSchema = z
  .object({
    windows: z.array(dndWindowSchema).default([]),
    criticalBypass: z.boolean().default(true),
    tickIntervalMs: z.number().int().min(1000).max(MAX_DELAY_MS).default(30_000),
  })
  .strict();

const textMatcherSchema = z.union([
  z.string(),
  z.object({ exact: z.string() }).strict(),
  z.object({ contains: z.string() }).strict(),
  z.object({ glob: z.string().min(1) }).strict(),
]);

const ruleMatchSchema = z
  .object({
    app: textMatcherSchema.optional(),
    summary: textMatcherSchema.optional(),
    body: textMatcherSchema.optional(),
    category: textMatcherSchema.optional(),
    urgency: urgencyValueSchema.optional(),
  })
  .strict();

export const ruleActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('suppress') }).strict(),
  z.object({ type: z.literal('force-urgency'), urgency: urgencyValueSchema }).strict(),
  z.object({ type: z.literal('mute-sound') }).strict(),
  z.object({ type: z.literal('dnd-exempt') }).strict(),
  z.object({ type: z.literal('no-popup') }).strict(),
  z
    .object({
      type: z.literal('rewrite'),
      field: z.enum(['app', 'summary', 'body', 'category']),
      value: z.string(),
    })
    .strict(),
  z.object({ type: z.literal('set-timeout'), ms: z.number().int().min(-1).max(MAX_DELAY_MS) }).strict(),
  z.object({ type: z.literal('set-resident'), value: z.boolean() }).strict(),
  z.object({ type: z.literal('set-transient'), value: z.boolean() }).strict(),
]);

const ruleSchema = z
  .object({
    name: z.string().optional(),
    match: ruleMatchSchema.default({}),
    actions: z.array(ruleActionSchema).min(1),
  })
  .strict();

const watcherParserSchema = z.enum(['text', 'toggle', 'percent', 'json']);

const watcherConfigSchema = z
  .object({
    id: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/i, 'ids are letters, digits, - and _'),
    command: z.string().min(1),
    /** Long-running command whose output lines signal a change. */
    watchCommand: z.string().min(1).optional(),
    parser: watcherParserSchema.default('text'),
    intervalMs: z.number().int().min(250).max(MAX_DELAY_MS).optional(),
    timeoutMs: z.number().int().min(50).max(10_000).optional(),
    enabled: z.boolean().default(true),
  })
  .strict();

const widgetsConfigSchema = z
  .object({
    refreshIntervalMs: z.number().int().min(250).max(MAX_DELAY_MS).default(1000),
    refreshIntervalSlowMs: z.number().int().min(250).max(MAX_DELAY_MS).default(3000),
    maxConcurrent: z.number().int().min(1).max(8).default(2),
    builtins: z
      .object({
        network: z.boolean().default(true),
        bluetooth: z.boolean().default(true),
        audio: z.boolean().default(true),
        radioKill: z.boolean().default(true),
      })
      .strict()
      .default({}),
    watchers: z.array(watcherConfigSchema).default([]),
  })
  .strict();

const soundConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    defaultName: z.string().nullable().default('message-new-instant'),
    defaultFile: z.string().nullable().default(null),
    minIntervalMs: z.number().int().min(0).default(150),
    maxConcurrent: z.number().int().min(1).max(4).default(2),
    timeoutMs: z.number().int().min(100).default(3000),
  })
  .strict();

const themeConfigSchema = z
  .object({
    baseCss: z.string().min(1).default('base.css'),
    popupCss: z.string().min(1).default('popup.css'),
    panelCss: z.string().min(1).default('panel.css'),
    widgetsCss: z.string().min(1).default('widgets.css'),
  })
  .strict();

const cacheConfigSchema = z
  .object({
    iconBudgetBytes: z.number().int().min(0).default(8 * 1024 * 1024),
    themeBudgetBytes: z.number().int().min(0).default(512 * 1024),
    negativeTtlMs: z.number().int().min(0).max(MAX_DELAY_MS).default(1000),
    maxBackoffMs: z.number().int().min(0).max(MAX_DELAY_MS).default(60_000),
  })
  .strict();

// ============================================================
// Complete config
// ============================================================

export const configSchema = z
  .object({
    general: generalConfigSchema.default({}),
    popups: popupsConfigSchema.default({}),
    history: historyConfigSchema.default({}),
    dnd: dndConfigSchema.default({}),
    rules: z.array(ruleSchema).default([]),
    widgets: widgetsConfigSchema.default({}),
    sound: soundConfigSchema.default({}),
    theme: themeConfigSchema.default({}),
    cache: cacheConfigSchema.default({}),
  })
  .strict();

export type NotifluxConfig = z.infer<typeof configSchema>;
export type NotifluxConfigInput = z.input<typeof configSchema>;
export type GeneralConfig = NotifluxConfig['general'];
export type PopupsConfig = NotifluxConfig['popups'];
export type HistoryConfig = NotifluxConfig['history'];
export type DndConfig = NotifluxConfig['dnd'];
export type DndWindowConfig = z.infer<typeof dndWindowSchema>;
export type RuleConfig = z.infer<typeof ruleSchema>;
export type RuleMatchConfig = z.infer<typeof ruleMatchSchema>;
export type RuleActionConfig = z.infer<typeof ruleActionSchema>;
export type TextMatcherConfig = z.infer<typeof textMatcherSchema>;
export type UrgencyValue = z.infer<typeof urgencyValueSchema>;
export type WidgetsConfig = NotifluxConfig['widgets'];
export type WatcherConfig = z.infer<typeof watcherConfigSchema>;
export type WatcherParser = z.infer<typeof watcherParserSchema>;
export type SoundConfig = NotifluxConfig['sound'];
export type ThemeConfig = NotifluxConfig['theme'];
export type CacheConfig = NotifluxConfig['cache'];
