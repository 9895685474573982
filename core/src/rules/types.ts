/**
 * Rule types after compilation.
 *
 * Config rules are compiled once per config snapshot: urgencies become
 * numbers and glob patterns become regular expressions.
 */

import type { Urgency } from '../notifications/types.js';

export type TextMatcherKind = 'exact' | 'contains' | 'glob';

export interface TextMatcher {
  kind: TextMatcherKind;
  pattern: string;
  test: (value: string) => boolean;
}

export interface RulePredicate {
  app?: TextMatcher;
  summary?: TextMatcher;
  body?: TextMatcher;
  category?: TextMatcher;
  urgency?: Urgency;
}

export type RewriteField = 'app' | 'summary' | 'body' | 'category';

export type RuleAction =
  | { type: 'suppress' }
  | { type: 'force-urgency'; urgency: Urgency }
  | { type: 'mute-sound' }
  | { type: 'dnd-exempt' }
  | { type: 'no-popup' }
  | { type: 'rewrite'; field: RewriteField; value: string }
  | { type: 'set-timeout'; ms: number }
  | { type: 'set-resident'; value: boolean }
  | { type: 'set-transient'; value: boolean };

export interface CompiledRule {
  name: string;
  predicate: RulePredicate;
  actions: readonly RuleAction[];
}

/** DND facts the engine needs. */
export interface DndRuleContext {
  active: boolean;
  criticalBypass: boolean;
}

/** Field changes accumulated from matching rules. */
export interface RuleMutations {
  appName?: string;
  summary?: string;
  body?: string;
  category?: string;
  urgency?: Urgency;
  expireTimeout?: number;
  resident?: boolean;
  transient?: boolean;
}

export interface Verdict {
  suppress: boolean;
  mutations: RuleMutations;
  dndExempt: boolean;
  /** DND is active and nothing exempts this notification. */
  dndBlocked: boolean;
  suppressSound: boolean;
  suppressPopup: boolean;
  /** Names of the rules that matched, in order. */
  matched: string[];
}
