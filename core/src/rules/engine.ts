/**
 * Rules engine
 *
 * Compiles config rules once per snapshot and evaluates them against
 * incoming notifications. Evaluation is pure and never throws; every
 * failure mode is caught at compile time.
 */

import { ConfigError } from '../errors.js';
import { parseUrgency } from '../notifications/hints.js';
import { Urgency } from '../notifications/types.js';
import type { Notification } from '../notifications/types.js';
import type { RuleActionConfig, RuleConfig, UrgencyValue } from '../config/schema.js';
import { compileTextMatcher } from './matcher.js';
import type {
  CompiledRule,
  DndRuleContext,
  RuleAction,
  RulePredicate,
  RuleMutations,
  Verdict,
} from './types.js';

// ============================================================
// Compilation
// ============================================================

function compileUrgency(value: UrgencyValue, where: string): Urgency {
  const urgency = parseUrgency(value);
  if (urgency === null) {
    throw new ConfigError(`${where}: unknown urgency ${String(value)}`, [where]);
  }
  return urgency;
}

function compileAction(action: RuleActionConfig, where: string): RuleAction {
  switch (action.type) {
    case 'force-urgency':
      return { type: 'force-urgency', urgency: compileUrgency(action.urgency, `${where}.urgency`) };
    default:
      return action;
  }
}

function compileRule(rule: RuleConfig, index: number): CompiledRule {
  const where = `rules.${index}`;
  const predicate: RulePredicate = {};
  const { app, summary, body, category, urgency } = rule.match;
  if (app !== undefined) predicate.app = compileTextMatcher(app, `${where}.match.app`);
  if (summary !== undefined) predicate.summary = compileTextMatcher(summary, `${where}.match.summary`);
  if (body !== undefined) predicate.body = compileTextMatcher(body, `${where}.match.body`);
  if (category !== undefined) {
    predicate.category = compileTextMatcher(category, `${where}.match.category`);
  }
  if (urgency !== undefined) predicate.urgency = compileUrgency(urgency, `${where}.match.urgency`);

  return {
    name: rule.name ?? `rule ${index + 1}`,
    predicate,
    actions: rule.actions.map((action, i) => compileAction(action, `${where}.actions.${i}`)),
  };
}

/**
 * Compile rules in declaration order.
 * @throws ConfigError for malformed patterns or urgencies
 */
export function compileRules(rules: readonly RuleConfig[]): CompiledRule[] {
  return rules.map((rule, index) => compileRule(rule, index));
}

// ============================================================
// Evaluation
// ============================================================

/** The fields predicates look at, tracked as rules rewrite them. */
interface WorkingState {
  appName: string;
  summary: string;
  body: string;
  category: string | null;
  urgency: Urgency;
}

function predicateMatches(predicate: RulePredicate, state: WorkingState): boolean {
  if (predicate.app && !predicate.app.test(state.appName)) return false;
  if (predicate.summary && !predicate.summary.test(state.summary)) return false;
  if (predicate.body && !predicate.body.test(state.body)) return false;
  if (predicate.category && (state.category === null || !predicate.category.test(state.category))) {
    return false;
  }
  if (predicate.urgency !== undefined && predicate.urgency !== state.urgency) return false;
  return true;
}

/**
 * Run the rules against a notification in declaration order.
 *
 * Later rules see the fields as rewritten by earlier ones. `suppress`
 * stops evaluation; every other action accumulates.
 */
export function evaluateRules(
  notification: Notification,
  rules: readonly CompiledRule[],
  dnd: DndRuleContext,
): Verdict {
  const state: WorkingState = {
    appName: notification.appName,
    summary: notification.summary,
    body: notification.body,
    category: notification.category,
    urgency: notification.urgency,
  };
  const mutations: RuleMutations = {};
  const matched: string[] = [];
  let suppress = false;
  let dndExempt = false;
  let suppressSound = false;
  let suppressPopup = false;

  outer: for (const rule of rules) {
    if (!predicateMatches(rule.predicate, state)) continue;
    matched.push(rule.name);

    for (const action of rule.actions) {
      switch (action.type) {
        case 'suppress':
          suppress = true;
          break outer;
        case 'force-urgency':
          state.urgency = action.urgency;
          mutations.urgency = action.urgency;
          break;
        case 'mute-sound':
          suppressSound = true;
          break;
        case 'dnd-exempt':
          dndExempt = true;
          break;
        case 'no-popup':
          suppressPopup = true;
          break;
        case 'rewrite':
          switch (action.field) {
            case 'app':
              state.appName = action.value;
              mutations.appName = action.value;
              break;
            case 'summary':
              state.summary = action.value;
              mutations.summary = action.value;
              break;
            case 'body':
              state.body = action.value;
              mutations.body = action.value;
              break;
            case 'category':
              state.category = action.value;
              mutations.category = action.value;
              break;
          }
          break;
        case 'set-timeout':
          mutations.expireTimeout = action.ms;
          break;
        case 'set-resident':
          mutations.resident = action.value;
          break;
        case 'set-transient':
          mutations.transient = action.value;
          break;
      }
    }
  }

  if (dnd.criticalBypass && state.urgency === Urgency.Critical) {
    dndExempt = true;
  }

  return {
    suppress,
    mutations,
    dndExempt,
    dndBlocked: dnd.active && !dndExempt,
    suppressSound,
    suppressPopup,
    matched,
  };
}

/**
 * Return a copy of the notification with the verdict applied.
 */
export function applyVerdict(notification: Notification, verdict: Verdict): Notification {
  const { mutations } = verdict;
  return {
    ...notification,
    appName: mutations.appName ?? notification.appName,
    summary: mutations.summary ?? notification.summary,
    body: mutations.body ?? notification.body,
    category: mutations.category ?? notification.category,
    urgency: mutations.urgency ?? notification.urgency,
    expireTimeout: mutations.expireTimeout ?? notification.expireTimeout,
    resident: mutations.resident ?? notification.resident,
    transient: mutations.transient ?? notification.transient,
    suppressSound: notification.suppressSound || verdict.suppressSound,
    suppressPopup: notification.suppressPopup || verdict.suppressPopup,
    dndExempt: notification.dndExempt || verdict.dndExempt,
  };
}
