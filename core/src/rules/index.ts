/**
 * @notiflux/core/rules — barrel export
 */

export type {
  TextMatcher,
  TextMatcherKind,
  RulePredicate,
  RewriteField,
  RuleAction,
  CompiledRule,
  DndRuleContext,
  RuleMutations,
  Verdict,
} from './types.js';
export { compileTextMatcher, globSyntaxError } from './matcher.js';
export { compileRules, evaluateRules, applyVerdict } from './engine.js';
