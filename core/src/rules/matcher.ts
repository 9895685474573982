/**
 * Text matchers for rule predicates.
 */

import { Minimatch } from 'minimatch';
import { ConfigError } from '../errors.js';
import { getErrorMessage } from '../logging/error-utils.js';
import type { TextMatcherConfig } from '../config/schema.js';
import type { TextMatcher } from './types.js';

/**
 * minimatch treats stray brackets and braces as literals, which hides
 * typos in user rules. Catch the common ones before compiling.
 */
export function globSyntaxError(pattern: string): string | null {
  let escaped = false;
  let inClass = false;
  let braceDepth = 0;
  for (const ch of pattern) {
    if (escaped) {
      escaped = false;
    } else if (ch === '\\') {
      escaped = true;
    } else if (inClass) {
      if (ch === ']') inClass = false;
    } else if (ch === '[') {
      inClass = true;
    } else if (ch === '{') {
      braceDepth++;
    } else if (ch === '}') {
      braceDepth--;
      if (braceDepth < 0) return 'unbalanced "}"';
    }
  }
  if (escaped) return 'trailing backslash';
  if (inClass) return 'unclosed "["';
  if (braceDepth > 0) return 'unclosed "{"';
  return null;
}

/**
 * Compile a glob with minimatch. `*` does not cross `/`, as in paths;
 * `**` does not get special treatment because values are not paths.
 */
function compileGlob(pattern: string, where: string): RegExp {
  const syntaxError = globSyntaxError(pattern);
  if (syntaxError) {
    throw new ConfigError(`${where}: invalid glob "${pattern}": ${syntaxError}`, [where]);
  }
  let regex: RegExp | false;
  try {
    regex = new Minimatch(pattern, {
      nocase: true,
      dot: true,
      nocomment: true,
      nonegate: true,
      noglobstar: true,
    }).makeRe();
  } catch (err) {
    throw new ConfigError(`${where}: invalid glob "${pattern}": ${getErrorMessage(err)}`, [where]);
  }
  if (regex === false) {
    throw new ConfigError(`${where}: invalid glob "${pattern}"`, [where]);
  }
  return regex;
}

/**
 * Build a matcher from its config form. Plain strings are case-insensitive
 * substring matches.
 */
export function compileTextMatcher(config: TextMatcherConfig, where: string): TextMatcher {
  if (typeof config === 'string') {
    const needle = config.toLowerCase();
    return { kind: 'contains', pattern: config, test: (value) => value.toLowerCase().includes(needle) };
  }
  if ('exact' in config) {
    const expected = config.exact;
    return { kind: 'exact', pattern: expected, test: (value) => value === expected };
  }
  if ('contains' in config) {
    const needle = config.contains.toLowerCase();
    return {
      kind: 'contains',
      pattern: config.contains,
      test: (value) => value.toLowerCase().includes(needle),
    };
  }
  const regex = compileGlob(config.glob, where);
  return { kind: 'glob', pattern: config.glob, test: (value) => regex.test(value) };
}
