import type { CompiledKeyword, CompiledRuleSet } from '../script/compile.js';

export interface KeywordResolution {
  rule: CompiledKeyword;
  via: 'link' | 'rank';
  /** The word found in the text: the link word, or the keyword itself */
  trigger: string;
}

/**
 * Pick the keyword whose rules answer this text.
 *
 * Link words are checked first and bypass ranking; the first declared link
 * present in the text wins. Otherwise the highest-ranked keyword contained in
 * the text wins, earliest declared on equal rank.
 */
export function resolveKeyword(text: string, rules: CompiledRuleSet): KeywordResolution | null {
  for (const link of rules.links) {
    if (link.regex.test(text)) {
      return { rule: link.target, via: 'link', trigger: link.word };
    }
  }

  for (const rule of rules.ranked) {
    if (text.includes(rule.word)) {
      return { rule, via: 'rank', trigger: rule.word };
    }
  }

  return null;
}
