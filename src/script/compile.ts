import { GENERIC_MEMORY_RULES } from './builtin.js';
import { wholeWord } from './schema.js';
import type { DecompositionRule, RuleSet, TransformPair } from './types.js';

export interface CompiledDecomposition {
  source: string;
  regex: RegExp;
  reassembly: readonly string[];
}

export interface CompiledKeyword {
  word: string;
  rank: number;
  decomposition: readonly CompiledDecomposition[];
}

export interface CompiledLink {
  word: string;
  regex: RegExp;
  target: CompiledKeyword;
}

export interface CompiledTransform {
  regex: RegExp;
  replacement: string;
}

/**
 * Read-only, match-ready form of a rule set. Safe to share between engines.
 */
export interface CompiledRuleSet {
  /** Keywords by descending rank; equal ranks keep declaration order */
  ranked: readonly CompiledKeyword[];
  keywords: ReadonlyMap<string, CompiledKeyword>;
  /** Links in declaration order, only those whose target exists */
  links: readonly CompiledLink[];
  preTransforms: readonly CompiledTransform[];
  postTransforms: readonly CompiledTransform[];
  /** Variant (and canonical) -> canonical */
  synonyms: ReadonlyMap<string, string>;
  /** Keyword and link words, never rewritten by synonym normalization */
  preserved: ReadonlySet<string>;
  memory: readonly CompiledDecomposition[];
  defaultResponses: readonly string[];
  initialPrompts: readonly string[];
  quitWords: readonly string[];
  /** Patterns that failed to compile and were left out */
  issues: readonly string[];
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function tryRegExp(source: string, flags: string, issues: string[]): RegExp | null {
  try {
    return new RegExp(source, flags);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    issues.push(`Skipped pattern ${JSON.stringify(source)}: ${reason}`);
    return null;
  }
}

function compileDecomposition(rules: readonly DecompositionRule[], issues: string[]): CompiledDecomposition[] {
  const compiled: CompiledDecomposition[] = [];
  for (const rule of rules) {
    const regex = tryRegExp(rule.pattern, 'i', issues);
    if (regex && rule.reassembly.length > 0) {
      compiled.push(Object.freeze({
        source: rule.pattern,
        regex,
        reassembly: Object.freeze([...rule.reassembly]),
      }));
    }
  }
  return compiled;
}

function compileTransforms(
  pairs: readonly TransformPair[],
  issues: string[],
  wrap: (pattern: string) => string = (pattern) => pattern
): CompiledTransform[] {
  const compiled: CompiledTransform[] = [];
  for (const [pattern, replacement] of pairs) {
    const regex = tryRegExp(wrap(pattern), 'gi', issues);
    if (regex) {
      compiled.push(Object.freeze({ regex, replacement }));
    }
  }
  return compiled;
}

export function compileRuleSet(ruleSet: RuleSet): CompiledRuleSet {
  const issues: string[] = [];

  const keywords = new Map<string, CompiledKeyword>();
  const declared: CompiledKeyword[] = [];
  for (const rule of ruleSet.keywords) {
    const word = rule.word.trim().toLowerCase();
    // A repeated keyword never wins over its first declaration
    if (!word || keywords.has(word)) continue;

    const keyword: CompiledKeyword = Object.freeze({
      word,
      rank: rule.rank,
      decomposition: Object.freeze(compileDecomposition(rule.decomposition, issues)),
    });
    keywords.set(word, keyword);
    declared.push(keyword);
  }

  // Array.prototype.sort is stable, so ties stay in declaration order
  const ranked = [...declared].sort((a, b) => b.rank - a.rank);

  const links: CompiledLink[] = [];
  for (const [rawWord, rawTarget] of Object.entries(ruleSet.links)) {
    const word = rawWord.trim().toLowerCase();
    const target = keywords.get(rawTarget.trim().toLowerCase());
    if (!word || !target) continue;
    links.push(Object.freeze({
      word,
      regex: new RegExp(`\\b${escapeRegExp(word)}\\b`, 'i'),
      target,
    }));
  }

  const synonyms = new Map<string, string>();
  for (const [rawCanonical, variants] of Object.entries(ruleSet.synonyms)) {
    const canonical = rawCanonical.trim().toLowerCase();
    for (const word of [canonical, ...variants.map((v) => v.trim().toLowerCase())]) {
      if (word && !synonyms.has(word)) {
        synonyms.set(word, canonical);
      }
    }
  }

  let memory = compileDecomposition(ruleSet.memory.decomposition, issues);
  if (memory.length === 0) {
    memory = compileDecomposition(GENERIC_MEMORY_RULES, issues);
  }

  const preserved = new Set<string>([...keywords.keys(), ...links.map((link) => link.word)]);

  return Object.freeze({
    ranked: Object.freeze(ranked),
    keywords,
    links: Object.freeze(links),
    preTransforms: Object.freeze(compileTransforms(ruleSet.preTransforms, issues)),
    postTransforms: Object.freeze(compileTransforms(ruleSet.postTransforms, issues, wholeWord)),
    synonyms,
    preserved,
    memory: Object.freeze(memory),
    defaultResponses: Object.freeze(ruleSet.defaultResponses.filter((r) => r.trim().length > 0)),
    initialPrompts: Object.freeze(ruleSet.initialPrompts.filter((p) => p.trim().length > 0)),
    quitWords: Object.freeze(ruleSet.quitWords.map((w) => w.trim().toLowerCase())),
    issues: Object.freeze(issues),
  });
}
