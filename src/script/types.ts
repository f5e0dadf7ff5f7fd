// A Rule Set is the whole configuration driving one engine. It is plain data:
// the loader produces it, compileRuleSet() turns it into matchers.

export interface DecompositionRule {
  /** Regular expression source with capture groups, matched unanchored and case-insensitively */
  pattern: string;
  /** Reply templates using positional placeholders {0}, {1}, ... */
  reassembly: string[];
}

export interface KeywordRule {
  word: string;
  rank: number;           // Higher wins
  decomposition: DecompositionRule[];
}

export type TransformPair = [pattern: string, replacement: string];

export interface MemoryRule {
  decomposition: DecompositionRule[];
}

export interface RuleSet {
  keywords: KeywordRule[];
  links: Record<string, string>;       // Link word -> keyword whose rules it borrows
  preTransforms: TransformPair[];
  postTransforms: TransformPair[];
  synonyms: Record<string, string[]>;  // Canonical -> variants
  memory: MemoryRule;
  defaultResponses: string[];
  initialPrompts: string[];
  quitWords: string[];
}

export type RuleSetSource = 'file' | 'builtin';

export interface LoadResult {
  ruleSet: RuleSet;
  source: RuleSetSource;
  path?: string;
  /** Why the script was rejected; empty when it loaded */
  issues: string[];
  /** Script fields that were absent and took the built-in table */
  defaulted: string[];
}
