import type { CompiledDecomposition } from '../script/compile.js';
import { pick, type RandomSource } from './random.js';

export type FillResult =
  | { ok: true; text: string }
  | { ok: false; missingIndex: number };

const PLACEHOLDER = /\{(\d+)\}/g;

/**
 * Substitute {0}, {1}, ... with captures. Any other brace text is literal.
 */
export function fillTemplate(template: string, captures: readonly string[]): FillResult {
  for (const match of template.matchAll(PLACEHOLDER)) {
    const index = Number(match[1]);
    if (index >= captures.length) {
      return { ok: false, missingIndex: index };
    }
  }

  const text = template.replace(PLACEHOLDER, (_whole, digits: string) => captures[Number(digits)]);
  return { ok: true, text };
}

export interface Reassembly {
  text: string;
  rule: CompiledDecomposition;
  template: string;
  captures: string[];
}

export interface SkippedTemplate {
  rule: CompiledDecomposition;
  template: string;
  missingIndex: number;
}

export interface DecomposeOptions {
  random: RandomSource;
  /** Rewrites captured text before it is placed into the chosen template */
  adapt?: (capture: string, template: string) => string;
  onSkip?: (skipped: SkippedTemplate) => void;
}

/**
 * Try decomposition rules in order. The first rule whose pattern matches and
 * whose drawn template can be filled produces the reply; a template naming a
 * missing capture moves on to the next rule.
 */
export function decompose(
  text: string,
  rules: readonly CompiledDecomposition[],
  options: DecomposeOptions
): Reassembly | null {
  for (const rule of rules) {
    const match = rule.regex.exec(text);
    if (!match) continue;

    const template = pick(rule.reassembly, options.random);
    if (template === undefined) continue;

    const captures = match.slice(1).map((group) => {
      const value = (group ?? '').replace(/[\s.!?,;:]+$/, '').trim();
      return options.adapt ? options.adapt(value, template) : value;
    });

    const filled = fillTemplate(template, captures);
    if (!filled.ok) {
      options.onSkip?.({ rule, template, missingIndex: filled.missingIndex });
      continue;
    }

    return { text: filled.text, rule, template, captures };
  }

  return null;
}
