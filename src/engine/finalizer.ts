import type { CompiledRuleSet } from '../script/compile.js';

/**
 * Apply the post-transforms (pronoun and verb person-switching) in order.
 */
export function switchPerson(text: string, rules: CompiledRuleSet): string {
  let result = text;
  for (const { regex, replacement } of rules.postTransforms) {
    result = result.replace(regex, replacement);
  }
  return result;
}

export function capitalize(text: string): string {
  return text.length > 0 ? text.charAt(0).toUpperCase() + text.slice(1) : text;
}

export function finalize(text: string, rules: CompiledRuleSet): string {
  return capitalize(switchPerson(text, rules));
}
