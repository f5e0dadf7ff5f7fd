import type { CompiledRuleSet } from '../script/compile.js';

/** Token with everything but word characters removed */
export function bareWord(token: string): string {
  return token.replace(/[^\w]/g, '');
}

export function tokenize(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Pre-transform pass: lowercase, expand contractions, canonicalize synonyms.
 * Keyword and link words are left as typed so they still trigger.
 */
export function normalize(input: string, rules: CompiledRuleSet): string {
  let text = input.toLowerCase().trim();

  for (const { regex, replacement } of rules.preTransforms) {
    text = text.replace(regex, replacement);
  }

  const tokens = tokenize(text).map((token) => {
    const bare = bareWord(token);
    if (!bare || rules.preserved.has(bare)) return token;

    const canonical = rules.synonyms.get(bare);
    if (canonical === undefined || canonical === bare) return token;

    return token.split(bare).join(canonical);
  });

  return tokens.join(' ').replace(/\s+/g, ' ').trim();
}

export function hasToken(text: string, word: string): boolean {
  return tokenize(text).some((token) => bareWord(token) === word);
}

export function firstBareToken(text: string): string | undefined {
  const [first] = tokenize(text);
  return first === undefined ? undefined : bareWord(first);
}
