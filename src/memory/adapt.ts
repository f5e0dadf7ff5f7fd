// Grammar fixes for recalled statements placed after "about":
// "your cat are fluffy" -> "your cat being fluffy".

const GERUNDS: ReadonlyArray<[RegExp, string]> = [
  [/\b(?:is|are|was|were)\b/gi, 'being'],
  [/\bfeels?\b/gi, 'feeling'],
  [/\bthinks?\b/gi, 'thinking'],
  [/\bwants?\b/gi, 'wanting'],
  [/\bneeds?\b/gi, 'needing'],
  [/\bhates?\b/gi, 'hating'],
];

export const ACKNOWLEDGMENTS: ReadonlySet<string> = new Set([
  'yes', 'no', 'ok', 'okay', 'sure', 'right', 'yeah', 'yep', 'nope', 'yea',
]);

export function isAcknowledgment(word: string | undefined): boolean {
  return word !== undefined && ACKNOWLEDGMENTS.has(word.toLowerCase());
}

export function toGerundPhrase(text: string): string {
  let result = text;
  for (const [pattern, replacement] of GERUNDS) {
    result = result.replace(pattern, replacement);
  }
  return result.replace(/\bme\b/gi, 'you');
}

/**
 * Adapt recalled text to the memory template it is going into. Only "about"
 * templates need the gerund form; anything else takes the text as stored.
 */
export function adaptRecalled(text: string, template: string): string {
  return /about/i.test(template) ? toGerundPhrase(text) : text;
}
