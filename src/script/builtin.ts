/**
 * Built-in rule set. Used when no script is given or the given one cannot be
 * loaded, and as the per-table fallback for scripts that omit a table.
 *
 * Templates are written in the voice they will have after post-transforms run
 * over the whole reply, so they avoid first-person words.
 */

import * as fs from 'fs';
import { LexiconSchema, type Lexicon } from './schema.js';
import { findPackageFile, LEXICON_FILE } from './paths.js';
import type { DecompositionRule, KeywordRule, RuleSet, TransformPair } from './types.js';

export const STATIC_DEFAULT_RESPONSE = 'Please go on.';
export const STATIC_INITIAL_PROMPT = 'How do you do. Please tell me your problem.';

const FAMILY_REPLIES = [
  'Tell me more about your family.',
  'Who else in your family?',
  'What about your family?',
];

const BUILTIN_KEYWORDS: KeywordRule[] = [
  {
    word: 'hello',
    rank: 0,
    decomposition: [
      {
        pattern: '.*hello.*',
        reassembly: [
          'How do you do. Please state your problem.',
          'Hi there. What brings you here?',
          'Hello. What would you like to talk about?',
        ],
      },
    ],
  },
  {
    word: 'mother',
    rank: 10,
    decomposition: [
      { pattern: '.*\\bmy mother (.*)', reassembly: ['Who else in your family {0}?', ...FAMILY_REPLIES] },
      { pattern: '.*mother.*', reassembly: FAMILY_REPLIES },
    ],
  },
  {
    word: 'father',
    rank: 10,
    decomposition: [
      { pattern: '.*\\bmy father (.*)', reassembly: ['Who else in your family {0}?', ...FAMILY_REPLIES] },
      { pattern: '.*father.*', reassembly: FAMILY_REPLIES },
    ],
  },
  {
    word: 'am',
    rank: 5,
    decomposition: [
      {
        pattern: '.*\\bi am not (.*)',
        reassembly: [
          'Why are you not {0}?',
          'How long have you not been {0}?',
          'Would you like to be {0}?',
        ],
      },
      {
        pattern: '.*\\bi am (.*)',
        reassembly: [
          'Why are you {0}?',
          'How long have you been {0}?',
          'Do you enjoy being {0}?',
        ],
      },
    ],
  },
  {
    word: 'feel',
    rank: 5,
    decomposition: [
      {
        pattern: '.*\\bi feel (.*)',
        reassembly: [
          'Do you often feel {0}?',
          'What makes you feel {0}?',
          'Tell me more about feeling {0}.',
        ],
      },
    ],
  },
  {
    word: 'think',
    rank: 5,
    decomposition: [
      {
        pattern: '.*\\bi (?:think|believe) (.*)',
        reassembly: [
          'What makes you think {0}?',
          'Do you really think {0}?',
          'Why do you think {0}?',
        ],
      },
    ],
  },
  {
    word: 'want',
    rank: 5,
    decomposition: [
      {
        pattern: '.*\\bi (?:want|desire) (.*)',
        reassembly: [
          'Why do you want {0}?',
          'What would it mean to you if you got {0}?',
          'Tell me more about wanting {0}.',
        ],
      },
    ],
  },
  {
    word: 'need',
    rank: 5,
    decomposition: [
      {
        pattern: '.*\\bi (?:need|require) (.*)',
        reassembly: [
          'Why do you need {0}?',
          'What would happen if you did not have {0}?',
          'Tell me more about needing {0}.',
        ],
      },
    ],
  },
  {
    word: 'my',
    rank: 2,
    decomposition: [
      {
        pattern: '.*\\bmy (.*)',
        reassembly: [
          'Your {0}?',
          'Why do you say your {0}?',
          'Does that suggest anything else which belongs to you?',
        ],
      },
    ],
  },
];

export const GENERIC_MEMORY_RULES: DecompositionRule[] = [
  {
    pattern: '(.*)',
    reassembly: [
      'Earlier you said {0}.',
      'Does that have anything to do with the fact that {0}?',
      'What else comes to mind when you think about {0}?',
      'Let us talk more about {0}.',
    ],
  },
];

const BUILTIN_POST_TRANSFORMS: TransformPair[] = [
  ['i', 'you'],
  ['my', 'your'],
  ['am', 'are'],
  ['is', 'are'],
  ['was', 'were'],
  ['myself', 'yourself'],
  ['mine', 'yours'],
  ['me(?!\\s+(?:more|about|how|what|why|when|where)\\b)', 'you'],
];

const BUILTIN_DEFAULTS = [
  'Please go on.',
  'Tell me more.',
  'Go on.',
  'I see.',
  'Can you elaborate on that?',
  'What does that suggest to you?',
  'How does that make you feel?',
];

const BUILTIN_GREETINGS = [
  STATIC_INITIAL_PROMPT,
  'Hello. What would you like to talk about today?',
  'Is something troubling you?',
];

/**
 * Contractions and synonym groups live in data/lexicon.json. A missing or
 * malformed file leaves the built-in set without them.
 */
export function loadLexicon(lexiconPath: string | null = findPackageFile(LEXICON_FILE)): Lexicon {
  const empty: Lexicon = { pre: [], synon: {} };
  if (!lexiconPath) return empty;

  try {
    const parsed = LexiconSchema.safeParse(JSON.parse(fs.readFileSync(lexiconPath, 'utf-8')));
    return parsed.success ? parsed.data : empty;
  } catch {
    return empty;
  }
}

export function createBuiltinRuleSet(lexicon: Lexicon = loadLexicon()): RuleSet {
  return {
    keywords: BUILTIN_KEYWORDS,
    links: {
      believe: 'think',
      desire: 'want',
      require: 'need',
    },
    preTransforms: lexicon.pre,
    postTransforms: BUILTIN_POST_TRANSFORMS,
    synonyms: lexicon.synon,
    memory: { decomposition: GENERIC_MEMORY_RULES },
    defaultResponses: BUILTIN_DEFAULTS,
    initialPrompts: BUILTIN_GREETINGS,
    quitWords: ['bye', 'goodbye', 'quit', 'exit'],
  };
}

export const BUILTIN_RULE_SET: RuleSet = createBuiltinRuleSet();
