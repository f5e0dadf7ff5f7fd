import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { parseScript } from '../../src/script/schema.js';
import { loadScript } from '../../src/script/loader.js';
import { compileRuleSet } from '../../src/script/compile.js';
import { BUILTIN_RULE_SET, GENERIC_MEMORY_RULES, createBuiltinRuleSet, loadLexicon } from '../../src/script/builtin.js';
import { findPackageFile, DOCTOR_SCRIPT_FILE } from '../../src/script/paths.js';
import type { RuleSet } from '../../src/script/types.js';

function tmpDir(): string {
  const dir = path.join(os.tmpdir(), `parley-script-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

function cleanup(dir: string): void {
  try { fs.rmSync(dir, { recursive: true, force: true }); } catch { /* ignore */ }
}

const ALL_FIELDS = ['keywords', 'links', 'pre', 'post', 'synon', 'memory', 'default', 'initial', 'quit'];

describe('parseScript', () => {
  it('takes every absent table from the fallback', () => {
    const result = parseScript({}, BUILTIN_RULE_SET);
    if (!result.success) throw new Error(result.issues.join('\n'));

    expect(result.defaulted).toEqual(ALL_FIELDS);
    expect(result.ruleSet.keywords).toEqual(BUILTIN_RULE_SET.keywords);
    expect(result.ruleSet.defaultResponses).toEqual(BUILTIN_RULE_SET.defaultResponses);
  });

  it('copies fallback tables rather than sharing them', () => {
    const fallback: RuleSet = { ...BUILTIN_RULE_SET, keywords: [...BUILTIN_RULE_SET.keywords] };
    const keywordCount = fallback.keywords.length;
    const memoryCount = fallback.memory.decomposition.length;

    const result = parseScript({}, fallback);
    if (!result.success) throw new Error(result.issues.join('\n'));
    result.ruleSet.keywords.pop();
    result.ruleSet.memory.decomposition.pop();

    expect(fallback.keywords).toHaveLength(keywordCount);
    expect(fallback.memory.decomposition).toHaveLength(memoryCount);
  });

  it('normalizes keyword words and fills in rank', () => {
    const result = parseScript({
      keywords: [{ word: ' Dream ', decomposition: [{ pattern: '(.*)', reassembly: ['Dreams?'] }] }],
    }, BUILTIN_RULE_SET);
    if (!result.success) throw new Error(result.issues.join('\n'));

    expect(result.ruleSet.keywords).toEqual([
      { word: 'dream', rank: 0, decomposition: [{ pattern: '(.*)', reassembly: ['Dreams?'] }] },
    ]);
    expect(result.defaulted).not.toContain('keywords');
  });

  it('accepts dlist as the name of the links table', () => {
    const result = parseScript({ dlist: { wish: 'want' } }, BUILTIN_RULE_SET);
    if (!result.success) throw new Error(result.issues.join('\n'));

    expect(result.ruleSet.links).toEqual({ wish: 'want' });
    expect(result.defaulted).not.toContain('links');
  });

  it('rejects patterns that do not compile', () => {
    const result = parseScript({
      keywords: [{ word: 'x', decomposition: [{ pattern: '(oops', reassembly: ['X'] }] }],
    }, BUILTIN_RULE_SET);

    expect(result).toEqual({
      success: false,
      issues: ['keywords.0.decomposition.0.pattern: Invalid regular expression'],
    });
  });

  it('rejects post-transforms that do not compile as whole words', () => {
    const result = parseScript({ post: [['(', 'x']] }, BUILTIN_RULE_SET);
    expect(result).toEqual({ success: false, issues: ['post.0.0: Invalid regular expression'] });
  });

  it('rejects non-object scripts', () => {
    const result = parseScript([], BUILTIN_RULE_SET);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.issues[0]).toMatch(/^\(root\): /);
    }
  });
});

describe('loadScript', () => {
  let dir: string;

  beforeEach(() => { dir = tmpDir(); });
  afterEach(() => cleanup(dir));

  function write(name: string, content: string): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  }

  it('uses the built-in rules without a path', () => {
    expect(loadScript()).toEqual({
      ruleSet: BUILTIN_RULE_SET,
      source: 'builtin',
      path: undefined,
      issues: [],
      defaulted: [],
    });
    expect(loadScript(null).source).toBe('builtin');
  });

  it('falls back for a missing file', () => {
    const file = path.join(dir, 'missing.json');
    const result = loadScript(file);

    expect(result.source).toBe('builtin');
    expect(result.ruleSet).toBe(BUILTIN_RULE_SET);
    expect(result.issues).toEqual([`Script file not found: ${file}`]);
  });

  it('falls back for malformed JSON', () => {
    const file = write('broken.json', 'not json{');
    const result = loadScript(file);

    expect(result.source).toBe('builtin');
    expect(result.issues).toHaveLength(1);
    expect(result.issues[0].startsWith(`Could not read script ${file}: `)).toBe(true);
  });

  it('falls back for a script that fails validation', () => {
    const file = write('invalid.json', JSON.stringify({ default: 'not a list' }));
    const result = loadScript(file);

    expect(result.source).toBe('builtin');
    expect(result.issues).toHaveLength(1);
    expect(result.issues[0].startsWith(`Invalid script ${file}: default: `)).toBe(true);
  });

  it('uses the given fallback', () => {
    const custom: RuleSet = { ...BUILTIN_RULE_SET, defaultResponses: ['Custom.'] };
    expect(loadScript(path.join(dir, 'missing.json'), custom).ruleSet).toBe(custom);
  });

  it('loads a partial script over the built-in tables', () => {
    const file = write('partial.json', JSON.stringify({
      keywords: [{ word: 'sky', rank: 2, decomposition: [{ pattern: '(.*)', reassembly: ['Look up.'] }] }],
      default: ['Hmm.'],
    }));
    const result = loadScript(file);

    expect(result.source).toBe('file');
    expect(result.path).toBe(file);
    expect(result.issues).toEqual([]);
    expect(result.defaulted).toEqual(['links', 'pre', 'post', 'synon', 'memory', 'initial', 'quit']);
    expect(result.ruleSet.defaultResponses).toEqual(['Hmm.']);
    expect(result.ruleSet.preTransforms).toEqual(BUILTIN_RULE_SET.preTransforms);
  });

  it('loads the bundled doctor script completely', () => {
    const result = loadScript(findPackageFile(DOCTOR_SCRIPT_FILE));

    expect(result.source).toBe('file');
    expect(result.issues).toEqual([]);
    expect(result.defaulted).toEqual([]);
    expect(result.ruleSet.keywords).toHaveLength(25);
  });
});

describe('compileRuleSet', () => {
  function ruleSet(overrides: Partial<RuleSet>): RuleSet {
    return { ...BUILTIN_RULE_SET, keywords: [], links: {}, synonyms: {}, ...overrides };
  }

  it('orders keywords by rank, keeping declaration order on ties', () => {
    const rules = compileRuleSet(BUILTIN_RULE_SET);
    expect(rules.ranked.map((k) => k.word)).toEqual([
      'mother', 'father', 'am', 'feel', 'think', 'want', 'need', 'my', 'hello',
    ]);
  });

  it('keeps the first of duplicate keywords', () => {
    const rules = compileRuleSet(ruleSet({
      keywords: [
        { word: 'sky', rank: 1, decomposition: [] },
        { word: 'SKY', rank: 9, decomposition: [] },
      ],
    }));
    expect(rules.ranked).toHaveLength(1);
    expect(rules.keywords.get('sky')?.rank).toBe(1);
  });

  it('maps canonical words and variants to the canonical word', () => {
    const rules = compileRuleSet(ruleSet({ synonyms: { glad: ['Happy', 'cheerful'] } }));
    expect(rules.synonyms.get('glad')).toBe('glad');
    expect(rules.synonyms.get('happy')).toBe('glad');
    expect(rules.synonyms.get('cheerful')).toBe('glad');
  });

  it('preserves keyword and link words', () => {
    const rules = compileRuleSet(ruleSet({
      keywords: [{ word: 'want', rank: 1, decomposition: [] }],
      links: { wish: 'want', hope: 'missing' },
    }));
    expect([...rules.preserved]).toEqual(['want', 'wish']);
  });

  it('falls back to generic memory rules', () => {
    const rules = compileRuleSet(ruleSet({ memory: { decomposition: [] } }));
    expect(rules.memory.map((m) => m.source)).toEqual(GENERIC_MEMORY_RULES.map((m) => m.pattern));
  });

  it('drops blank replies and lowercases quit words', () => {
    const rules = compileRuleSet(ruleSet({
      defaultResponses: ['  ', 'Go on.'],
      initialPrompts: [''],
      quitWords: [' Bye '],
    }));
    expect(rules.defaultResponses).toEqual(['Go on.']);
    expect(rules.initialPrompts).toEqual([]);
    expect(rules.quitWords).toEqual(['bye']);
  });

  it('records and skips patterns that do not compile', () => {
    const rules = compileRuleSet(ruleSet({
      keywords: [{
        word: 'x',
        rank: 0,
        decomposition: [
          { pattern: '[', reassembly: ['Broken.'] },
          { pattern: '(.*)', reassembly: ['Fine.'] },
        ],
      }],
    }));
    expect(rules.issues).toHaveLength(1);
    expect(rules.issues[0].startsWith('Skipped pattern "["')).toBe(true);
    expect(rules.keywords.get('x')?.decomposition.map((d) => d.source)).toEqual(['(.*)']);
  });
});

describe('built-in rule set', () => {
  it('reads contractions and synonyms from the lexicon', () => {
    expect(BUILTIN_RULE_SET.preTransforms.length).toBeGreaterThan(0);
    expect(BUILTIN_RULE_SET.synonyms.mother).toContain('mom');
  });

  it('runs without a lexicon file', () => {
    const lexicon = loadLexicon(path.join(os.tmpdir(), 'parley-no-such-lexicon.json'));
    expect(lexicon).toEqual({ pre: [], synon: {} });

    const rules = createBuiltinRuleSet(lexicon);
    expect(rules.preTransforms).toEqual([]);
    expect(rules.keywords).toBe(BUILTIN_RULE_SET.keywords);
  });
});
