import { describe, it, expect, vi } from 'vitest';
import { decompose, fillTemplate } from '../../src/engine/decomposer.js';
import { compileRuleSet, type CompiledDecomposition } from '../../src/script/compile.js';
import { BUILTIN_RULE_SET } from '../../src/script/builtin.js';
import type { DecompositionRule } from '../../src/script/types.js';

function compiled(rules: DecompositionRule[]): readonly CompiledDecomposition[] {
  return compileRuleSet({ ...BUILTIN_RULE_SET, memory: { decomposition: rules } }).memory;
}

const first = () => 0;

describe('fillTemplate', () => {
  it('substitutes positional placeholders', () => {
    expect(fillTemplate('Why are you {0}?', ['tired'])).toEqual({ ok: true, text: 'Why are you tired?' });
    expect(fillTemplate('{1} and {0}', ['a', 'b'])).toEqual({ ok: true, text: 'b and a' });
  });

  it('accepts templates without placeholders', () => {
    expect(fillTemplate('Go on.', [])).toEqual({ ok: true, text: 'Go on.' });
  });

  it('reports the first placeholder with no capture', () => {
    expect(fillTemplate('Say {1}', ['a'])).toEqual({ ok: false, missingIndex: 1 });
  });

  it('leaves other brace text literal', () => {
    expect(fillTemplate('{name} {0}', ['x'])).toEqual({ ok: true, text: '{name} x' });
  });
});

describe('decompose', () => {
  const amRules = compiled([
    { pattern: '.*\\bi am not (.*)', reassembly: ['NOT {0}'] },
    { pattern: '.*\\bi am (.*)', reassembly: ['IS {0}'] },
  ]);

  it('uses the first matching rule', () => {
    expect(decompose('i am not tired', amRules, { random: first })?.text).toBe('NOT tired');
    expect(decompose('i am tired', amRules, { random: first })?.text).toBe('IS tired');
  });

  it('strips trailing punctuation from captures', () => {
    const result = decompose('i am so tired!!!', amRules, { random: first });
    expect(result?.captures).toEqual(['so tired']);
    expect(result?.text).toBe('IS so tired');
  });

  it('matches case-insensitively and unanchored', () => {
    expect(decompose('Well, I AM fine', amRules, { random: first })?.text).toBe('IS fine');
  });

  it('returns null when no rule matches', () => {
    expect(decompose('you are tired', amRules, { random: first })).toBeNull();
  });

  it('draws the template with the random source', () => {
    const rules = compiled([{ pattern: '(.*)', reassembly: ['a', 'b', 'c'] }]);
    expect(decompose('x', rules, { random: () => 0.99 })?.template).toBe('c');
    expect(decompose('x', rules, { random: () => 0.5 })?.template).toBe('b');
  });

  it('skips a template that names a missing capture', () => {
    const rules = compiled([
      { pattern: '(.*)', reassembly: ['{1}'] },
      { pattern: '(.*)', reassembly: ['Fallback {0}'] },
    ]);
    const onSkip = vi.fn();

    const result = decompose('hi', rules, { random: first, onSkip });

    expect(result?.text).toBe('Fallback hi');
    expect(onSkip).toHaveBeenCalledOnce();
    expect(onSkip).toHaveBeenCalledWith(expect.objectContaining({ template: '{1}', missingIndex: 1 }));
  });

  it('returns null when every matching template is skipped', () => {
    const rules = compiled([{ pattern: '(.*)', reassembly: ['{3}'] }]);
    expect(decompose('hi', rules, { random: first })).toBeNull();
  });

  it('treats unmatched optional groups as empty', () => {
    const rules = compiled([{ pattern: 'i (am )?(.*)', reassembly: ['[{0}][{1}]'] }]);
    expect(decompose('i go', rules, { random: first })?.text).toBe('[][go]');
  });

  it('adapts captures for the chosen template', () => {
    const adapt = vi.fn((capture: string) => capture.toUpperCase());
    const result = decompose('i am tired', amRules, { random: first, adapt });
    expect(result?.text).toBe('IS TIRED');
    expect(adapt).toHaveBeenCalledWith('tired', 'IS {0}');
  });
});
