import { describe, it, expect } from 'vitest';
import { createEngine, createSequenceRandom, loadScript, BUILTIN_RULE_SET, MemoryQueue } from '../../src/index.js';

describe('library entry', () => {
  it('exposes the engine, loader and memory', () => {
    const bot = createEngine({ random: createSequenceRandom([0]) });

    expect(bot.respond('I am tired')).toBe('Why are you tired?');
    expect(bot.memory).toBeInstanceOf(MemoryQueue);
    expect(loadScript().ruleSet).toBe(BUILTIN_RULE_SET);
  });
});
