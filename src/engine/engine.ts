/**
 * ResponseEngine - one conversation's worth of state around a rule set.
 *
 * Each turn: normalize, remember "my" statements, resolve a keyword (links
 * first, then rank), decompose and reassemble, else recall a memory, else
 * fall back to a default reply.
 */

import { compileRuleSet, type CompiledRuleSet } from '../script/compile.js';
import { BUILTIN_RULE_SET, STATIC_DEFAULT_RESPONSE, STATIC_INITIAL_PROMPT } from '../script/builtin.js';
import { loadScript } from '../script/loader.js';
import type { RuleSet, RuleSetSource } from '../script/types.js';
import { MemoryQueue, DEFAULT_MEMORY_CAPACITY } from '../memory/queue.js';
import { adaptRecalled, isAcknowledgment } from '../memory/adapt.js';
import { normalize, hasToken, firstBareToken } from './normalizer.js';
import { resolveKeyword } from './resolver.js';
import { decompose, type SkippedTemplate } from './decomposer.js';
import { finalize, switchPerson } from './finalizer.js';
import { defaultRandom, pick, type RandomSource } from './random.js';
import type { DebugHook, EngineEvent, ReplyStrategy } from './events.js';

export interface ScriptOrigin {
  source: RuleSetSource;
  path?: string;
}

export interface EngineOptions {
  random?: RandomSource;
  memoryCapacity?: number;
  onDebug?: DebugHook;
  origin?: ScriptOrigin;
}

export interface CreateEngineOptions extends Omit<EngineOptions, 'origin'> {
  /** Path to a JSON script; omitted or unusable means the built-in rules */
  script?: string | null;
  fallback?: RuleSet;
}

/**
 * Deliver an event to a debug hook. A hook that throws never reaches the
 * conversation.
 */
function notify(hook: DebugHook | undefined, event: EngineEvent): void {
  try {
    hook?.(event);
  } catch {
    // Hook failures are the hook's own concern
  }
}

function isCompiled(rules: RuleSet | CompiledRuleSet): rules is CompiledRuleSet {
  return 'ranked' in rules;
}

export class ResponseEngine {
  readonly memory: MemoryQueue;
  readonly origin: ScriptOrigin;
  private readonly rules: CompiledRuleSet;
  private readonly random: RandomSource;
  private readonly onDebug?: DebugHook;

  constructor(rules: RuleSet | CompiledRuleSet = BUILTIN_RULE_SET, options: EngineOptions = {}) {
    this.rules = isCompiled(rules) ? rules : compileRuleSet(rules);
    this.random = options.random ?? defaultRandom;
    this.onDebug = options.onDebug;
    this.origin = options.origin ?? { source: 'builtin' };
    this.memory = new MemoryQueue(options.memoryCapacity ?? DEFAULT_MEMORY_CAPACITY);

    for (const message of this.rules.issues) {
      this.emit({ type: 'rule-issue', message });
    }
  }

  get quitWords(): readonly string[] {
    return this.rules.quitWords;
  }

  /**
   * Reply to one utterance. Never throws and never returns an empty string.
   */
  respond(utterance: string): string {
    try {
      return this.turn(utterance);
    } catch (error) {
      return this.recover(error);
    }
  }

  initialPrompt(): string {
    return pick(this.rules.initialPrompts, this.random) ?? STATIC_INITIAL_PROMPT;
  }

  private turn(utterance: string): string {
    const text = normalize(utterance, this.rules);
    this.emit({ type: 'normalized', input: utterance, text });

    if (!text) {
      return this.reply('default', this.defaultResponse());
    }

    // Stored before dispatch, whether or not a keyword answers this turn
    if (hasToken(text, 'my')) {
      const entry = switchPerson(text, this.rules);
      const evicted = this.memory.store(entry);
      this.emit({ type: 'memory-stored', entry: entry.trim(), evicted });
    }

    const resolution = resolveKeyword(text, this.rules);
    if (resolution) {
      const { rule, via, trigger } = resolution;
      this.emit({ type: 'keyword', keyword: rule.word, via, trigger });

      const reassembly = decompose(text, rule.decomposition, {
        random: this.random,
        onSkip: (skipped) => this.skipped(rule.word, skipped),
      });
      if (reassembly) {
        return this.reply('keyword', finalize(reassembly.text, this.rules));
      }
    }

    const remembered = this.fromMemory(text);
    if (remembered !== null) {
      return this.reply('memory', remembered);
    }

    return this.reply('default', this.defaultResponse());
  }

  private fromMemory(text: string): string | null {
    if (isAcknowledgment(firstBareToken(text))) {
      this.emit({ type: 'memory-skipped', reason: 'acknowledgment' });
      return null;
    }

    const entry = this.memory.recall(false);
    if (entry === null) {
      this.emit({ type: 'memory-skipped', reason: 'empty' });
      return null;
    }

    const reassembly = decompose(entry, this.rules.memory, {
      random: this.random,
      adapt: adaptRecalled,
      onSkip: (skipped) => this.skipped(null, skipped),
    });
    if (!reassembly) {
      this.emit({ type: 'memory-skipped', reason: 'no-match' });
      return null;
    }

    // Consumed only once it has actually been used
    this.memory.recall(true);
    this.emit({ type: 'memory-recalled', entry });
    return finalize(reassembly.text, this.rules);
  }

  private defaultResponse(): string {
    return pick(this.rules.defaultResponses, this.random) ?? STATIC_DEFAULT_RESPONSE;
  }

  private reply(strategy: ReplyStrategy, text: string): string {
    const final = text.trim() || STATIC_DEFAULT_RESPONSE;
    this.emit({ type: 'reply', strategy, text: final });
    return final;
  }

  private skipped(keyword: string | null, skipped: SkippedTemplate): void {
    this.emit({
      type: 'template-skipped',
      keyword,
      pattern: skipped.rule.source,
      template: skipped.template,
      missingIndex: skipped.missingIndex,
    });
  }

  private recover(error: unknown): string {
    this.emit({ type: 'turn-failed', error });
    return this.rules.defaultResponses[0] ?? STATIC_DEFAULT_RESPONSE;
  }

  private emit(event: EngineEvent): void {
    notify(this.onDebug, event);
  }
}

/**
 * Build an engine from an optional script path. A missing or broken script
 * falls back to the built-in rules; the reason goes to `onDebug`.
 */
export function createEngine(options: CreateEngineOptions = {}): ResponseEngine {
  const { script, fallback, ...engineOptions } = options;
  const loaded = loadScript(script, fallback);

  const engine = new ResponseEngine(loaded.ruleSet, {
    ...engineOptions,
    origin: { source: loaded.source, path: loaded.path },
  });

  if (loaded.issues.length > 0) {
    notify(engineOptions.onDebug, { type: 'script-fallback', path: loaded.path, issues: loaded.issues });
  } else {
    notify(engineOptions.onDebug, { type: 'script-loaded', source: loaded.source, path: loaded.path, defaulted: loaded.defaulted });
  }

  return engine;
}
