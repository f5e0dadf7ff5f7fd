import type { RuleSetSource } from '../script/types.js';

export type ReplyStrategy = 'keyword' | 'memory' | 'default';

/**
 * Everything the engine would otherwise do silently. Delivered to the
 * `onDebug` hook; the engine itself never prints.
 */
export type EngineEvent =
  | { type: 'script-loaded'; source: RuleSetSource; path?: string; defaulted: string[] }
  | { type: 'script-fallback'; path?: string; issues: string[] }
  | { type: 'rule-issue'; message: string }
  | { type: 'normalized'; input: string; text: string }
  | { type: 'memory-stored'; entry: string; evicted: string | null }
  | { type: 'keyword'; keyword: string; via: 'link' | 'rank'; trigger: string }
  | { type: 'template-skipped'; keyword: string | null; pattern: string; template: string; missingIndex: number }
  | { type: 'memory-recalled'; entry: string }
  | { type: 'memory-skipped'; reason: 'acknowledgment' | 'empty' | 'no-match' }
  | { type: 'reply'; strategy: ReplyStrategy; text: string }
  | { type: 'turn-failed'; error: unknown };

export type DebugHook = (event: EngineEvent) => void;

export function describeEvent(event: EngineEvent): string {
  switch (event.type) {
    case 'script-loaded':
      return event.source === 'file'
        ? `script: ${event.path ?? '(unknown)'}${event.defaulted.length > 0 ? ` (built-in ${event.defaulted.join(', ')})` : ''}`
        : 'script: built-in';
    case 'script-fallback':
      return `script rejected, using built-in rules: ${event.issues.join('; ')}`;
    case 'rule-issue':
      return `rule issue: ${event.message}`;
    case 'normalized':
      return `normalized: "${event.text}"`;
    case 'memory-stored':
      return event.evicted === null
        ? `memory stored: "${event.entry}"`
        : `memory stored: "${event.entry}" (evicted "${event.evicted}")`;
    case 'keyword':
      return event.via === 'link'
        ? `keyword: ${event.keyword} (linked from "${event.trigger}")`
        : `keyword: ${event.keyword}`;
    case 'template-skipped':
      return `template skipped: "${event.template}" needs capture {${event.missingIndex}} (pattern ${event.pattern})`;
    case 'memory-recalled':
      return `memory recalled: "${event.entry}"`;
    case 'memory-skipped':
      return `memory not used: ${event.reason}`;
    case 'reply':
      return `reply via ${event.strategy}`;
    case 'turn-failed':
      return `turn failed: ${event.error instanceof Error ? event.error.message : String(event.error)}`;
  }
}
