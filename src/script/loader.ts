import * as fs from 'fs';
import * as path from 'path';
import { BUILTIN_RULE_SET } from './builtin.js';
import { parseScript } from './schema.js';
import type { LoadResult, RuleSet } from './types.js';

function builtin(fallback: RuleSet, issues: string[], scriptPath?: string): LoadResult {
  return { ruleSet: fallback, source: 'builtin', path: scriptPath, issues, defaulted: [] };
}

/**
 * Load a script file. Never throws: anything that keeps the file from
 * becoming a rule set yields the built-in rule set along with the reason.
 */
export function loadScript(scriptPath?: string | null, fallback: RuleSet = BUILTIN_RULE_SET): LoadResult {
  if (!scriptPath) {
    return builtin(fallback, []);
  }

  const resolved = path.resolve(scriptPath);

  if (!fs.existsSync(resolved)) {
    return builtin(fallback, [`Script file not found: ${resolved}`], resolved);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return builtin(fallback, [`Could not read script ${resolved}: ${reason}`], resolved);
  }

  const parsed = parseScript(raw, fallback);
  if (!parsed.success) {
    return builtin(fallback, parsed.issues.map((issue) => `Invalid script ${resolved}: ${issue}`), resolved);
  }

  return {
    ruleSet: parsed.ruleSet,
    source: 'file',
    path: resolved,
    issues: [],
    defaulted: parsed.defaulted,
  };
}
