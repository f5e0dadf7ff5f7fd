import { z } from 'zod';
import type { RuleSet, TransformPair } from './types.js';

function compiles(source: string): boolean {
  try {
    new RegExp(source, 'i');
    return true;
  } catch {
    return false;
  }
}

/** Post-transform patterns are matched as whole words */
export function wholeWord(pattern: string): string {
  return `\\b(?:${pattern})\\b`;
}

const PatternSchema = z.string().min(1).refine(compiles, {
  message: 'Invalid regular expression',
});

export const DecompositionSchema = z.object({
  pattern: PatternSchema,
  reassembly: z.array(z.string().min(1)).min(1),
});

export const KeywordSchema = z.object({
  word: z.string().trim().toLowerCase().min(1),
  rank: z.number().int().default(0),
  decomposition: z.array(DecompositionSchema).default([]),
});

export const TransformSchema = z.tuple([PatternSchema, z.string()]);

export const PostTransformSchema = z.tuple([
  z.string().min(1).refine((p) => compiles(wholeWord(p)), {
    message: 'Invalid regular expression',
  }),
  z.string(),
]);

export const SynonymSchema = z.record(z.array(z.string().trim().toLowerCase().min(1)));

export const LinkSchema = z.record(z.string().trim().toLowerCase().min(1));

export const MemoryBlockSchema = z.object({
  decomposition: z.array(DecompositionSchema).min(1),
});

/**
 * External script representation. Every table is optional; absent tables
 * take the fallback rule set's value.
 */
export const ScriptSchema = z.object({
  keywords: z.array(KeywordSchema).optional(),
  links: LinkSchema.optional(),
  dlist: LinkSchema.optional(),
  pre: z.array(TransformSchema).optional(),
  post: z.array(PostTransformSchema).optional(),
  synon: SynonymSchema.optional(),
  memory: MemoryBlockSchema.optional(),
  default: z.array(z.string().min(1)).optional(),
  initial: z.array(z.string().min(1)).optional(),
  quit: z.array(z.string().trim().toLowerCase().min(1)).optional(),
});

export const LexiconSchema = z.object({
  pre: z.array(TransformSchema).default([]),
  synon: SynonymSchema.default({}),
});

export type Script = z.infer<typeof ScriptSchema>;
export type Lexicon = z.infer<typeof LexiconSchema>;

export type ParseResult =
  | { success: true; ruleSet: RuleSet; defaulted: string[] }
  | { success: false; issues: string[] };

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

function copyPairs(pairs: TransformPair[]): TransformPair[] {
  return pairs.map(([pattern, replacement]) => [pattern, replacement]);
}

/**
 * Validate raw script data and merge it over a fallback rule set, table by table.
 */
export function parseScript(raw: unknown, fallback: RuleSet): ParseResult {
  const parsed = ScriptSchema.safeParse(raw);
  if (!parsed.success) {
    return { success: false, issues: formatIssues(parsed.error) };
  }

  const script = parsed.data;
  const defaulted: string[] = [];

  function take<T>(field: string, value: T | undefined, fallbackValue: T): T {
    if (value === undefined) {
      defaulted.push(field);
      return fallbackValue;
    }
    return value;
  }

  const links = script.links ?? script.dlist;

  const ruleSet: RuleSet = {
    keywords: take('keywords', script.keywords, [...fallback.keywords]),
    links: take('links', links, { ...fallback.links }),
    preTransforms: take('pre', script.pre, copyPairs(fallback.preTransforms)),
    postTransforms: take('post', script.post, copyPairs(fallback.postTransforms)),
    synonyms: take('synon', script.synon, { ...fallback.synonyms }),
    memory: take('memory', script.memory, { decomposition: [...fallback.memory.decomposition] }),
    defaultResponses: take('default', script.default, [...fallback.defaultResponses]),
    initialPrompts: take('initial', script.initial, [...fallback.initialPrompts]),
    quitWords: take('quit', script.quit, [...fallback.quitWords]),
  };

  return { success: true, ruleSet, defaulted };
}
