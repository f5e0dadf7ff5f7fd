import { findProjectRoot, loadConfig, resolveScriptPath, type Config } from '../config/index.js';
import { createSeededRandom, defaultRandom, type RandomSource } from '../engine/random.js';

export interface SessionFlags {
  script?: string;
  seed?: string;
  debug?: boolean;
}

export interface SessionSettings {
  config: Config;
  scriptPath?: string;
  random: RandomSource;
  showDebug: boolean;
}

export function parseSeed(value: string): number {
  const seed = Number(value);
  if (!Number.isInteger(seed) || seed < 0) {
    throw new Error(`Seed must be a non-negative integer, got "${value}"`);
  }
  return seed;
}

/**
 * Merge command-line flags over the project config. Flags win.
 */
export function resolveSession(flags: SessionFlags, cwd: string = process.cwd()): SessionSettings {
  const root = findProjectRoot(cwd);
  const config = loadConfig(root);

  const scriptPath = flags.script ?? resolveScriptPath(config, root);
  const seed = flags.seed !== undefined ? parseSeed(flags.seed) : config.chat.seed;

  return {
    config,
    scriptPath,
    random: seed === undefined ? defaultRandom : createSeededRandom(seed),
    showDebug: flags.debug ?? config.chat.showDebug,
  };
}
