import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';

export const ScriptConfigSchema = z.object({
  // Relative paths resolve against the project root
  path: z.string().min(1).optional(),
});

export const MemoryConfigSchema = z.object({
  capacity: z.number().int().positive().default(5),
});

export const ChatConfigSchema = z.object({
  showDebug: z.boolean().default(false),
  seed: z.number().int().nonnegative().optional(),
  userLabel: z.string().min(1).default('You'),
  botLabel: z.string().min(1).default('Parley'),
});

export const ConfigSchema = z.object({
  version: z.number().default(1),
  script: ScriptConfigSchema.default({}),
  memory: MemoryConfigSchema.default({}),
  chat: ChatConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ScriptConfig = z.infer<typeof ScriptConfigSchema>;
export type MemoryConfig = z.infer<typeof MemoryConfigSchema>;
export type ChatConfig = z.infer<typeof ChatConfigSchema>;

export const PARLEY_DIR = '.parley';
export const CONFIG_FILE = 'config.json';

export function findProjectRoot(startDir: string = process.cwd()): string | null {
  let currentDir = startDir;

  while (currentDir !== path.dirname(currentDir)) {
    const parleyPath = path.join(currentDir, PARLEY_DIR);
    if (fs.existsSync(parleyPath) && fs.statSync(parleyPath).isDirectory()) {
      return currentDir;
    }
    currentDir = path.dirname(currentDir);
  }

  return null;
}

export function getParleyPath(projectRoot?: string): string {
  const root = projectRoot ?? findProjectRoot();
  if (!root) {
    throw new Error('Not in a parley project. Run `parley init` first.');
  }
  return path.join(root, PARLEY_DIR);
}

export function getConfigPath(projectRoot?: string): string {
  return path.join(getParleyPath(projectRoot), CONFIG_FILE);
}

/**
 * Project config, or defaults outside a project. A corrupt file also yields
 * defaults.
 */
export function loadConfig(projectRoot?: string | null): Config {
  const root = projectRoot === undefined ? findProjectRoot() : projectRoot;
  if (!root) {
    return ConfigSchema.parse({});
  }

  const configPath = getConfigPath(root);
  if (!fs.existsSync(configPath)) {
    return ConfigSchema.parse({});
  }

  try {
    const rawConfig: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    return ConfigSchema.parse(rawConfig);
  } catch {
    // Corrupt or invalid config - fall back to defaults
    return ConfigSchema.parse({});
  }
}

export function saveConfig(config: Config, projectRoot?: string): void {
  const configPath = getConfigPath(projectRoot);
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2));
}

export function initProject(targetDir: string = process.cwd(), force: boolean = false): void {
  const parleyPath = path.join(targetDir, PARLEY_DIR);

  if (fs.existsSync(parleyPath) && !force) {
    throw new Error('parley already initialized. Use --force to reinitialize.');
  }

  fs.mkdirSync(parleyPath, { recursive: true });

  const defaultConfig = ConfigSchema.parse({});
  fs.writeFileSync(
    path.join(parleyPath, CONFIG_FILE),
    JSON.stringify(defaultConfig, null, 2)
  );
}

/**
 * Script path from config, resolved against the project root.
 */
export function resolveScriptPath(config: Config, projectRoot: string | null): string | undefined {
  const configured = config.script.path;
  if (!configured) return undefined;
  return path.isAbsolute(configured) || !projectRoot
    ? configured
    : path.join(projectRoot, configured);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function baseType(schema: z.ZodTypeAny): z.ZodTypeAny {
  if (schema instanceof z.ZodDefault) return baseType(schema.removeDefault());
  if (schema instanceof z.ZodOptional) return baseType(schema.unwrap());
  return schema;
}

function coerce(value: string, schema: z.ZodTypeAny): unknown {
  const type = baseType(schema);
  if (type instanceof z.ZodNumber) {
    const parsed = Number(value);
    if (value.trim() === '' || Number.isNaN(parsed)) {
      throw new Error(`Expected a number, got "${value}"`);
    }
    return parsed;
  }
  if (type instanceof z.ZodBoolean) {
    return value === 'true';
  }
  return value;
}

const SECTION_SCHEMAS: Record<string, z.AnyZodObject> = {
  script: ScriptConfigSchema,
  memory: MemoryConfigSchema,
  chat: ChatConfigSchema,
};

export function setConfigValue(key: string, value: string, projectRoot?: string): void {
  const config: Record<string, unknown> = { ...loadConfig(projectRoot) };
  const [section, field, ...rest] = key.split('.');

  const sectionSchema = Object.hasOwn(SECTION_SCHEMAS, section) ? SECTION_SCHEMAS[section] : undefined;
  const shape: z.ZodRawShape = sectionSchema?.shape ?? {};
  const fieldSchema = Object.hasOwn(shape, field) ? shape[field] : undefined;
  if (!fieldSchema || rest.length > 0) {
    throw new Error(`Invalid config key: ${key}`);
  }

  const current = config[section];
  const sectionValue: Record<string, unknown> = isRecord(current) ? { ...current } : {};
  sectionValue[field] = coerce(value, fieldSchema);
  config[section] = sectionValue;

  const validated = ConfigSchema.parse(config);
  saveConfig(validated, projectRoot);
}

export function getConfigValue(key: string, projectRoot?: string): unknown {
  const config = loadConfig(projectRoot);
  const keys = key.split('.');

  let current: unknown = config;
  for (const k of keys) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[k];
  }

  return current;
}
