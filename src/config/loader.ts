import { readFileSync, existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import yaml from 'js-yaml';
import { ProjectConfigSchema, type ProjectConfig } from '../types/index.js';
import { interpolateValue, type Environment } from './interpolate.js';

export const CONFIG_FILENAME = 'tooleval.config.yaml';

/**
 * Find config file by walking up from cwd
 */
function findConfigFile(startDir: string): string | null {
  let dir = startDir;
  while (true) {
    const configPath = resolve(dir, CONFIG_FILENAME);
    if (existsSync(configPath)) {
      return configPath;
    }
    const parentDir = dirname(dir);
    if (parentDir === dir) {
      return null;
    }
    dir = parentDir;
  }
}

export interface LoadConfigOptions {
  configPath?: string;
  cwd?: string;
  /** Return the defaults instead of failing when no config file exists */
  optional?: boolean;
  env?: Environment;
}

export interface LoadConfigResult {
  config: ProjectConfig;
  configPath: string | null;
}

/**
 * Validate a parsed config document, resolving ${ENV.*} placeholders first
 */
export function parseConfig(raw: unknown, env: Environment = process.env): ProjectConfig {
  const result = ProjectConfigSchema.safeParse(interpolateValue(raw ?? {}, env));
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Invalid config file:\n${errors}`);
  }
  return result.data;
}

/**
 * Load and validate project config
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadConfigResult {
  const cwd = options.cwd ?? process.cwd();
  const configPath = options.configPath
    ? resolve(cwd, options.configPath)
    : findConfigFile(cwd);

  if (!configPath) {
    if (options.optional) {
      return { config: parseConfig({}, options.env), configPath: null };
    }
    throw new Error(
      `Config file not found. Create ${CONFIG_FILENAME} in your project root.`
    );
  }

  if (!existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  const content = readFileSync(configPath, 'utf-8');
  const raw = yaml.load(content);

  return {
    config: parseConfig(raw, options.env),
    configPath,
  };
}
