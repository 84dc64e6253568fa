/**
 * Config Loader
 *
 * Loads config/quire.json with {env:VAR} resolution.
 * Supports QUIRE_CONFIG env var to override config path.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { type Config, configSchema } from './schema';

const DEFAULT_CONFIG_PATH = 'config/quire.json';

/**
 * Resolve {env:VAR} patterns in text.
 * Returns empty string if env var is not set.
 */
export function resolveEnvVars(text: string, env: NodeJS.ProcessEnv = process.env): string {
  return text.replace(/\{env:([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => {
    return env[varName] ?? '';
  });
}

/**
 * Parse config text (after env resolution) into a validated Config.
 * Returns the list of `path: message` problems instead of throwing.
 */
export function parseConfig(
  text: string,
  env: NodeJS.ProcessEnv = process.env
): { config: Config } | { errors: string[] } {
  let data: unknown;
  try {
    data = JSON.parse(resolveEnvVars(text, env));
  } catch {
    return { errors: ['Invalid JSON'] };
  }

  const result = configSchema.safeParse(data);
  if (!result.success) {
    return {
      errors: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    };
  }

  return { config: result.data };
}

/**
 * Load and validate config from file.
 */
function loadConfig(configPath: string): Config {
  let text: string;
  try {
    text = readFileSync(configPath, 'utf-8');
  } catch (err) {
    const error = err as NodeJS.ErrnoException;
    if (error.code === 'ENOENT') {
      console.error(`Config file not found: ${configPath}`);
      console.error('Copy config/quire.example.json to config/quire.json and configure it.');
      process.exit(1);
    }
    throw err;
  }

  const parsed = parseConfig(text);
  if ('errors' in parsed) {
    console.error(`Invalid config: ${configPath}`);
    for (const message of parsed.errors) {
      console.error(`  ${message}`);
    }
    process.exit(1);
  }

  return parsed.config;
}

// Lazy load and cache
let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (!cachedConfig) {
    const configPath = process.env['QUIRE_CONFIG'] ?? resolve(process.cwd(), DEFAULT_CONFIG_PATH);
    cachedConfig = loadConfig(configPath);
  }
  return cachedConfig;
}
