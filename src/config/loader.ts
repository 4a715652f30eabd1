/**
 * YAML config loading and Zod validation.
 * Reads a YAML file, validates it against the config schema,
 * and returns a fully typed Config object or throws a ConfigError.
 */

import { readFileSync, existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigSchema } from './schema.js';
import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Config } from './types.js';

/**
 * Load and validate a YAML config file.
 *
 * @param path - Absolute or relative path to the YAML config file
 * @param env - Environment consulted for SHARDWIRE_TOKEN
 * @returns A fully validated Config object
 * @throws ConfigError if the file cannot be read or validation fails
 */
export function loadConfig(path: string, env: NodeJS.ProcessEnv = process.env): Config {
  if (!existsSync(path)) {
    throw new ConfigError(
      `Config file not found: ${path}. Pass --config <path> or set CONFIG_PATH.`,
    );
  }

  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to read config file at "${path}": ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse YAML in config file "${path}": ${message}`);
  }

  const result = ConfigSchema.safeParse(applyEnvOverrides(parsed, env));

  if (!result.success) {
    const prettyError = z.prettifyError(result.error);
    logger.error({ configPath: path }, 'Config validation failed');
    throw new ConfigError(`Config validation failed for "${path}":\n${prettyError}`);
  }

  logger.info(
    {
      configPath: path,
      intents: result.data.gateway.intents.length,
      shardCount: result.data.gateway.shardCount ?? 'auto',
    },
    'Config loaded successfully'
  );

  return result.data;
}

/**
 * SHARDWIRE_TOKEN replaces the token from the file, so the file can be
 * committed without it.
 */
function applyEnvOverrides(parsed: unknown, env: NodeJS.ProcessEnv): unknown {
  const token = env['SHARDWIRE_TOKEN'];
  if (!token) {
    return parsed;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return parsed;
  }
  return { ...parsed, token };
}

/**
 * Resolve the config file path from CLI args, env var, or default.
 *
 * Priority:
 * 1. --config CLI argument
 * 2. CONFIG_PATH environment variable
 * 3. ./config/config.yaml (default)
 */
export function resolveConfigPath(
  args: readonly string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env,
): string {
  // Check CLI args for --config
  const configArgIndex = args.indexOf('--config');
  if (configArgIndex !== -1 && configArgIndex + 1 < args.length) {
    return args[configArgIndex + 1]!;
  }

  // Check environment variable
  const envPath = env['CONFIG_PATH'];
  if (envPath) {
    return envPath;
  }

  // Default
  return './config/config.yaml';
}
