// config/load.ts
import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { AppConfig } from './schema.ts';
import { interpolateStrict } from './secret-interpolate.ts';
import { EnvSecretSource } from './secret-source.ts';

export const DEFAULT_CONFIG_FILE = 'txgraph.config.json';
export const CONFIG_ENV_VAR = 'TXGRAPH_CONFIG';

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Interpolates ${env:VAR_NAME} tokens, then validates. Fails with the full
 * list of missing env vars or schema issues.
 */
async function resolveAndValidate(raw: unknown, env: NodeJS.ProcessEnv): Promise<AppConfig> {
  const interpolated = await interpolateStrict(raw, { env: new EnvSecretSource(env) });
  // Zod validation after secrets are in place
  const parsed = AppConfig.safeParse(interpolated);
  if (!parsed.success) {
    throw new Error(`Invalid configuration:\n${z.prettifyError(parsed.error)}`);
  }
  return parsed.data;
}

async function loadFile(path: string, label: string, env: NodeJS.ProcessEnv) {
  try {
    const configData: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    return await resolveAndValidate(configData, env);
  } catch (error) {
    throw new Error(
      `Failed to load ${label}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { cause: error },
    );
  }
}

export async function loadConfig(
  filename?: string,
  opts: LoadConfigOptions = {},
): Promise<AppConfig> {
  const cwd = opts.cwd ?? process.cwd();
  const env = opts.env ?? process.env;

  // Priority 1: explicitly provided file path (from command line args)
  if (filename) {
    const explicitConfigPath = resolve(cwd, filename);
    if (existsSync(explicitConfigPath)) {
      return loadFile(explicitConfigPath, filename, env);
    }
    // If explicit filename provided but doesn't exist, continue to fallback options
  }

  // Priority 2: txgraph.config.json in the working directory
  const defaultConfigPath = resolve(cwd, DEFAULT_CONFIG_FILE);
  if (existsSync(defaultConfigPath)) {
    return loadFile(defaultConfigPath, DEFAULT_CONFIG_FILE, env);
  }

  // Priority 3: inline JSON in TXGRAPH_CONFIG
  const inline = env[CONFIG_ENV_VAR];
  if (inline) {
    let configData: unknown;
    try {
      configData = JSON.parse(inline);
    } catch (error) {
      throw new Error(
        `Failed to parse ${CONFIG_ENV_VAR}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { cause: error },
      );
    }
    return resolveAndValidate(configData, env);
  }

  const errorMessage = filename
    ? `No configuration found. Tried: ${filename}, ${DEFAULT_CONFIG_FILE}, and ${CONFIG_ENV_VAR} environment variable.`
    : `No configuration found. Please provide ${DEFAULT_CONFIG_FILE}, set the ${CONFIG_ENV_VAR} environment variable, or specify a config file path.`;

  throw new Error(errorMessage);
}
