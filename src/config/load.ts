// config/load.ts
import { config as dotenv } from 'dotenv';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { OracleConfig } from './schema.ts';
import { interpolateStrict } from './secret-interpolate.ts';
import { EnvSecretSource } from './secret-source.ts';

dotenv();

export const DEFAULT_CONFIG_FILE = 'oracle.config.json';
export const CONFIG_ENV_VAR = 'ORACLE_CONFIG';

/**
 * Interpolate ${env:VAR_NAME} tokens, then validate against the schema.
 */
export async function resolveAndValidate(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
): Promise<OracleConfig> {
  const interpolated = await interpolateStrict(raw, { env: new EnvSecretSource(env) });
  const parsed = OracleConfig.safeParse(interpolated);
  if (!parsed.success) {
    throw new Error(`Invalid oracle configuration:\n${z.prettifyError(parsed.error)}`);
  }
  return parsed.data;
}

async function fromJson(text: string, label: string, env: NodeJS.ProcessEnv): Promise<OracleConfig> {
  try {
    return await resolveAndValidate(JSON.parse(text), env);
  } catch (error) {
    throw new Error(
      `Failed to load ${label}: ${error instanceof Error ? error.message : 'Unknown error'}`,
    );
  }
}

export async function loadConfig(
  filename?: string,
  { cwd = process.cwd(), env = process.env }: { cwd?: string; env?: NodeJS.ProcessEnv } = {},
): Promise<OracleConfig> {
  // Priority 1: explicitly provided file path
  if (filename) {
    const explicitConfigPath = join(cwd, filename);
    if (existsSync(explicitConfigPath)) {
      return fromJson(readFileSync(explicitConfigPath, 'utf-8'), filename, env);
    }
    // If explicit filename provided but doesn't exist, continue to fallback options
  }

  // Priority 2: oracle.config.json in the working directory
  const defaultConfigPath = join(cwd, DEFAULT_CONFIG_FILE);
  if (existsSync(defaultConfigPath)) {
    return fromJson(readFileSync(defaultConfigPath, 'utf-8'), DEFAULT_CONFIG_FILE, env);
  }

  // Priority 3: ORACLE_CONFIG environment variable
  const inline = env[CONFIG_ENV_VAR];
  if (inline) {
    return fromJson(inline, CONFIG_ENV_VAR, env);
  }

  throw new Error(
    filename
      ? `No configuration found. Tried: ${filename}, ${DEFAULT_CONFIG_FILE}, and ${CONFIG_ENV_VAR} environment variable.`
      : `No configuration found. Provide ${DEFAULT_CONFIG_FILE}, set ${CONFIG_ENV_VAR}, or pass a config file path.`,
  );
}
