/**
 * Configuration loader — reads an optional JSON config file, resolves
 * `${VAR}` placeholders, layers environment overrides on top and
 * validates the result with Zod.
 */
import { readFile } from 'node:fs/promises';

import { MeshError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import { meshConfigSchema } from './schema.js';
import type { MeshConfig } from './types.js';

// ─── Errors ─────────────────────────────────────────────────────

/**
 * Error raised when configuration loading or validation fails.
 */
export class ConfigError extends MeshError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'CONFIG_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

// ─── Environment Variable Resolution ────────────────────────────

const ENV_VAR_PATTERN = /^\$\{([A-Z_][A-Z0-9_]*)\}$/;

/**
 * Recursively replaces strings of the exact form `${VAR_NAME}` with the
 * value of that environment variable.
 *
 * @throws ConfigError if a referenced variable is not defined
 */
export function resolveEnvVars(obj: unknown, env: Env = process.env): unknown {
  if (typeof obj === 'string') {
    const varName = ENV_VAR_PATTERN.exec(obj)?.[1];
    if (varName === undefined) return obj;

    const value = env[varName];
    if (value === undefined) {
      throw new ConfigError(`Environment variable "${varName}" is not defined`, {
        variableName: varName,
      });
    }
    return value;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item, env));
  }

  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value, env);
    }
    return result;
  }

  return obj;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// ─── Validation ─────────────────────────────────────────────────

function validateConfig(raw: unknown, source: string): Result<MeshConfig, ConfigError> {
  const validation = meshConfigSchema.safeParse(raw);
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return err(new ConfigError('Configuration validation failed', { source, issues }));
  }
  return ok(validation.data);
}

async function readConfigFile(filePath: string, env: Env): Promise<Result<unknown, ConfigError>> {
  let fileContent: string;
  try {
    fileContent = await readFile(filePath, 'utf-8');
  } catch (error) {
    const code = isRecord(error) && typeof error['code'] === 'string' ? error['code'] : undefined;
    const message =
      code === 'ENOENT'
        ? `Configuration file not found: ${filePath}`
        : `Failed to read configuration file: ${filePath}`;
    return err(new ConfigError(message, { filePath, errorCode: code }));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch {
    return err(new ConfigError('Invalid JSON in configuration file', { filePath }));
  }

  try {
    return ok(resolveEnvVars(parsed, env));
  } catch (error) {
    if (error instanceof ConfigError) return err(error);
    return err(
      new ConfigError('Failed to resolve environment variables', {
        filePath,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }
}

// ─── Public API ─────────────────────────────────────────────────

/**
 * Load and validate a JSON configuration file.
 */
export async function loadMeshConfig(
  filePath: string,
  env: Env = process.env,
): Promise<Result<MeshConfig, ConfigError>> {
  const raw = await readConfigFile(filePath, env);
  if (!raw.ok) return raw;
  return validateConfig(raw.value, filePath);
}

/**
 * Build the runtime configuration for the server process.
 *
 * Starts from the file named by `CARTMESH_CONFIG` (or an empty object),
 * then applies `PORT`, `HOST`, `REDIS_URL` and `LOG_LEVEL`.
 */
export async function resolveMeshConfig(
  env: Env = process.env,
): Promise<Result<MeshConfig, ConfigError>> {
  let base: Record<string, unknown> = {};
  const configPath = env['CARTMESH_CONFIG'];

  if (configPath !== undefined && configPath !== '') {
    const raw = await readConfigFile(configPath, env);
    if (!raw.ok) return raw;
    if (!isRecord(raw.value)) {
      return err(new ConfigError('Configuration file must contain a JSON object', { filePath: configPath }));
    }
    base = raw.value;
  }

  const section = (key: string): Record<string, unknown> => {
    const value = base[key];
    return isRecord(value) ? { ...value } : {};
  };

  const server = section('server');
  if (env['PORT'] !== undefined) server['port'] = env['PORT'];
  if (env['HOST'] !== undefined) server['host'] = env['HOST'];

  const storage = section('storage');
  if (env['REDIS_URL'] !== undefined && env['REDIS_URL'] !== '') {
    storage['driver'] = 'redis';
    storage['redisUrl'] = env['REDIS_URL'];
  }

  const logging = section('logging');
  if (env['LOG_LEVEL'] !== undefined) logging['level'] = env['LOG_LEVEL'];

  return validateConfig({ ...base, server, storage, logging }, configPath ?? 'environment');
}
