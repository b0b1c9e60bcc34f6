/**
 * Configuration loader: reads a JSON config file, resolves environment
 * variable placeholders and validates the result with Zod.
 */
import { readFile } from 'node:fs/promises';

import { CostwardenError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, isErr, ok } from '@/core/result.js';
import { validatePriceEntry } from '@/pricing/price-validator.js';

import { costwardenConfigSchema } from './schema.js';
import type { CostwardenConfig } from './types.js';

// ─── Errors ─────────────────────────────────────────────────────

/**
 * Error returned when configuration loading or validation fails.
 */
export class ConfigError extends CostwardenError {
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

// ─── Environment Variable Resolution ────────────────────────────

const ENV_VAR_PATTERN = /^\$\{([A-Z_][A-Z0-9_]*)\}$/;

/**
 * Recursively replaces strings of the form `${VAR_NAME}` with the value of
 * that environment variable.
 *
 * @throws ConfigError if a referenced environment variable is not defined
 */
export function resolveEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    const varName = ENV_VAR_PATTERN.exec(obj)?.[1];
    if (varName !== undefined) {
      const value = process.env[varName];
      if (value === undefined) {
        throw new ConfigError(`Environment variable "${varName}" is not defined`, {
          variableName: varName,
          pattern: obj,
        });
      }
      return value;
    }
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value);
    }
    return result;
  }

  return obj;
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** Fills connection URLs the file leaves out from DATABASE_URL / REDIS_URL. */
function withEnvDefaults(resolved: unknown): unknown {
  if (resolved === null || typeof resolved !== 'object' || Array.isArray(resolved)) {
    return resolved;
  }
  const databaseUrl = process.env['DATABASE_URL'];
  const redisUrl = process.env['REDIS_URL'];
  return {
    ...(databaseUrl !== undefined && databaseUrl !== '' && { databaseUrl }),
    ...(redisUrl !== undefined && redisUrl !== '' && { redisUrl }),
    ...resolved,
  };
}

// ─── Configuration Loader ───────────────────────────────────────

/**
 * Loads and validates the costwarden configuration.
 *
 * 1. Reads the JSON file from disk (an empty object when no path is given)
 * 2. Resolves environment variable placeholders
 * 3. Validates against the Zod schema, applying defaults
 * 4. Checks the universal fallback rate is a consistent price entry
 */
export async function loadConfig(
  filePath?: string,
): Promise<Result<CostwardenConfig, ConfigError>> {
  let parsed: unknown = {};

  if (filePath !== undefined) {
    let fileContent: string;
    try {
      fileContent = await readFile(filePath, 'utf-8');
    } catch (error) {
      const code = errnoCode(error);
      if (code === 'ENOENT') {
        return err(
          new ConfigError(`Configuration file not found: ${filePath}`, {
            filePath,
            errorCode: 'ENOENT',
          }),
        );
      }
      return err(
        new ConfigError(`Failed to read configuration file: ${filePath}`, {
          filePath,
          errorCode: code,
          errorMessage: error instanceof Error ? error.message : String(error),
        }),
      );
    }

    try {
      parsed = JSON.parse(fileContent);
    } catch {
      return err(new ConfigError('Invalid JSON in configuration file', { filePath }));
    }
  }

  let resolved: unknown;
  try {
    resolved = resolveEnvVars(parsed);
  } catch (error) {
    if (error instanceof ConfigError) {
      return err(error);
    }
    return err(
      new ConfigError('Failed to resolve environment variables', {
        filePath,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  const validation = costwardenConfigSchema.safeParse(withEnvDefaults(resolved));
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return err(new ConfigError('Configuration validation failed', { filePath, issues }));
  }

  const config = validation.data;
  const fallback = validatePriceEntry(
    { provider: '*', model: '*', ...config.pricing.universalFallback },
    'universal_fallback',
  );
  if (isErr(fallback)) {
    return err(
      new ConfigError('Universal fallback rate is inconsistent', {
        filePath,
        issues: fallback.error.issues,
      }),
    );
  }

  return ok(config);
}
