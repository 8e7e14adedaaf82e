import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { formatZodError, isPlainObject } from '@recordkit/core';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ${NAME} or ${NAME:-fallback}
const PLACEHOLDER = /\$\{([^}:]+)(?::-([^}]*))?\}/g;

/**
 * Replace `${VAR}` and `${VAR:-default}` placeholders in every string of a
 * JSON-like value. An unset or empty variable without a default is an error.
 */
export function expandEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    return value.replace(PLACEHOLDER, (_placeholder: string, rawName: string, fallback?: string) => {
      const name = rawName.trim();
      const resolved = env[name];
      if (resolved !== undefined && resolved !== '') return resolved;
      if (fallback !== undefined) return fallback;
      throw new ConfigError(`Missing required environment variable: ${name}`);
    });
  }
  if (Array.isArray(value)) {
    return value.map((item) => expandEnvVars(item, env));
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, expandEnvVars(item, env)]));
  }
  return value;
}

/** Accepts real booleans and the strings "true"/"false" left by env expansion */
const flag = z.union([
  z.boolean(),
  z.enum(['true', 'false']).transform((v) => v === 'true'),
]);

export const coercionSchema = z
  .object({
    numericStrings: flag.optional(),
    booleanStrings: flag.optional(),
    dateStrings: flag.optional(),
  })
  .strict();

export const loggingSchema = z
  .object({
    format: z.enum(['text', 'json']).optional(),
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  })
  .strict();

export const accessorConfigSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    coercion: coercionSchema.optional(),
    logging: loggingSchema.optional(),
  })
  .strict();

export type AccessorConfigInput = z.input<typeof accessorConfigSchema>;
export type AccessorConfig = z.output<typeof accessorConfigSchema>;

/** Coercion switches with defaults applied */
export type CoercionOptions = Required<z.output<typeof coercionSchema>>;

export const DEFAULT_COERCION: CoercionOptions = {
  numericStrings: true,
  booleanStrings: true,
  dateStrings: true,
};

export function resolveCoercionOptions(config?: AccessorConfig): CoercionOptions {
  const coercion = config?.coercion;
  return {
    numericStrings: coercion?.numericStrings ?? DEFAULT_COERCION.numericStrings,
    booleanStrings: coercion?.booleanStrings ?? DEFAULT_COERCION.booleanStrings,
    dateStrings: coercion?.dateStrings ?? DEFAULT_COERCION.dateStrings,
  };
}

/**
 * Validate a raw configuration object, expanding `${VAR}` placeholders first
 * @throws ConfigError listing every invalid entry
 */
export function parseAccessorConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): AccessorConfig {
  const expanded = expandEnvVars(raw, env);
  const result = accessorConfigSchema.safeParse(expanded);
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error, 'accessor config'));
  }
  return result.data;
}

/**
 * Read and validate a JSON configuration file
 */
export async function loadAccessorConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<AccessorConfig> {
  const absolutePath = resolve(process.cwd(), configPath);
  const content = await readFile(absolutePath, 'utf-8');
  // Strip a UTF-8 BOM so JSON.parse does not choke on it.
  const sanitized = content.replace(/^\uFEFF/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (err) {
    throw new ConfigError(
      `Invalid JSON in ${configPath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return parseAccessorConfig(parsed, env);
}

const ENV_KEYS = {
  level: 'RECORDKIT_LOG_LEVEL',
  format: 'RECORDKIT_LOG_FORMAT',
  numericStrings: 'RECORDKIT_COERCE_NUMERIC_STRINGS',
  booleanStrings: 'RECORDKIT_COERCE_BOOLEAN_STRINGS',
  dateStrings: 'RECORDKIT_COERCE_DATE_STRINGS',
} as const;

/**
 * Build a configuration from RECORDKIT_* environment variables. Unset
 * variables stay undefined so defaults apply.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): AccessorConfig {
  const pick = (key: string): string | undefined => {
    const value = env[key]?.trim();
    return value ? value.toLowerCase() : undefined;
  };

  const raw = {
    coercion: {
      numericStrings: pick(ENV_KEYS.numericStrings),
      booleanStrings: pick(ENV_KEYS.booleanStrings),
      dateStrings: pick(ENV_KEYS.dateStrings),
    },
    logging: {
      level: pick(ENV_KEYS.level),
      format: pick(ENV_KEYS.format),
    },
  };

  return parseAccessorConfig(raw, env);
}
