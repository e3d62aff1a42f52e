import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { ConfigError, parseRunConfig, stableStringify, type RunConfig } from '@causeway/core';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  /** Variables to read from (default: process.env) */
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError({
      message: `Missing required environment variable: ${name}`,
      suggestion: `Export ${name} or give the placeholder a default with \${${name}:-value}.`,
    });
  });
}

/**
 * Replace `${VAR}` and `${VAR:-default}` placeholders in every string of a JSON value
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

function stripUtf8Bom(input: string): string {
  return input.charCodeAt(0) === 0xfeff ? input.slice(1) : input;
}

/**
 * Read, expand and validate a JSON run configuration file
 */
export async function loadConfigFile(
  filePath: string,
  options?: EnvExpansionOptions
): Promise<RunConfig> {
  const absolutePath = resolve(process.cwd(), filePath);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (err) {
    throw new ConfigError({
      message: `Cannot read config file: ${absolutePath}`,
      cause: err instanceof Error ? err : undefined,
      suggestion: 'Check the path and file permissions.',
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(stripUtf8Bom(content));
  } catch (err) {
    throw new ConfigError({
      message: `Config file is not valid JSON: ${absolutePath}`,
      cause: err instanceof Error ? err : undefined,
    });
  }

  return parseRunConfig(expandEnvVars(raw, options));
}

/**
 * sha256 over the canonical JSON form; identical configurations hash identically
 * regardless of key order. Logging settings do not take part.
 */
export function fingerprintConfig(config: RunConfig): string {
  return createHash('sha256')
    .update(stableStringify({ ...config, logging: undefined }))
    .digest('hex');
}
