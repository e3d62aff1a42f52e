/**
 * Zod schemas for validating the run configuration
 */

import { z } from 'zod';
import { ConfigError } from '../errors/index.js';

/** Similarity algorithms the approximate matcher can index with */
export const similarityAlgorithmSchema = z.enum([
  'levenshtein',
  'jaro_winkler',
  'dice_sorensen',
]);

/** Thresholds are probabilities, boundary inclusive */
export const thresholdSchema = z.number().min(0).max(1);

export const directStrategySchema = z
  .object({
    enabled: z.boolean().default(true),
    /** Reference table version pinned for the whole run */
    tableVersion: z.string().min(1).optional(),
  })
  .strict();

export const fuzzyStrategySchema = z
  .object({
    enabled: z.boolean().default(true),
    threshold: thresholdSchema.optional(),
    topK: z.number().int().min(1).max(50).default(5),
    algorithm: similarityAlgorithmSchema.default('levenshtein'),
    /** Version tag of the canonical catalog, recorded as the rule version */
    catalogVersion: z.string().min(1).default('unversioned'),
  })
  .strict();

export const suggestedStrategySchema = z
  .object({
    enabled: z.boolean().default(false),
    threshold: thresholdSchema.optional(),
    topK: z.number().int().min(1).max(50).default(3),
    timeoutMs: z.number().int().min(1).max(300_000).default(10_000),
    /** Concurrent calls to the external service, independent of workers */
    maxConcurrency: z.number().int().min(1).max(256).default(4),
  })
  .strict();

/** Unknown strategy names are rejected by the strict object */
export const strategiesSchema = z
  .object({
    direct: directStrategySchema.default({}),
    fuzzy: fuzzyStrategySchema.default({}),
    suggested: suggestedStrategySchema.default({}),
  })
  .strict();

export const qualitySeveritySchema = z.enum(['info', 'warning', 'error', 'fatal']);

export const qualityCheckConfigSchema = z
  .object({
    name: z.string().min(1),
    enabled: z.boolean().default(true),
    severity: qualitySeveritySchema.default('warning'),
    /** Points subtracted per unit of violation rate when the check fails */
    severityWeight: z.number().min(0).default(10),
    parameters: z.record(z.unknown()).default({}),
  })
  .strict();

export const qualityConfigSchema = z
  .object({
    /** Abort the run when a check fails at runtime */
    strict: z.boolean().default(false),
    checks: z.array(qualityCheckConfigSchema).default([]),
  })
  .strict();

export const loggingConfigSchema = z
  .object({
    format: z.enum(['text', 'json']).default('text'),
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .strict();

export const runConfigSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    runId: z.string().min(1).optional(),
    /** Field holding the raw diagnostic code */
    sourceField: z.string().min(1),
    /** Field the canonical code is written to */
    targetField: z.string().min(1).default('canonical_code'),
    /** Optional free-text field passed to the suggestion service */
    descriptionField: z.string().min(1).optional(),
    strategies: strategiesSchema.default({}),
    quality: qualityConfigSchema.default({}),
    concurrency: z
      .object({
        workers: z.number().int().min(1).max(256).default(8),
      })
      .strict()
      .default({}),
    logging: loggingConfigSchema.default({}),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.sourceField === value.targetField) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'targetField must differ from sourceField',
        path: ['targetField'],
      });
    }

    const { direct, fuzzy, suggested } = value.strategies;
    if (direct.enabled && direct.tableVersion === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Missing tableVersion for enabled direct strategy',
        path: ['strategies', 'direct', 'tableVersion'],
      });
    }
    if (fuzzy.enabled && fuzzy.threshold === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Missing threshold for enabled fuzzy strategy',
        path: ['strategies', 'fuzzy', 'threshold'],
      });
    }
    if (suggested.enabled && suggested.threshold === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Missing threshold for enabled suggested strategy',
        path: ['strategies', 'suggested', 'threshold'],
      });
    }

    const names = new Set<string>();
    value.quality.checks.forEach((check, i) => {
      if (names.has(check.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate quality check: ${check.name}`,
          path: ['quality', 'checks', i, 'name'],
        });
      }
      names.add(check.name);
    });
  });

/** Export types from schemas */
export type SimilarityAlgorithmInput = z.infer<typeof similarityAlgorithmSchema>;
export type QualityCheckConfig = z.infer<typeof qualityCheckConfigSchema>;
export type RunConfig = z.infer<typeof runConfigSchema>;
export type RunConfigInput = z.input<typeof runConfigSchema>;

export function formatZodError(label: string, err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}

/**
 * Validate a raw configuration object, throwing ConfigError on any issue
 */
export function parseRunConfig(value: unknown): RunConfig {
  const parsed = runConfigSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError({
      message: formatZodError('Invalid run configuration', parsed.error),
      suggestion: 'Fix the listed fields and start the run again.',
      context: { issues: parsed.error.issues.length },
    });
  }
  return parsed.data;
}
