/**
 * Quality Assessor
 *
 * Runs the configured checks over a resolved dataset and folds their
 * violation rates into a composite score between 0 and 100.
 */

import type {
  QualityAssessment,
  QualityCheckConfig,
  QualityCheckName,
  QualityCheckResult,
  QualitySeverity,
} from '@causeway/core';
import { QualityCheckRuntimeError, QualityConfigError } from '@causeway/core';
import { Logger } from '@causeway/runtime';
import { BUILTIN_CHECKS, type BoundCheck, type QualityCheckDefinition } from './checks.js';
import type { QualityDataset } from './quality-dataset.js';

export interface QualityAssessorOptions {
  /** Rethrow check runtime failures instead of reporting them (default: false) */
  strict?: boolean;
  logger?: Logger;
  /** Check library (default: the built-in checks) */
  registry?: readonly QualityCheckDefinition[];
}

interface ConfiguredCheck {
  name: QualityCheckName;
  config: QualityCheckConfig;
  run: BoundCheck;
}

const MAX_SCORE = 100;

function clampScore(score: number): number {
  return Math.min(MAX_SCORE, Math.max(0, score));
}

/**
 * Fold failed checks into the composite score, in configuration order.
 * Each failure subtracts weight * violations / total.
 */
export function compositeScore(
  results: readonly Pick<QualityCheckResult, 'passed' | 'penalty'>[]
): number {
  let score = MAX_SCORE;
  for (const result of results) {
    if (!result.passed) score = clampScore(score - result.penalty);
  }
  return score;
}

export class QualityAssessor {
  private readonly checks: ConfiguredCheck[];
  private readonly strict: boolean;
  private readonly logger: Logger;

  /**
   * Validate every enabled check up front
   *
   * @throws QualityConfigError on an unknown check name or invalid parameters
   */
  constructor(configs: readonly QualityCheckConfig[], options: QualityAssessorOptions = {}) {
    const registry = options.registry ?? BUILTIN_CHECKS;
    this.strict = options.strict ?? false;
    this.logger = options.logger ?? new Logger();

    this.checks = configs
      .filter((config) => config.enabled)
      .map((config) => {
        const definition = registry.find((d) => d.name === config.name);
        if (!definition) {
          throw new QualityConfigError({
            message: `Unknown quality check: ${config.name}`,
            suggestion: `Available checks: ${registry.map((d) => d.name).join(', ')}`,
            context: { check: config.name },
          });
        }
        return { name: definition.name, config, run: definition.bind(config.parameters) };
      });
  }

  get checkNames(): QualityCheckName[] {
    return this.checks.map((c) => c.name);
  }

  /**
   * Run every check concurrently; results keep configuration order
   *
   * @throws QualityCheckRuntimeError in strict mode when a check cannot run
   */
  async assess(dataset: QualityDataset): Promise<QualityAssessment> {
    const totalRecords = dataset.records.length;
    const results = await Promise.all(
      this.checks.map(async (check) => this.runCheck(check, dataset))
    );
    return { score: compositeScore(results), totalRecords, results };
  }

  private async runCheck(check: ConfiguredCheck, dataset: QualityDataset): Promise<QualityCheckResult> {
    const { config } = check;
    const totalRecords = dataset.records.length;

    try {
      const finding = check.run(dataset);
      const violatingRecordIds = [...finding.violatingRecordIds].sort((a, b) => a - b);
      return this.toResult(check, {
        passed: finding.passed,
        violatingRecordIds,
        severity: config.severity,
        message: finding.message,
        totalRecords,
      });
    } catch (err) {
      const error =
        err instanceof QualityCheckRuntimeError
          ? err
          : new QualityCheckRuntimeError({
              message: `Quality check '${config.name}' failed: ${err instanceof Error ? err.message : String(err)}`,
              cause: err instanceof Error ? err : undefined,
              context: { check: config.name },
            });

      if (this.strict) throw error;

      this.logger.warn('Quality check failed to run', { check: config.name, error: error.message });
      return this.toResult(check, {
        passed: false,
        violatingRecordIds: dataset.records.map((r) => r.recordId),
        severity: 'fatal',
        message: error.message,
        totalRecords,
      });
    }
  }

  private toResult(
    check: ConfiguredCheck,
    outcome: {
      passed: boolean;
      violatingRecordIds: number[];
      severity: QualitySeverity;
      message: string;
      totalRecords: number;
    }
  ): QualityCheckResult {
    const { config } = check;
    const violationCount = outcome.violatingRecordIds.length;
    const penalty =
      outcome.passed || outcome.totalRecords === 0
        ? 0
        : (config.severityWeight * violationCount) / outcome.totalRecords;

    return {
      checkName: check.name,
      passed: outcome.passed,
      violationCount,
      violatingRecordIds: outcome.violatingRecordIds,
      severity: outcome.severity,
      severityWeight: config.severityWeight,
      penalty,
      message: outcome.message,
    };
  }
}
