/**
 * Run Summary Formatter
 *
 * Plain-text summary of a harmonization run.
 */

import type { RunResult } from '../types/index.js';
import { formatPercent } from './utils.js';

/**
 * Format a run result as plain text
 */
export function formatRunSummary(result: RunResult): string {
  const lines: string[] = [];
  const { stats, quality } = result;

  // Header
  lines.push(`## Harmonization Run ${result.runId}`);
  lines.push(`Status: ${result.status}`);
  lines.push('');

  // Resolution
  lines.push(`### Resolution`);
  lines.push(`- Records: ${stats.totalRecords}`);
  lines.push(`- Resolved: ${stats.resolvedCount} (direct ${stats.byStrategy.direct}, fuzzy ${stats.byStrategy.fuzzy}, suggested ${stats.byStrategy.suggested})`);
  lines.push(`- Escalated: ${stats.escalatedCount}`);
  if (stats.cancelledCount > 0) {
    lines.push(`- Cancelled before dispatch: ${stats.cancelledCount}`);
  }
  lines.push(`- Mapping Rate: ${formatPercent(stats.mappingRate)}`);
  lines.push('');

  // Quality
  lines.push(`### Quality`);
  lines.push(`- Score: ${quality.score.toFixed(4)} / 100`);
  const failed = quality.results.filter((r) => !r.passed);
  lines.push(`- Checks: ${quality.results.length - failed.length} passed, ${failed.length} failed`);

  if (failed.length > 0) {
    lines.push('');
    lines.push(`### Failed Checks`);
    for (const check of failed) {
      lines.push(`- ${check.checkName} [${check.severity}]: ${check.violationCount} violation(s), -${check.penalty.toFixed(2)} (${check.message})`);
    }
  }

  return lines.join('\n');
}
