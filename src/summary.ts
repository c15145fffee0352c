// src/summary.ts
// End-of-run summary: scan statistics, ring distribution, review queue and curation counts.

import chalk from 'chalk';
import type { Logger } from './logger';
import type { ClassificationDecision, Ring, ScanStats } from './model';
import { RINGS } from './model';
import type { RadarBuildResult } from './pipeline';

export function ringDistribution(decisions: readonly ClassificationDecision[]): Record<Ring, number> {
  const counts: Record<Ring, number> = { Adopt: 0, Trial: 0, Assess: 0, Hold: 0 };
  for (const decision of decisions) {
    counts[decision.ring] += 1;
  }
  return counts;
}

/**
 * Summary lines grouped by heading. Plain text; printRunSummary adds color.
 */
export function summarizeRun(stats: ScanStats, radar: RadarBuildResult | null): Array<[string, string[]]> {
  const quota =
    stats.rateLimitRemaining === null
      ? 'unknown'
      : `${stats.rateLimitRemaining}${stats.rateLimitResetAt ? ` (resets ${stats.rateLimitResetAt})` : ''}`;

  const sections: Array<[string, string[]]> = [
    [
      '📊 Scan',
      [
        `Repositories scanned: ${stats.reposScanned}`,
        `Skipped (already in checkpoint): ${stats.reposSkipped}`,
        `Filtered out: ${stats.reposFiltered}`,
        `Missing since listing: ${stats.reposMissing}`,
        `API calls: ${stats.apiCalls}`,
        `Errors: ${stats.errors}`,
        `Rate limit remaining: ${quota}`,
      ],
    ],
  ];
  if (radar === null) return sections;

  const rings = ringDistribution(radar.decisions);
  const review = radar.decisions.filter((d) => d.needsReview).length;
  sections.push([
    '🎯 Radar',
    [
      `Technologies: ${radar.decisions.length} (${radar.excluded.length} below threshold or excluded)`,
      ...RINGS.map((ring) => `${ring}: ${rings[ring]}`),
      `Needs review: ${review}`,
    ],
  ]);

  if (radar.curation !== null) {
    const c = radar.curation.stats;
    sections.push([
      '🧹 Curation',
      [
        `Evaluated: ${c.evaluated}`,
        `Kept: ${c.kept}`,
        `Removed: ${c.removed}`,
        `Merged: ${c.merged}`,
        `Consolidated: ${c.consolidated}`,
        `Deprecated: ${c.deprecated}`,
        `Oracle calls: ${c.oracleCalls}`,
      ],
    ]);
  }
  return sections;
}

export function printRunSummary(logger: Logger, stats: ScanStats, radar: RadarBuildResult | null): void {
  for (const [title, lines] of summarizeRun(stats, radar)) {
    logger.section(title);
    for (const line of lines) {
      logger.info(chalk.cyan(`  ${line}`));
    }
  }
}
