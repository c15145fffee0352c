import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { RadarBuildResult } from './pipeline';
import { buildCurationReport, sortDecisions, toFullEntry, toPublicEntry, writeRadar } from './radarWriter';
import { makeDecision } from './testing/fakes';

const decisions = [
  makeDecision({ name: 'Kafka', ring: 'Trial', quadrant: 'Platforms', reposCount: 4, confidence: 0.7 }),
  makeDecision({ name: 'Go', ring: 'Adopt', quadrant: 'Languages & Frameworks', reposCount: 4, confidence: 0.9 }),
  makeDecision({ name: 'Bower', ring: 'Hold', quadrant: 'Tools', reposCount: 1, confidence: 0.9 }),
  makeDecision({ name: 'Helm', ring: 'Trial', quadrant: 'Tools', reposCount: 6, confidence: 0.8 }),
];

function radarOf(): RadarBuildResult {
  return {
    totalRepos: 20,
    classified: decisions,
    decisions,
    excluded: [{ name: 'Makefile', reposCount: 3, reason: 'Matches an exclude pattern' }],
    curation: null,
    oracleFallbacks: 0,
  };
}

describe('sortDecisions', () => {
  const names = (sortBy: 'usage' | 'name' | 'ring' | 'confidence'): string[] =>
    sortDecisions(decisions, sortBy).map((d) => d.name);

  it('orders by each supported key with name as the tie-break', () => {
    expect(names('usage')).toEqual(['Helm', 'Go', 'Kafka', 'Bower']);
    expect(names('name')).toEqual(['Bower', 'Go', 'Helm', 'Kafka']);
    expect(names('ring')).toEqual(['Go', 'Helm', 'Kafka', 'Bower']);
    expect(names('confidence')).toEqual(['Bower', 'Go', 'Helm', 'Kafka']);
  });

  it('does not reorder its input', () => {
    sortDecisions(decisions, 'name');
    expect(decisions[0].name).toBe('Kafka');
  });
});

describe('entries', () => {
  it('shapes the public entry with quadrant and ring indexes', () => {
    expect(toPublicEntry(decisions[0])).toEqual({
      name: 'Kafka',
      quadrant: 2,
      ring: 1,
      description: 'Kafka description',
      moved: 0,
    });
  });

  it('adds review metadata and curation provenance to the full entry', () => {
    const flagged = makeDecision({
      name: 'Bower',
      needsReview: true,
      reviewReason: 'Limited data (fewer than 3 repos)',
      deprecation: { replacement: 'npm', note: 'Bower is deprecated.' },
    });

    const entry = toFullEntry(flagged);

    expect(entry.review_metadata).toEqual({
      reason: 'Limited data (fewer than 3 repos)',
      status: 'pending',
      human_decision: null,
    });
    expect(entry.deprecation).toEqual({ replacement: 'npm', note: 'Bower is deprecated.' });
    expect('merged_from' in entry).toBe(false);
    expect(toFullEntry(decisions[0]).review_metadata).toBeNull();
  });

  it('reports exclusions even without curation', () => {
    const report = buildCurationReport(radarOf(), new Date('2024-06-01T00:00:00Z'));

    expect(report).toMatchObject({
      generated_at: '2024-06-01T00:00:00.000Z',
      classified: 4,
      published: 4,
      excluded: [{ name: 'Makefile', repos_count: 3, reason: 'Matches an exclude pattern' }],
      stats: null,
      removed: [],
    });
  });
});

describe('writeRadar', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'radar-writer-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes the public, full and report files', async () => {
    const paths = {
      file: path.join(dir, 'out', 'radar.json'),
      fullFile: path.join(dir, 'out', 'radar.full.json'),
      reportFile: path.join(dir, 'reports', 'curation.json'),
    };

    const written = await writeRadar(radarOf(), paths, { sortBy: 'ring', generatedAt: new Date('2024-06-01T00:00:00Z') });

    expect(written).toEqual([paths.file, paths.fullFile, paths.reportFile]);

    const publicText = await fs.readFile(paths.file, 'utf-8');
    expect(publicText.endsWith('}\n]\n')).toBe(true);
    const publicEntries: unknown = JSON.parse(publicText);
    expect(publicEntries).toEqual([
      { name: 'Go', quadrant: 3, ring: 0, description: 'Go description', moved: 0 },
      { name: 'Helm', quadrant: 1, ring: 1, description: 'Helm description', moved: 0 },
      { name: 'Kafka', quadrant: 2, ring: 1, description: 'Kafka description', moved: 0 },
      { name: 'Bower', quadrant: 1, ring: 3, description: 'Bower description', moved: 0 },
    ]);

    const full: unknown = JSON.parse(await fs.readFile(paths.fullFile, 'utf-8'));
    expect(full).toMatchObject({
      metadata: {
        generated_at: '2024-06-01T00:00:00.000Z',
        total_repositories: 20,
        technologies: 4,
        needs_review: 0,
        sort_by: 'ring',
        rings: ['Adopt', 'Trial', 'Assess', 'Hold'],
      },
    });

    const report: unknown = JSON.parse(await fs.readFile(paths.reportFile, 'utf-8'));
    expect(report).toMatchObject({ classified: 4, published: 4 });
  });
});
