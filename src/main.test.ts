import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { silentLogger } from './logger';
import type { CliOptions } from './main';
import { buildProgram, curationOptionsFrom, runScan } from './main';
import { parseConfig } from './config';
import { RecordLog } from './recordLog';
import type { RepositorySnapshot, RepositorySummary } from './model';
import { FakeClock, InMemoryDataSource, ScriptedOracle, fakeRepository, makeRecord } from './testing/fakes';

const MANIFEST = JSON.stringify({ dependencies: { react: '^18.0.0' } });

function organization() {
  return {
    acme: ['api', 'web', 'worker'].map((name) =>
      fakeRepository({ name, files: { 'package.json': MANIFEST, Dockerfile: 'FROM node:20' } })
    ),
  };
}

function oracle(): ScriptedOracle {
  return new ScriptedOracle({
    technology: (q) =>
      q.name === 'Docker'
        ? { quadrant: 'Platforms', description: 'Container runtime.', confidence: 'high' }
        : { quadrant: 'Languages & Frameworks', description: 'UI library.', confidence: 'high' },
  });
}

describe('runScan', () => {
  let dir: string;
  let configFile: string;
  let out: (name: string) => string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'radar-run-'));
    out = (name) => path.join(dir, name);
    configFile = out('config.yaml');
    await fs.writeFile(
      configFile,
      JSON.stringify({
        github: { organizations: ['acme'] },
        checkpoint: { file: out('checkpoint.json') },
        cache: { file: out('cache.json') },
        classification: { domain_detection: false },
        output: {
          file: out('radar.json'),
          full_file: out('radar.full.json'),
          report_file: out('report.json'),
          records_file: out('records.jsonl'),
        },
      }),
      'utf-8'
    );
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const options = (overrides: Partial<CliOptions> = {}): CliOptions => ({
    config: configFile,
    resume: false,
    fresh: false,
    dryRun: false,
    ai: true,
    verbose: false,
    ...overrides,
  });

  const readJson = async (name: string): Promise<unknown> => JSON.parse(await fs.readFile(out(name), 'utf-8'));

  it('scans, scores and writes the radar', async () => {
    const source = new InMemoryDataSource(organization());

    await runScan(options(), { source, oracle: oracle(), clock: new FakeClock(), logger: silentLogger, env: {} });

    expect(await readJson('radar.json')).toEqual([
      { name: 'Docker', quadrant: 2, ring: 0, description: 'Container runtime.', moved: 0 },
      { name: 'React', quadrant: 3, ring: 0, description: 'UI library.', moved: 0 },
    ]);
    expect(await readJson('radar.full.json')).toMatchObject({
      metadata: { generated_at: '2024-06-01T00:00:00.000Z', total_repositories: 3, technologies: 2 },
    });
    expect(await readJson('checkpoint.json')).toMatchObject({
      scanned_repos: ['acme/api', 'acme/web', 'acme/worker'],
      end_time: '2024-06-01T00:00:00.000Z',
    });
    expect((await new RecordLog(out('records.jsonl')).readAll()).map((r) => r.id)).toEqual([
      'acme/api',
      'acme/web',
      'acme/worker',
    ]);
  });

  it('resumes from the checkpoint and restores earlier records', async () => {
    await fs.writeFile(
      out('checkpoint.json'),
      JSON.stringify({
        scanned_repos: ['acme/api'],
        start_time: '2024-05-31T00:00:00.000Z',
        last_update: '2024-05-31T00:00:00.000Z',
        end_time: null,
        stats: null,
      }),
      'utf-8'
    );
    await new RecordLog(out('records.jsonl')).append(
      makeRecord({ id: 'acme/api', frameworks: ['React'], platforms: ['Docker'] })
    );
    const source = new InMemoryDataSource(organization());

    await runScan(options({ resume: true }), {
      source,
      oracle: oracle(),
      clock: new FakeClock(),
      logger: silentLogger,
      env: {},
    });

    expect(source.callsOf('snapshot')).toEqual(['snapshot:acme/web', 'snapshot:acme/worker']);
    expect(await readJson('radar.full.json')).toMatchObject({ metadata: { total_repositories: 3 } });
    expect(await readJson('checkpoint.json')).toMatchObject({
      scanned_repos: ['acme/api', 'acme/web', 'acme/worker'],
      start_time: '2024-05-31T00:00:00.000Z',
      stats: { reposScanned: 2, reposSkipped: 1 },
    });
  });

  it('writes no radar files on a dry run', async () => {
    const source = new InMemoryDataSource(organization());

    await runScan(options({ dryRun: true }), {
      source,
      oracle: oracle(),
      clock: new FakeClock(),
      logger: silentLogger,
      env: {},
    });

    await expect(fs.access(out('radar.json'))).rejects.toThrow();
    await expect(fs.access(out('records.jsonl'))).rejects.toThrow();
    await expect(fs.access(out('checkpoint.json'))).rejects.toThrow();
    await expect(fs.access(out('cache.json'))).rejects.toThrow();
    expect(source.callsOf('snapshot')).toHaveLength(3);
  });

  it('rescans everything when resuming after a dry run', async () => {
    const deps = { oracle: oracle(), clock: new FakeClock(), logger: silentLogger, env: {} };
    await runScan(options({ dryRun: true }), { ...deps, source: new InMemoryDataSource(organization()) });

    const source = new InMemoryDataSource(organization());
    await runScan(options({ resume: true }), { ...deps, source });

    expect(source.callsOf('snapshot')).toEqual(['snapshot:acme/api', 'snapshot:acme/web', 'snapshot:acme/worker']);
    expect(await readJson('radar.full.json')).toMatchObject({ metadata: { total_repositories: 3 } });
  });

  it('removes the previous checkpoint before a new run scans anything', async () => {
    await fs.writeFile(
      out('checkpoint.json'),
      JSON.stringify({ scanned_repos: ['acme/api', 'acme/web', 'acme/worker'], start_time: null, last_update: null }),
      'utf-8'
    );
    const checkpointSeen: boolean[] = [];
    class ObservedSource extends InMemoryDataSource {
      async fetchSnapshot(repo: RepositorySummary): Promise<RepositorySnapshot> {
        checkpointSeen.push(await fs.access(out('checkpoint.json')).then(() => true, () => false));
        return super.fetchSnapshot(repo);
      }
    }

    await runScan(options(), {
      source: new ObservedSource(organization()),
      oracle: oracle(),
      clock: new FakeClock(),
      logger: silentLogger,
      env: {},
    });

    expect(checkpointSeen).toEqual([false, false, false]);
  });

  it('reuses cached results for unchanged repositories on the next run', async () => {
    const deps = { oracle: oracle(), clock: new FakeClock(), logger: silentLogger, env: {} };
    await runScan(options(), { ...deps, source: new InMemoryDataSource(organization()) });

    const second = new InMemoryDataSource(organization());
    await runScan(options(), { ...deps, source: second });
    expect(second.callsOf('snapshot')).toEqual([]);
    expect(await readJson('radar.json')).toHaveLength(2);

    const fresh = new InMemoryDataSource(organization());
    await runScan(options({ fresh: true }), { ...deps, source: fresh });
    expect(fresh.callsOf('snapshot')).toHaveLength(3);
  });

  it('requires an organization', async () => {
    await fs.writeFile(configFile, 'github:\n  organizations: []\n', 'utf-8');

    await expect(
      runScan(options(), { source: new InMemoryDataSource({}), oracle: oracle(), logger: silentLogger, env: {} })
    ).rejects.toThrow('No GitHub organizations configured');
  });
});

describe('CLI', () => {
  const parse = (args: string[]): CliOptions =>
    buildProgram()
      .exitOverride()
      .configureOutput({ writeErr: () => undefined })
      .parse(['node', 'tech-radar-scan', ...args])
      .opts<CliOptions>();

  it('parses flags with their defaults', () => {
    expect(parse(['--org', 'acme', 'globex', '--limit', '5', '--no-ai'])).toEqual({
      config: 'config.yaml',
      org: ['acme', 'globex'],
      limit: 5,
      resume: false,
      fresh: false,
      dryRun: false,
      ai: false,
      verbose: false,
    });
  });

  it('rejects a limit that is not a positive integer', () => {
    expect(() => parse(['--limit', '0'])).toThrow('Expected a positive integer.');
  });

  it('maps disabled filtering to no curation', () => {
    expect(curationOptionsFrom(parseConfig('filtering:\n  enabled: false\n'))).toBeNull();
    expect(curationOptionsFrom(parseConfig(''))).toMatchObject({ alwaysIncludeIfReposGte: 5, duplicateDetection: true });
  });
});
