import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CheckpointStore } from './CheckpointStore';
import { ConfigError } from './errors';
import { emptyScanStats } from './model';
import { FakeClock } from './testing/fakes';

describe('CheckpointStore', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'checkpoint-test-'));
    file = path.join(dir, 'nested', 'checkpoint.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function readFile(): Promise<unknown> {
    return JSON.parse(await fs.readFile(file, 'utf-8'));
  }

  it('saves every saveInterval completions', async () => {
    const store = new CheckpointStore(file, { saveInterval: 2, clock: new FakeClock() });
    store.begin();

    await store.markScanned('acme/a', { ...emptyScanStats(), reposScanned: 1 });
    await expect(fs.access(file)).rejects.toThrow();

    await store.markScanned('acme/b', { ...emptyScanStats(), reposScanned: 2 });
    expect(await readFile()).toEqual({
      scanned_repos: ['acme/a', 'acme/b'],
      start_time: '2024-06-01T00:00:00.000Z',
      last_update: '2024-06-01T00:00:00.000Z',
      end_time: null,
      stats: { ...emptyScanStats(), reposScanned: 2 },
    });
  });

  it('ignores a repository that is already recorded', async () => {
    const store = new CheckpointStore(file, { saveInterval: 1, clock: new FakeClock() });
    await store.markScanned('acme/a', emptyScanStats());
    await store.markScanned('acme/a', emptyScanStats());
    expect(store.size).toBe(1);
  });

  it('round-trips through load() and stamps the end time on finalize', async () => {
    const clock = new FakeClock();
    const first = new CheckpointStore(file, { saveInterval: 10, clock });
    first.begin();
    await first.markScanned('acme/a', emptyScanStats());
    clock.advance(60_000);
    await first.finalize({ ...emptyScanStats(), reposScanned: 1, apiCalls: 7 });

    const second = new CheckpointStore(file, { clock });
    expect(await second.load()).toBe(true);
    expect(second.isScanned('acme/a')).toBe(true);
    expect(second.isScanned('acme/b')).toBe(false);
    expect(second.lastStats?.apiCalls).toBe(7);
    expect(second.toFile().end_time).toBe('2024-06-01T00:01:00.000Z');

    // A resumed run keeps its original start time and clears the end time.
    second.begin();
    expect(second.toFile().start_time).toBe('2024-06-01T00:00:00.000Z');
    expect(second.toFile().end_time).toBeNull();
  });

  it('reports a missing file as nothing to resume', async () => {
    const store = new CheckpointStore(file);
    expect(await store.load()).toBe(false);
    expect(store.size).toBe(0);
  });

  it('rejects a corrupt file with ConfigError', async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, '{ not json', 'utf-8');
    await expect(new CheckpointStore(file).load()).rejects.toBeInstanceOf(ConfigError);

    await fs.writeFile(file, JSON.stringify({ scanned_repos: 'acme/a' }), 'utf-8');
    await expect(new CheckpointStore(file).load()).rejects.toBeInstanceOf(ConfigError);
  });

  it('clear() forgets progress and removes the file', async () => {
    const store = new CheckpointStore(file, { saveInterval: 1 });
    await store.markScanned('acme/a', emptyScanStats());
    await store.clear();

    expect(store.size).toBe(0);
    await expect(fs.access(file)).rejects.toThrow();
  });

  it('keeps progress in memory only when persistence is off', async () => {
    const store = new CheckpointStore(file, { saveInterval: 1, persist: false });
    await store.markScanned('acme/a', emptyScanStats());
    await store.finalize(emptyScanStats());

    expect(store.isScanned('acme/a')).toBe(true);
    await expect(fs.access(file)).rejects.toThrow();
  });
});
