import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile, mkdir } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { CheckpointError } from '@minutely/contracts';
import { CheckpointStore } from '../src/checkpoint-store.js';
import { BarStore } from '../src/bar-store.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'minutely-stores-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('CheckpointStore', () => {
  it('should start empty when no file exists', async () => {
    const store = new CheckpointStore(path.join(dir, 'checkpoint.json'));
    await expect(store.load()).resolves.toEqual({ nextIndex: 0, items: [] });
  });

  it('should start empty on corrupt or mis-shaped files', async () => {
    const filePath = path.join(dir, 'checkpoint.json');
    const store = new CheckpointStore(filePath);

    await writeFile(filePath, '{"nextIndex": 3, "items": [');
    await expect(store.load()).resolves.toEqual({ nextIndex: 0, items: [] });

    await writeFile(filePath, JSON.stringify({ nextIndex: 'three', items: ['A'] }));
    await expect(store.load()).resolves.toEqual({ nextIndex: 0, items: [] });
  });

  it('should save atomically and leave no temp files', async () => {
    const filePath = path.join(dir, 'state', 'checkpoint.json');
    const store = new CheckpointStore(filePath);

    await store.save(1, ['IT001', 'IT002']);

    expect(JSON.parse(await readFile(filePath, 'utf8'))).toEqual({
      nextIndex: 1,
      items: ['IT001', 'IT002'],
    });
    expect(await readdir(path.dirname(filePath))).toEqual(['checkpoint.json']);
  });

  it('should keep the persisted position for an unchanged list', async () => {
    const store = new CheckpointStore(path.join(dir, 'checkpoint.json'));
    await store.save(2, ['A', 'B', 'C']);

    await expect(store.reconcile(['A', 'B', 'C'])).resolves.toEqual({
      nextIndex: 2,
      items: ['A', 'B', 'C'],
    });
  });

  it('should clamp an out-of-range position', async () => {
    const store = new CheckpointStore(path.join(dir, 'checkpoint.json'));

    await store.save(9, ['A', 'B']);
    expect((await store.reconcile(['A', 'B'])).nextIndex).toBe(2);

    await store.save(-4, ['A', 'B']);
    expect((await store.reconcile(['A', 'B'])).nextIndex).toBe(0);
  });

  it('should restart at zero when the list changed in content or order', async () => {
    const store = new CheckpointStore(path.join(dir, 'checkpoint.json'));
    await store.save(1, ['A', 'B']);

    await expect(store.reconcile(['B', 'A'])).resolves.toEqual({ nextIndex: 0, items: ['B', 'A'] });
    await expect(store.reconcile(['A', 'B', 'C'])).resolves.toEqual({
      nextIndex: 0,
      items: ['A', 'B', 'C'],
    });
  });

  it('should raise CheckpointError when the target cannot be replaced', async () => {
    const blocked = path.join(dir, 'blocked');
    await mkdir(path.join(blocked, 'inner'), { recursive: true });
    const store = new CheckpointStore(blocked);

    await expect(store.save(1, ['A'])).rejects.toBeInstanceOf(CheckpointError);
    expect((await readdir(dir)).sort()).toEqual(['blocked']);
  });
});

describe('BarStore', () => {
  const bars = [
    { date: 20250102, time: 901, open: 100, high: 101, low: 99, close: 100.5, volume: 10 },
    { date: 20250102, time: 902, open: 100.5, high: 102, low: 100, close: 101, volume: 7 },
  ];

  it('should name artifacts after the item', () => {
    const store = new BarStore(dir);
    expect(store.pathFor('A005930')).toBe(path.join(dir, 'A005930_1min_2y.csv'));
    expect(new BarStore(dir, '.csv').pathFor('A005930')).toBe(path.join(dir, 'A005930.csv'));
  });

  it('should write a header and one row per bar', async () => {
    const store = new BarStore(path.join(dir, 'out'));

    const filePath = await store.write('A005930', bars);

    expect(await readFile(filePath, 'utf8')).toBe(
      'date,time,open,high,low,close,volume\n' +
        '20250102,901,100,101,99,100.5,10\n' +
        '20250102,902,100.5,102,100,101,7\n'
    );
  });

  it('should read back what it wrote', async () => {
    const store = new BarStore(dir);
    await store.write('A005930', bars);

    await expect(store.read('A005930')).resolves.toEqual(bars);
  });

  it('should treat missing and empty files as absent', async () => {
    const store = new BarStore(dir);
    expect(await store.exists('A005930')).toBe(false);

    await writeFile(store.pathFor('A005930'), '');
    expect(await store.exists('A005930')).toBe(false);

    await store.write('A005930', bars);
    expect(await store.exists('A005930')).toBe(true);
  });
});
