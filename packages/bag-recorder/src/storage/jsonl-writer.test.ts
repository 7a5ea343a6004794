import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, readFile, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { JsonlBagWriter } from './jsonl-writer.js';
import { buildStorageOptions } from './bag-writer.js';
import { StorageUnavailableError } from '../errors.js';
import { Logger } from '../utils/logger.js';

function quietLogger(): Logger {
  const log = new Logger();
  log.setOutput(() => {});
  return log;
}

describe('JsonlBagWriter', () => {
  let root: string;
  let clockMs: number;
  let writer: JsonlBagWriter;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'bag-writer-'));
    clockMs = 1000;
    writer = new JsonlBagWriter({ now: () => clockMs, log: quietLogger() });
  });

  afterEach(async () => {
    await writer.close().catch(() => {});
    await rm(root, { recursive: true, force: true });
  });

  it('creates the bag directory and its first file on open', async () => {
    const uri = join(root, 'nested', 'Bag_2024_10_02_03_04_05');
    await writer.open(buildStorageOptions(uri, 60));

    expect(writer.isOpen).toBe(true);
    expect(await readdir(uri)).toEqual(['Bag_2024_10_02_03_04_05_0.jsonl']);
  });

  it('writes one JSON line per message and metadata on close', async () => {
    const uri = join(root, 'Bag_A');
    await writer.open(buildStorageOptions(uri, 60));

    writer.write({ topic: '/a', type: 'std_msgs/msg/String', timestamp: 1000, data: { data: 'x' } });
    writer.write({ topic: '/b', timestamp: 1500, data: 7 });
    clockMs = 5000;
    await writer.close();

    expect(writer.isOpen).toBe(false);
    const content = await readFile(join(uri, 'Bag_A_0.jsonl'), 'utf-8');
    expect(content).toBe(
      '{"topic":"/a","type":"std_msgs/msg/String","timestamp":1000,"data":{"data":"x"}}\n' +
      '{"topic":"/b","type":null,"timestamp":1500,"data":7}\n'
    );

    const metadata = parseYaml(await readFile(join(uri, 'metadata.yaml'), 'utf-8'));
    expect(metadata).toEqual({
      version: 1,
      storage_identifier: 'jsonl',
      relative_file_paths: ['Bag_A_0.jsonl'],
      starting_time_ms: 1000,
      duration_ms: 4000,
      message_count: 2,
      topics_with_message_count: [
        { name: '/a', type: 'std_msgs/msg/String', message_count: 1 },
        { name: '/b', type: '', message_count: 1 },
      ],
      files: [{ path: 'Bag_A_0.jsonl', starting_time_ms: 1000, message_count: 2 }],
    });
  });

  it('rotates to a new file once the duration has elapsed', async () => {
    const uri = join(root, 'Bag_R');
    await writer.open(buildStorageOptions(uri, 60));

    writer.write({ topic: '/a', timestamp: 1000, data: 1 });
    clockMs = 60_999;
    writer.write({ topic: '/a', timestamp: 60_999, data: 2 });
    clockMs = 61_000;
    writer.write({ topic: '/a', timestamp: 61_000, data: 3 });
    await writer.close();

    expect(writer.relativeFilePaths).toEqual(['Bag_R_0.jsonl', 'Bag_R_1.jsonl']);
    expect((await readFile(join(uri, 'Bag_R_0.jsonl'), 'utf-8')).trim().split('\n')).toHaveLength(2);
    expect(await readFile(join(uri, 'Bag_R_1.jsonl'), 'utf-8')).toBe(
      '{"topic":"/a","type":null,"timestamp":61000,"data":3}\n'
    );
  });

  it('rotates on the writer clock when message stamps use another epoch', async () => {
    const uri = join(root, 'Bag_E');
    await writer.open(buildStorageOptions(uri, 60));

    writer.write({ topic: '/a', timestamp: 1_700_000_000, data: 1 });
    clockMs = 31_000;
    writer.write({ topic: '/a', timestamp: 1_700_000_300, data: 2 });
    clockMs = 62_000;
    writer.write({ topic: '/a', timestamp: 1_700_000_600, data: 3 });
    await writer.close();

    expect(writer.relativeFilePaths).toEqual(['Bag_E_0.jsonl', 'Bag_E_1.jsonl']);
    expect(await readFile(join(uri, 'Bag_E_1.jsonl'), 'utf-8')).toBe(
      '{"topic":"/a","type":null,"timestamp":1700000600,"data":3}\n'
    );
    const metadata = parseYaml(await readFile(join(uri, 'metadata.yaml'), 'utf-8'));
    expect(metadata.files).toEqual([
      { path: 'Bag_E_0.jsonl', starting_time_ms: 1000, message_count: 2 },
      { path: 'Bag_E_1.jsonl', starting_time_ms: 62_000, message_count: 1 },
    ]);
  });

  it('does not rotate when only the message stamps jump ahead', async () => {
    const uri = join(root, 'Bag_J');
    await writer.open(buildStorageOptions(uri, 60));

    writer.write({ topic: '/a', timestamp: 0, data: 1 });
    writer.write({ topic: '/a', timestamp: 1_000_000_000_000, data: 2 });
    writer.write({ topic: '/a', timestamp: 2_000_000_000_000, data: 3 });
    await writer.close();

    expect(writer.relativeFilePaths).toEqual(['Bag_J_0.jsonl']);
  });

  it('rotates by size when a size limit is set', async () => {
    const uri = join(root, 'Bag_S');
    await writer.open({ ...buildStorageOptions(uri, 0), maxBagfileSize: 10 });

    writer.write({ topic: '/a', timestamp: 1, data: 'first' });
    writer.write({ topic: '/a', timestamp: 2, data: 'second' });
    await writer.close();

    expect(writer.relativeFilePaths).toEqual(['Bag_S_0.jsonl', 'Bag_S_1.jsonl']);
  });

  it('flushes to disk once the cache budget is reached', async () => {
    const uri = join(root, 'Bag_C');
    await writer.open({ ...buildStorageOptions(uri, 60), maxCacheSize: 1 });

    writer.write({ topic: '/a', timestamp: 1, data: 1 });

    await vi.waitFor(async () => {
      expect(await readFile(join(uri, 'Bag_C_0.jsonl'), 'utf-8')).toBe(
        '{"topic":"/a","type":null,"timestamp":1,"data":1}\n'
      );
    });
  });

  it('keeps messages cached below the budget until close', async () => {
    const uri = join(root, 'Bag_K');
    await writer.open(buildStorageOptions(uri, 60));

    writer.write({ topic: '/a', timestamp: 1, data: 1 });
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(await readFile(join(uri, 'Bag_K_0.jsonl'), 'utf-8')).toBe('');
  });

  it('reports a failed flush once and refuses later writes', async () => {
    const uri = join(root, 'Bag_F');
    await writer.open({ ...buildStorageOptions(uri, 60), maxCacheSize: 1 });
    const failures: StorageUnavailableError[] = [];
    writer.onFailure((error) => failures.push(error));

    await rm(uri, { recursive: true, force: true });
    writer.write({ topic: '/a', timestamp: 1, data: 1 });
    writer.write({ topic: '/a', timestamp: 2, data: 2 });

    await vi.waitFor(() => {
      expect(failures).toHaveLength(1);
    });
    expect(failures[0]?.message.startsWith(`Write to ${join(uri, 'Bag_F_0.jsonl')} failed:`)).toBe(true);
    expect(() => writer.write({ topic: '/a', timestamp: 3, data: 3 })).toThrow(failures[0]);
    await expect(writer.close()).rejects.toBe(failures[0]);
    expect(failures).toHaveLength(1);
  });

  it('stops notifying a listener once unsubscribed', async () => {
    const uri = join(root, 'Bag_U');
    await writer.open({ ...buildStorageOptions(uri, 60), maxCacheSize: 1 });
    const listener = vi.fn();
    writer.onFailure(listener)();

    await rm(uri, { recursive: true, force: true });
    writer.write({ topic: '/a', timestamp: 1, data: 1 });

    await expect(writer.close()).rejects.toBeInstanceOf(StorageUnavailableError);
    expect(listener).not.toHaveBeenCalled();
  });

  it('refuses to reuse an existing bag directory', async () => {
    const uri = join(root, 'Bag_taken');
    await mkdir(uri);

    await expect(writer.open(buildStorageOptions(uri, 60))).rejects.toBeInstanceOf(StorageUnavailableError);
    expect(writer.isOpen).toBe(false);
  });

  it('rejects snapshot mode', async () => {
    const uri = join(root, 'Bag_snap');
    await expect(writer.open({ ...buildStorageOptions(uri, 60), snapshotMode: true }))
      .rejects.toThrow('Snapshot mode is not supported by the jsonl writer');
  });

  it('throws when writing to a closed writer', () => {
    expect(() => writer.write({ topic: '/a', timestamp: 1, data: 1 })).toThrow('Writer is not open');
  });

  it('treats close on a closed writer as a no-op', async () => {
    await expect(writer.close()).resolves.toBeUndefined();
  });
});
