/**
 * Tests for the filesystem cache stores
 */

import os from 'node:os';
import path from 'node:path';
import fs from 'fs-extra';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { collectBody } from '../src/capture.mjs';
import { deriveCacheKey } from '../src/key.mjs';
import {
  FileCacheStore,
  SeparateBodyFileCacheStore,
  createFileCacheStore,
  urlToFilePath,
} from '../src/stores/file.mjs';

describe('FileCacheStore', () => {
  let directory: string;
  let store: FileCacheStore;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'http-cache-test-'));
    store = new FileCacheStore({ directory });
  });

  afterEach(async () => {
    await store.close();
    await fs.remove(directory);
  });

  it('should be a unified store', () => {
    expect(store.kind).toBe('unified');
  });

  it('should store and retrieve values', async () => {
    await store.set('key1', Buffer.from('value1'));
    expect((await store.get('key1'))?.toString()).toBe('value1');
  });

  it('should return null for missing keys', async () => {
    expect(await store.get('missing')).toBeNull();
  });

  it('should fan the hashed key out into five directory levels', () => {
    const filePath = store.pathFor('key1');
    const parts = path.relative(directory, filePath).split(path.sep);

    expect(parts).toHaveLength(6);
    expect(parts[5]).toMatch(/^[0-9a-f]{56}$/);
    expect(parts.slice(0, 5).join('')).toBe(parts[5].slice(0, 5));
  });

  it('should write files readable only by the owner', async () => {
    await store.set('key1', Buffer.from('value1'));
    const stats = await fs.stat(store.pathFor('key1'));
    expect(stats.mode & 0o777).toBe(0o600);
  });

  it('should leave no temporary or lock files behind', async () => {
    await store.set('key1', Buffer.from('value1'));
    const filePath = store.pathFor('key1');
    expect(await fs.readdir(path.dirname(filePath))).toEqual([path.basename(filePath)]);
  });

  it('should delete values and ignore missing files', async () => {
    await store.set('key1', Buffer.from('value1'));
    await store.delete('key1');
    await store.delete('key1');
    expect(await store.get('key1')).toBeNull();
  });

  it('should keep files when forever is set', async () => {
    const keeper = createFileCacheStore({ directory, forever: true });
    await keeper.set('key1', Buffer.from('value1'));
    await keeper.delete('key1');
    expect((await keeper.get('key1'))?.toString()).toBe('value1');
  });

  it('should serialise concurrent writes to the same key', async () => {
    const values = Array.from({ length: 8 }, (_, i) => `value-${i}-${'x'.repeat(1000)}`);

    await Promise.all(values.map((value) => store.set('shared', Buffer.from(value))));

    const stored = (await store.get('shared'))?.toString();
    expect(values).toContain(stored);

    const filePath = store.pathFor('shared');
    expect(await fs.readdir(path.dirname(filePath))).toEqual([path.basename(filePath)]);
  });

  it('should write distinct keys concurrently', async () => {
    const keys = Array.from({ length: 16 }, (_, i) => `key-${i}`);

    await Promise.all(keys.map((key) => store.set(key, Buffer.from(key))));

    const read = await Promise.all(keys.map(async (key) => (await store.get(key))?.toString()));
    expect(read).toEqual(keys);
  });

  it('should map a URL to its cache file', () => {
    const url = 'https://api.example.com/widgets/1';
    expect(urlToFilePath(url, store)).toBe(store.pathFor(deriveCacheKey('GET', url)));
  });
});

describe('SeparateBodyFileCacheStore', () => {
  let directory: string;
  let store: SeparateBodyFileCacheStore;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'http-cache-test-'));
    store = new SeparateBodyFileCacheStore({ directory });
  });

  afterEach(async () => {
    await store.close();
    await fs.remove(directory);
  });

  it('should be a separate-body store', () => {
    expect(store.kind).toBe('separate-body');
  });

  it('should keep metadata and body in sibling files', async () => {
    await store.setMetadata('key1', Buffer.from('meta'));
    await store.setBody('key1', Buffer.from('body bytes'));

    const filePath = store.pathFor('key1');
    expect((await fs.readFile(filePath)).toString()).toBe('meta');
    expect((await fs.readFile(`${filePath}.body`)).toString()).toBe('body bytes');
  });

  it('should stream the body back', async () => {
    await store.setBody('key1', Buffer.from('body bytes'));

    const body = await store.getBody('key1');
    expect(body).not.toBeNull();
    if (body) {
      expect((await collectBody(body)).toString()).toBe('body bytes');
    }
  });

  it('should return null for missing metadata and body', async () => {
    expect(await store.getMetadata('missing')).toBeNull();
    expect(await store.getBody('missing')).toBeNull();
  });

  it('should delete metadata and body together', async () => {
    await store.setMetadata('key1', Buffer.from('meta'));
    await store.setBody('key1', Buffer.from('body'));

    await store.delete('key1');

    expect(await store.getMetadata('key1')).toBeNull();
    expect(await store.getBody('key1')).toBeNull();
  });
});
