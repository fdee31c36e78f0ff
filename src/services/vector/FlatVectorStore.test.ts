import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { FlatVectorStore } from './FlatVectorStore.js';
import { DimensionMismatchError, ValidationError } from '../../utils/errors.js';

describe('FlatVectorStore', () => {
  let dir: string;
  let indexPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'flat-store-'));
    indexPath = join(dir, 'store', 'vectors.index');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const seeded = () => {
    const store = new FlatVectorStore(2, indexPath);
    store.addEmbeddings(
      ['origin', 'right', 'far'],
      [
        [0, 0],
        [1, 0],
        [3, 4],
      ],
      [{ documentName: 'a.txt' }, { documentName: 'b.txt' }, { documentName: 'c.txt' }]
    );
    return store;
  };

  test('starts empty when nothing is persisted', async () => {
    const store = new FlatVectorStore(2, indexPath);
    await store.load();

    expect(store.size).toBe(0);
    expect(store.similaritySearch([0, 0], 3)).toEqual([]);
  });

  test('assigns absolute positions across batches and keeps metadata parallel', () => {
    const store = seeded();
    const handles = store.addEmbeddings(['next'], [[5, 5]]);

    expect(handles).toEqual([3]);
    expect(store.size).toBe(4);
    expect(store.getAllDocuments().map(r => r.index)).toEqual([0, 1, 2, 3]);
    expect(store.getDocument(1)).toEqual({ documentName: 'b.txt', text: 'right', index: 1 });
  });

  test('returns nearest records by ascending squared L2 distance', () => {
    const results = seeded().similaritySearch([0.9, 0], 2);

    expect(results.map(r => r.text)).toEqual(['right', 'origin']);
    expect(results[0].score).toBeCloseTo(0.01, 5);
    expect(results[1].score).toBeCloseTo(0.81, 5);
  });

  test('never returns more than k results and keeps scores non-decreasing', () => {
    const store = seeded();
    const all = store.similaritySearch([2, 2], 10);

    expect(all).toHaveLength(3);
    for (let i = 1; i < all.length; i++) {
      expect(all[i].score).toBeGreaterThanOrEqual(all[i - 1].score);
    }
    expect(store.similaritySearch([2, 2], 0)).toEqual([]);
  });

  test('breaks score ties by insertion order', () => {
    const store = new FlatVectorStore(1, indexPath);
    store.addEmbeddings(['plus', 'minus'], [[1], [-1]]);

    expect(store.similaritySearch([0], 2).map(r => r.text)).toEqual(['plus', 'minus']);
  });

  test('rejects a batch with a wrong-dimension vector without inserting any of it', () => {
    const store = seeded();

    expect(() => store.addEmbeddings(['ok', 'bad'], [[1, 1], [1, 1, 1]])).toThrow(DimensionMismatchError);
    expect(store.size).toBe(3);
    expect(store.getAllDocuments()).toHaveLength(3);
  });

  test('rejects mismatched batch lengths and non-finite values', () => {
    const store = seeded();

    expect(() => store.addEmbeddings(['one', 'two'], [[1, 1]])).toThrow(ValidationError);
    expect(() => store.addEmbeddings(['one'], [[1, Number.NaN]])).toThrow(ValidationError);
    expect(store.size).toBe(3);
  });

  test('rejects a query vector of the wrong dimension', () => {
    expect(() => seeded().similaritySearch([1, 2, 3], 1)).toThrow(DimensionMismatchError);
  });

  test('grows past its initial capacity', () => {
    const store = new FlatVectorStore(1, indexPath);
    const texts = Array.from({ length: 200 }, (_, i) => `t${i}`);
    store.addEmbeddings(texts, texts.map((_, i) => [i]));

    expect(store.size).toBe(200);
    expect(store.similaritySearch([150.2], 1)[0].text).toBe('t150');
  });

  test('out-of-range lookups return undefined', () => {
    const store = seeded();

    expect(store.getDocument(3)).toBeUndefined();
    expect(store.getDocument(-1)).toBeUndefined();
    expect(store.getDocuments([0, 7]).map(r => r?.text)).toEqual(['origin', undefined]);
  });

  test('save then load round-trips vectors, metadata and search results', async () => {
    const store = seeded();
    await store.save();

    const reloaded = new FlatVectorStore(2, indexPath);
    await reloaded.load();

    expect(reloaded.size).toBe(store.size);
    expect(reloaded.getAllDocuments()).toEqual(store.getAllDocuments());
    expect(reloaded.similaritySearch([1, 1], 3)).toEqual(store.similaritySearch([1, 1], 3));
  });

  test('clear empties the index and a subsequent save makes it durable', async () => {
    const store = seeded();
    await store.save();
    store.clear();
    await store.save();

    expect(store.similaritySearch([0, 0], 5)).toEqual([]);

    const reloaded = new FlatVectorStore(2, indexPath);
    await reloaded.load();
    expect(reloaded.size).toBe(0);
  });

  test('falls back to an empty index when the metadata sidecar is corrupt', async () => {
    await seeded().save();
    await writeFile(`${indexPath}.json`, '{not json', 'utf-8');

    const reloaded = new FlatVectorStore(2, indexPath);
    await reloaded.load();

    expect(reloaded.size).toBe(0);
  });

  test('falls back to an empty index when the sidecar is missing', async () => {
    await seeded().save();
    await rm(`${indexPath}.json`);

    const reloaded = new FlatVectorStore(2, indexPath);
    await reloaded.load();

    expect(reloaded.size).toBe(0);
  });

  test('falls back to an empty index when the persisted dimension differs', async () => {
    await seeded().save();

    const reloaded = new FlatVectorStore(3, indexPath);
    await reloaded.load();

    expect(reloaded.size).toBe(0);
  });

  test('falls back to an empty index when the index blob is garbage', async () => {
    await seeded().save();
    await writeFile(indexPath, 'garbage');

    const reloaded = new FlatVectorStore(2, indexPath);
    await reloaded.load();

    expect(reloaded.size).toBe(0);
  });
});
