import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { RAGOrchestrator } from './RAGOrchestrator.js';
import { ChunkingService } from '../chunking/ChunkingService.js';
import { DocumentProcessor } from '../ingestion/DocumentProcessor.js';
import { FlatVectorStore } from '../vector/FlatVectorStore.js';
import { NO_ANSWER_MESSAGE } from '../llm/prompts/rag-answer.js';
import { STRUCTURED_FALLBACK_ERROR } from '../llm/structuredOutput.js';
import { ValidationError } from '../../utils/errors.js';
import { KeywordEmbedder, ScriptedLLM } from '../../testing/fakes.js';

describe('RAGOrchestrator', () => {
  let dir: string;
  let documentsDir: string;
  let indexPath: string;
  let embedder: KeywordEmbedder;
  let llm: ScriptedLLM;
  let store: FlatVectorStore;
  let orchestrator: RAGOrchestrator;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'rag-'));
    documentsDir = join(dir, 'documents');
    indexPath = join(dir, 'index', 'vectors.index');
    await mkdir(documentsDir);

    embedder = new KeywordEmbedder();
    llm = new ScriptedLLM('  The answer is alpha.  ');
    store = new FlatVectorStore(embedder.dimension, indexPath);
    orchestrator = new RAGOrchestrator({
      documentProcessor: new DocumentProcessor(new ChunkingService(1000, 200)),
      embedder,
      vectorStore: store,
      llm,
      documentsDir,
      topK: 3,
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const seedDocuments = async () => {
    await writeFile(join(documentsDir, 'a.txt'), 'alpha alpha beta.');
    await writeFile(join(documentsDir, 'b.md'), 'gamma notes.');
  };

  describe('ingest', () => {
    test('embeds every chunk in one call and persists the index', async () => {
      await seedDocuments();

      const result = await orchestrator.ingest();

      expect(result).toEqual({ status: 'success', chunksProcessed: 2, totalVectors: 2 });
      expect(embedder.calls).toEqual([['alpha alpha beta.', 'gamma notes.']]);

      const reloaded = new FlatVectorStore(embedder.dimension, indexPath);
      await reloaded.load();
      expect(reloaded.size).toBe(2);
      expect(reloaded.getDocument(0)).toMatchObject({ documentName: 'a.txt', documentId: 'a' });
    });

    test('an empty directory yields an error result and embeds nothing', async () => {
      const result = await orchestrator.ingest();

      expect(result).toEqual({
        status: 'error',
        code: 'EMPTY_CORPUS',
        message: 'No documents found to process',
      });
      expect(embedder.calls).toEqual([]);
      expect(store.size).toBe(0);
    });

    test('re-ingesting appends duplicate records', async () => {
      await seedDocuments();

      await orchestrator.ingest();
      const second = await orchestrator.ingest();

      expect(second).toEqual({ status: 'success', chunksProcessed: 2, totalVectors: 4 });
    });

    test('a dimension mismatch rejects the whole batch', async () => {
      await seedDocuments();
      const narrow = new FlatVectorStore(2, indexPath);
      const mismatched = new RAGOrchestrator({
        documentProcessor: new DocumentProcessor(new ChunkingService(1000, 200)),
        embedder,
        vectorStore: narrow,
        llm,
        documentsDir,
        topK: 3,
      });

      const result = await mismatched.ingest();

      expect(result).toEqual({
        status: 'error',
        code: 'DIMENSION_MISMATCH',
        message: 'Dimensionality mismatch at item 0: expected 2, got 3',
      });
      expect(narrow.size).toBe(0);
    });
  });

  describe('query', () => {
    test('answers from the closest chunks with trimmed text and sources', async () => {
      await seedDocuments();
      await orchestrator.ingest();

      const result = await orchestrator.query('alpha alpha', { topK: 1 });

      expect(result.question).toBe('alpha alpha');
      expect(result.answer).toBe('The answer is alpha.');
      expect(result.sources).toEqual([{ document: 'a.txt', score: 1, text: 'alpha alpha beta.' }]);
      expect(Number.isNaN(Date.parse(result.timestamp))).toBe(false);

      expect(llm.prompts).toHaveLength(1);
      expect(llm.prompts[0]).toContain('[Document 1, Score: 1.00]\nalpha alpha beta.');
      expect(llm.prompts[0]).toContain('Question: alpha alpha');
      expect(llm.prompts[0]).toContain(NO_ANSWER_MESSAGE);
    });

    test('uses the configured top k when none is given', async () => {
      await seedDocuments();
      await orchestrator.ingest();

      const result = await orchestrator.query('beta');

      expect(result.sources.map(s => s.document)).toEqual(['b.md', 'a.txt']);
    });

    test('rejects an empty question before embedding', async () => {
      await expect(orchestrator.query('   ')).rejects.toBeInstanceOf(ValidationError);
      expect(embedder.calls).toEqual([]);
      expect(llm.prompts).toEqual([]);
    });

    test('rejects a non-positive top k', async () => {
      await expect(orchestrator.query('alpha', { topK: 0 })).rejects.toThrow('top_k must be a positive integer');
    });

    test('an empty index still produces an answer with no sources', async () => {
      const result = await orchestrator.query('alpha');

      expect(result.sources).toEqual([]);
      expect(llm.prompts[0]).toContain('Context:\n\n\nQuestion: alpha');
    });

    test('long chunks are previewed with an ellipsis', async () => {
      const longText = `alpha ${'x'.repeat(300)}`;
      store.addEmbeddings([longText], [[1, 0, 0]], [{ documentName: 'long.txt' }]);

      const result = await orchestrator.query('alpha');

      expect(result.sources[0].text).toBe(`${longText.slice(0, 200)}...`);
    });

    test('a chunk without a document name is reported as Unknown', async () => {
      store.addEmbeddings(['alpha'], [[1, 0, 0]]);

      const result = await orchestrator.query('alpha');

      expect(result.sources[0].document).toBe('Unknown');
    });
  });

  describe('streamQuery', () => {
    test('streams the answer fragments', async () => {
      await seedDocuments();
      await orchestrator.ingest();
      llm.answer = 'one two';

      const result = await orchestrator.streamQuery('gamma', { topK: 1 });
      const fragments: string[] = [];
      for await (const fragment of result.answer) {
        fragments.push(fragment);
      }

      expect(fragments).toEqual(['one ', 'two ']);
      expect(result.sources.map(s => s.document)).toEqual(['b.md']);
    });
  });

  describe('queryStructured', () => {
    const schema = { type: 'object', properties: { name: { type: 'string' } } };

    test('returns the parsed object as the answer', async () => {
      await seedDocuments();
      await orchestrator.ingest();
      llm.structured = { ok: true, data: { name: 'alpha' } };

      const result = await orchestrator.queryStructured('alpha', schema, { topK: 1 });

      expect(result.answer).toEqual({ name: 'alpha' });
      expect(llm.structuredPrompts).toHaveLength(1);
      expect(llm.structuredPrompts[0].schema).toBe(schema);
    });

    test('maps a failed parse to an error answer carrying the raw response', async () => {
      llm.structured = { ok: false, error: STRUCTURED_FALLBACK_ERROR, rawResponse: 'Sorry, plain text.' };

      const result = await orchestrator.queryStructured('alpha', schema);

      expect(result.answer).toEqual({
        error: 'Failed to generate structured response',
        raw_response: 'Sorry, plain text.',
      });
    });

    test('rejects a response format that is not an object', async () => {
      await expect(orchestrator.queryStructured('alpha', ['name'])).rejects.toBeInstanceOf(ValidationError);
      await expect(orchestrator.queryStructured('alpha', 'name')).rejects.toBeInstanceOf(ValidationError);
      expect(embedder.calls).toEqual([]);
    });

    test('rejects an empty question', async () => {
      await expect(orchestrator.queryStructured('', schema)).rejects.toBeInstanceOf(ValidationError);
      expect(embedder.calls).toEqual([]);
    });
  });

  describe('clearIndex', () => {
    test('empties the index and persists the empty state', async () => {
      await seedDocuments();
      await orchestrator.ingest();

      const result = await orchestrator.clearIndex();

      expect(result).toEqual({ status: 'success', message: 'Vector store index cleared' });
      expect(store.similaritySearch([1, 0, 0], 3)).toEqual([]);

      const reloaded = new FlatVectorStore(embedder.dimension, indexPath);
      await reloaded.load();
      expect(reloaded.size).toBe(0);
    });
  });

  test('stats counts vectors and distinct documents', async () => {
    await seedDocuments();
    await orchestrator.ingest();
    await orchestrator.ingest();

    expect(orchestrator.stats()).toEqual({ totalVectors: 4, dimension: 3, documents: 2 });
  });
});
