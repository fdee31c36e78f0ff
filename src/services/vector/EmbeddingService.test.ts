import type OpenAI from 'openai';
import { EmbeddingService } from './EmbeddingService.js';
import { EmbeddingClientFactory } from './EmbeddingClientFactory.js';
import { EmbeddingError } from '../../utils/errors.js';

type EmbeddingRequest = { model: string; input: string[] };

const vectorFor = (text: string) => [text.length, text.charCodeAt(0)];

describe('EmbeddingService', () => {
  let create: jest.Mock;
  let service: EmbeddingService;

  beforeEach(() => {
    create = jest.fn(async (request: EmbeddingRequest) => ({
      data: request.input
        .map((text, index) => ({ index, embedding: vectorFor(text) }))
        .reverse(),
    }));
    const client = { embeddings: { create } } as unknown as OpenAI;
    service = new EmbeddingService(client, { model: 'nomic-embed-text', dimension: 2, batchSize: 2 });
  });

  test('embeds in batches and keeps input order', async () => {
    const embeddings = await service.embedMany(['a', 'bb', 'ccc']);

    expect(embeddings).toEqual([vectorFor('a'), vectorFor('bb'), vectorFor('ccc')]);
    expect(create).toHaveBeenCalledTimes(2);
    expect(create.mock.calls[0][0]).toEqual({ model: 'nomic-embed-text', input: ['a', 'bb'] });
    expect(create.mock.calls[1][0]).toEqual({ model: 'nomic-embed-text', input: ['ccc'] });
  });

  test('no input makes no request', async () => {
    await expect(service.embedMany([])).resolves.toEqual([]);
    expect(create).not.toHaveBeenCalled();
  });

  test('embedOne returns a single vector', async () => {
    await expect(service.embedOne('hello')).resolves.toEqual(vectorFor('hello'));
  });

  test('a response with a different count is an error', async () => {
    create.mockResolvedValueOnce({ data: [{ index: 0, embedding: [1, 2] }] });

    await expect(service.embedMany(['a', 'b'])).rejects.toThrow('Requested 2 embeddings but received 1');
  });

  test('provider failures are wrapped', async () => {
    create.mockRejectedValueOnce(new Error('connection refused'));

    await expect(service.embedMany(['a'])).rejects.toBeInstanceOf(EmbeddingError);
  });

  test('forwards the abort signal', async () => {
    const controller = new AbortController();

    await service.embedOne('a', { signal: controller.signal });

    expect(create.mock.calls[0][1]).toEqual({ signal: controller.signal });
  });
});

describe('EmbeddingClientFactory', () => {
  afterEach(() => EmbeddingClientFactory.reset());

  test('shares one client until reset', () => {
    const options = { baseUrl: 'http://localhost:11434/v1', apiKey: 'test-secret', timeoutMs: 1000 };
    const first = EmbeddingClientFactory.getClient(options);

    expect(EmbeddingClientFactory.getClient(options)).toBe(first);

    EmbeddingClientFactory.reset();
    expect(EmbeddingClientFactory.getClient(options)).not.toBe(first);
  });

  test('builds a new client when the options change', () => {
    const options = { baseUrl: 'http://localhost:11434/v1', apiKey: 'test-secret', timeoutMs: 1000 };
    const first = EmbeddingClientFactory.getClient(options);
    const second = EmbeddingClientFactory.getClient({ ...options, baseUrl: 'http://localhost:8080/v1' });

    expect(second).not.toBe(first);
    expect(second.baseURL).toBe('http://localhost:8080/v1');
    expect(EmbeddingClientFactory.getClient({ ...options, baseUrl: 'http://localhost:8080/v1' })).toBe(second);
  });
});
