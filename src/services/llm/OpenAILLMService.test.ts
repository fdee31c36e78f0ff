import type OpenAI from 'openai';
import { OpenAILLMService } from './OpenAILLMService.js';
import { GenerationError } from '../../utils/errors.js';

const completion = (content: string | null) => ({ choices: [{ message: { content } }] });

describe('OpenAILLMService', () => {
  let create: jest.Mock;
  let list: jest.Mock;
  let service: OpenAILLMService;

  beforeEach(() => {
    create = jest.fn();
    list = jest.fn();
    const client = { chat: { completions: { create } }, models: { list } } as unknown as OpenAI;
    service = new OpenAILLMService(client, { model: 'llama3', maxTokens: 256, temperature: 0.1 });
  });

  test('generate sends a single user message and returns the content', async () => {
    create.mockResolvedValue(completion('Paris.'));

    await expect(service.generate('Capital of France?')).resolves.toBe('Paris.');
    expect(create).toHaveBeenCalledWith(
      {
        model: 'llama3',
        messages: [{ role: 'user', content: 'Capital of France?' }],
        temperature: 0.1,
        max_tokens: 256,
        response_format: undefined,
      },
      { signal: undefined }
    );
  });

  test('generate wraps provider failures', async () => {
    create.mockRejectedValue(new Error('connection refused'));

    await expect(service.generate('hi')).rejects.toBeInstanceOf(GenerationError);
  });

  test('an empty completion is an error', async () => {
    create.mockResolvedValue(completion(null));

    await expect(service.generate('hi')).rejects.toThrow('Empty response from model');
  });

  test('generateStructured uses JSON mode and the schema system prompt', async () => {
    create.mockResolvedValue(completion('```json\n{"city": "Paris"}\n```'));
    const schema = { type: 'object', properties: { city: { type: 'string' } } };

    const result = await service.generateStructured('Capital of France?', schema);

    expect(result).toEqual({ ok: true, data: { city: 'Paris' } });
    const [body] = create.mock.calls[0];
    expect(body.response_format).toEqual({ type: 'json_object' });
    expect(body.messages[0].role).toBe('system');
    expect(body.messages[0].content).toContain(JSON.stringify(schema, null, 2));
    expect(body.messages[1]).toEqual({ role: 'user', content: 'Capital of France?' });
  });

  test('generateStructured falls back to plain text when the reply is not JSON', async () => {
    create.mockResolvedValueOnce(completion('I think it is Paris')).mockResolvedValueOnce(completion('Paris.'));

    const result = await service.generateStructured('Capital of France?', { type: 'object' });

    expect(result).toEqual({
      ok: false,
      error: 'Failed to generate structured response',
      rawResponse: 'Paris.',
    });
    expect(create).toHaveBeenCalledTimes(2);
    expect(create.mock.calls[1][0].messages).toEqual([{ role: 'user', content: 'Capital of France?' }]);
  });

  test('generateStream yields content deltas', async () => {
    async function* chunks() {
      yield { choices: [{ delta: { content: 'Par' } }] };
      yield { choices: [{ delta: {} }] };
      yield { choices: [{ delta: { content: 'is.' } }] };
    }
    create.mockResolvedValue(chunks());

    const fragments: string[] = [];
    for await (const fragment of service.generateStream('Capital of France?')) {
      fragments.push(fragment);
    }

    expect(fragments).toEqual(['Par', 'is.']);
    expect(create.mock.calls[0][0].stream).toBe(true);
  });

  test('testConnection reports reachability', async () => {
    list.mockResolvedValueOnce({ data: [] }).mockRejectedValueOnce(new Error('down'));

    await expect(service.testConnection()).resolves.toBe(true);
    await expect(service.testConnection()).resolves.toBe(false);
  });
});
