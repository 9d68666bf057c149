import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import OpenAI from 'openai';
import { OpenAIEmbedder, DEFAULT_EMBEDDING_MODEL } from '../src/classifiers/openai-embedder.js';
import { createLLMClient } from '../src/classifiers/llm-client.js';

describe('createLLMClient', () => {
  beforeEach(() => {
    vi.stubEnv('LITELLM_PROXY_URL', '');
    vi.stubEnv('LITELLM_API_KEY', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('defaults to the local proxy', () => {
    const client = createLLMClient();
    expect(client).toBeInstanceOf(OpenAI);
    expect(client.baseURL).toBe('http://localhost:4000/v1');
  });

  it('reads the proxy URL and key from env', () => {
    vi.stubEnv('LITELLM_PROXY_URL', 'https://proxy.example.com/v1');
    vi.stubEnv('LITELLM_API_KEY', 'test-key');
    const client = createLLMClient();
    expect(client.baseURL).toBe('https://proxy.example.com/v1');
    expect(client.apiKey).toBe('test-key');
  });

  it('prefers explicit options', () => {
    vi.stubEnv('LITELLM_API_KEY', 'env-key');
    expect(createLLMClient({ apiKey: 'explicit-key' }).apiKey).toBe('explicit-key');
  });
});

describe('OpenAIEmbedder', () => {
  function setup() {
    const client = new OpenAI({ apiKey: 'test-key', baseURL: 'http://localhost:4000/v1' });
    const create = vi.spyOn(client.embeddings, 'create');
    return { client, create };
  }

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns vectors ordered by index', async () => {
    const { client, create } = setup();
    create.mockResolvedValue({
      object: 'list',
      model: DEFAULT_EMBEDDING_MODEL,
      usage: { prompt_tokens: 2, total_tokens: 2 },
      data: [
        { object: 'embedding', index: 1, embedding: [0, 1] },
        { object: 'embedding', index: 0, embedding: [1, 0] },
      ],
    });

    const embedder = new OpenAIEmbedder({ client, model: 'embed-test' });
    expect(await embedder.embed(['first', 'second'])).toEqual([[1, 0], [0, 1]]);
    expect(create).toHaveBeenCalledWith({ model: 'embed-test', input: ['first', 'second'] });
  });

  it('skips the request for an empty batch', async () => {
    const { client, create } = setup();
    expect(await new OpenAIEmbedder({ client }).embed([])).toEqual([]);
    expect(create).not.toHaveBeenCalled();
  });

  it('wraps request failures', async () => {
    const { client, create } = setup();
    create.mockRejectedValue(new Error('502 Bad Gateway'));
    await expect(new OpenAIEmbedder({ client }).embed(['x'])).rejects.toThrow(
      'Embedding request failed: 502 Bad Gateway',
    );
  });
});
