import { describe, it, expect, vi, afterEach } from 'vitest';
import { HttpImageClassifier } from '../src/classifiers/clip-client.js';
import type { SanitizedImage } from '../src/types.js';

const IMAGE: SanitizedImage = { data: Buffer.from('png-bytes'), width: 1, height: 1, format: 'png' };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('HttpImageClassifier', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('requires an endpoint', () => {
    vi.stubEnv('CLIP_ENDPOINT_URL', '');
    expect(() => new HttpImageClassifier()).toThrow('CLIP_ENDPOINT_URL');
  });

  it('reads the endpoint from the environment', async () => {
    vi.stubEnv('CLIP_ENDPOINT_URL', 'http://clip.internal/classify');
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse([{ label: 'a', score: 1 }]));
    await new HttpImageClassifier({ fetchImpl }).classify(IMAGE, ['a']);
    expect(fetchImpl.mock.calls[0]![0]).toBe('http://clip.internal/classify');
  });

  it('posts base64 image and labels, and returns scores in label order', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse([
        { label: 'a dish', score: 0.7 },
        { label: 'paper', score: 0.2 },
        { label: 'a meal', score: 0.1 },
      ]),
    );
    const classifier = new HttpImageClassifier({
      endpointUrl: 'http://clip.test/classify',
      apiToken: 'test-token',
      fetchImpl,
    });

    const scores = await classifier.classify(IMAGE, ['a meal', 'a dish', 'paper']);
    expect(scores).toEqual([0.1, 0.7, 0.2]);

    const init = fetchImpl.mock.calls[0]![1]!;
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-token' });
    expect(JSON.parse(String(init.body))).toEqual({
      inputs: Buffer.from('png-bytes').toString('base64'),
      parameters: { candidate_labels: ['a meal', 'a dish', 'paper'] },
    });
  });

  it('omits Authorization without a token', async () => {
    vi.stubEnv('CLIP_API_TOKEN', '');
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse([{ label: 'a', score: 1 }]));
    await new HttpImageClassifier({ endpointUrl: 'http://clip.test', fetchImpl }).classify(IMAGE, ['a']);
    expect(fetchImpl.mock.calls[0]![1]!.headers).toEqual({ 'Content-Type': 'application/json' });
  });

  it('throws on a non-2xx status', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ error: 'loading' }, 503));
    const classifier = new HttpImageClassifier({ endpointUrl: 'http://clip.test', fetchImpl });
    await expect(classifier.classify(IMAGE, ['a'])).rejects.toThrow('Image classifier returned HTTP 503');
  });

  it('throws on an unexpected payload', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ scores: [1] }));
    const classifier = new HttpImageClassifier({ endpointUrl: 'http://clip.test', fetchImpl });
    await expect(classifier.classify(IMAGE, ['a'])).rejects.toThrow('unexpected payload');
  });

  it('throws when a label is missing from the response', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse([{ label: 'a', score: 1 }]));
    const classifier = new HttpImageClassifier({ endpointUrl: 'http://clip.test', fetchImpl });
    await expect(classifier.classify(IMAGE, ['a', 'b'])).rejects.toThrow('no score for label "b"');
  });
});
