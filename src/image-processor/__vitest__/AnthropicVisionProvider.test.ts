import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { AnthropicVisionProvider } from '../providers/AnthropicVisionProvider.js';
import { CloudVisionError } from '../providers/BaseCloudVisionProvider.js';

function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });
}

describe('AnthropicVisionProvider', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function createProvider() {
    return new AnthropicVisionProvider({
      provider: 'anthropic',
      apiKey: 'test-key',
      model: 'claude-test',
      baseUrl: 'https://anthropic.test/v1/',
      options: { maxTokens: 1024 }
    });
  }

  it('should require an API key', () => {
    expect(() => new AnthropicVisionProvider({ provider: 'anthropic', model: 'claude-test' })).toThrow(CloudVisionError);
  });

  it('should send the image as base64 with the prompt', async () => {
    fetchMock.mockResolvedValue(jsonResponse({
      content: [{ type: 'text', text: 'Skrillex\nFour Tet' }],
      model: 'claude-test',
      usage: { input_tokens: 1200, output_tokens: 8 }
    }));
    const provider = createProvider();

    const result = await provider.extractFromImage(Buffer.from('image-bytes'), 'image/png', 'List the artists');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://anthropic.test/v1/messages');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      'x-api-key': 'test-key',
      'anthropic-version': '2023-06-01'
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'claude-test',
      max_tokens: 1024,
      messages: [
        {
          role: 'user',
          content: [
            {
              type: 'image',
              source: {
                type: 'base64',
                media_type: 'image/png',
                data: Buffer.from('image-bytes').toString('base64')
              }
            },
            { type: 'text', text: 'List the artists' }
          ]
        }
      ]
    });

    expect(result.extracted_text).toBe('Skrillex\nFour Tet');
    expect(result.provider).toBe('anthropic');
    expect(result.model).toBe('claude-test');
    expect(result.usage).toEqual({ input_tokens: 1200, output_tokens: 8, total_tokens: 1208 });
  });

  it('should return the first text block', async () => {
    fetchMock.mockResolvedValue(jsonResponse({
      content: [
        { type: 'thinking' },
        { type: 'text', text: 'First' },
        { type: 'text', text: 'Second' }
      ]
    }));

    const result = await createProvider().extractFromImage(Buffer.from('x'), 'image/jpeg', 'p');

    expect(result.extracted_text).toBe('First');
    expect(result.usage).toBeUndefined();
  });

  it('should fail when the response has no text block', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ content: [] }));

    await expect(createProvider().extractFromImage(Buffer.from('x'), 'image/jpeg', 'p'))
      .rejects.toThrow('Anthropic response contained no text content');
  });

  it('should fail when the response is not a message', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ type: 'error' }));

    await expect(createProvider().extractFromImage(Buffer.from('x'), 'image/jpeg', 'p'))
      .rejects.toThrow('Anthropic response has no content array');
  });

  it('should surface API errors with their status without retrying', async () => {
    fetchMock.mockResolvedValue(new Response('{"error":"overloaded"}', { status: 529 }));

    const error = await createProvider()
      .extractFromImage(Buffer.from('x'), 'image/jpeg', 'p')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CloudVisionError);
    if (error instanceof CloudVisionError) {
      expect(error.statusCode).toBe(529);
      expect(error.message).toBe('API error: 529 - {"error":"overloaded"}');
    }
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should wrap transport failures', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    await expect(createProvider().extractFromImage(Buffer.from('x'), 'image/jpeg', 'p'))
      .rejects.toThrow('Request failed: fetch failed');
  });

  it('should reject bodies that are not JSON', async () => {
    fetchMock.mockResolvedValue(new Response('<html>bad gateway</html>', { status: 200 }));

    await expect(createProvider().extractFromImage(Buffer.from('x'), 'image/jpeg', 'p'))
      .rejects.toThrow('API returned a response that is not valid JSON');
  });

  it('should describe the configured model', () => {
    const provider = createProvider();
    expect(provider.getModelInfo()).toEqual({ name: 'claude-test', provider: 'anthropic' });
    expect(provider.name).toBe('claude-test-anthropic');
  });
});
