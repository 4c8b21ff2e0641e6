import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { MiniMaxProvider } from '../tts/providers/MiniMaxProvider.js';
import { ConfigurationError, RemoteError, TimeoutError, TransportError } from '../tts/errors.js';
import { minimaxConfig } from './helpers.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

const ok = { status_code: 0, status_msg: 'success' };

describe('MiniMaxProvider', () => {
  let fetchMock: Mock<typeof fetch>;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
  });

  it('posts the synthesis request and decodes base64 audio', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ audio: Buffer.from('mp3-a').toString('base64'), base_resp: ok })
    );
    const provider = new MiniMaxProvider(minimaxConfig({ baseUrl: 'https://tts.test/' }), fetchMock);

    const result = await provider.synthesize(' 吃苹果 ', { speechRate: 0.2 });

    expect(result).toEqual({ audio: Buffer.from('mp3-a'), format: 'mp3' });
    expect(fetchMock).toHaveBeenCalledTimes(1);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://tts.test/v1/t2a_v2');
    expect(init).toMatchObject({
      method: 'POST',
      headers: { Authorization: 'Bearer test-key', 'Content-Type': 'application/json' },
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'speech-2.6-turbo',
      text: '吃苹果',
      voice_id: 'test-voice',
      speed: 0.5,
      emotion: 'happy',
    });
  });

  it('decodes hex audio under data.audio', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ data: { audio: Buffer.from('mp3-b').toString('hex') }, base_resp: ok })
    );
    const provider = new MiniMaxProvider(minimaxConfig(), fetchMock);

    const result = await provider.synthesize('你好', { voice: 'other-voice' });

    expect(result.audio.toString()).toBe('mp3-b');
    expect(JSON.parse(String(fetchMock.mock.calls[0][1]?.body))).toMatchObject({ voice_id: 'other-voice' });
  });

  it('downloads audio from audio_url', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ audio_url: 'https://cdn.test/a.mp3', base_resp: ok }))
      .mockResolvedValueOnce(new Response(Buffer.from('mp3-c')));
    const provider = new MiniMaxProvider(minimaxConfig(), fetchMock);

    const result = await provider.synthesize('你好');

    expect(result.audio.toString()).toBe('mp3-c');
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls[1][0]).toBe('https://cdn.test/a.mp3');
  });

  it('maps a non-zero base_resp status to RemoteError', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ base_resp: { status_code: 1004, status_msg: 'auth failed' } }));
    const provider = new MiniMaxProvider(minimaxConfig(), fetchMock);

    const error = await provider.synthesize('你好').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RemoteError);
    expect(error instanceof RemoteError && error.code).toBe('1004');
  });

  it('maps an HTTP error status to RemoteError', async () => {
    fetchMock.mockResolvedValueOnce(new Response('upstream down', { status: 502 }));
    const provider = new MiniMaxProvider(minimaxConfig(), fetchMock);

    const error = await provider.synthesize('你好').catch((err: unknown) => err);

    expect(error instanceof RemoteError && error.code).toBe('502');
  });

  it('rejects a response that carries no audio', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ base_resp: ok }));
    const provider = new MiniMaxProvider(minimaxConfig(), fetchMock);

    const error = await provider.synthesize('你好').catch((err: unknown) => err);

    expect(error instanceof RemoteError && error.code).toBe('empty-audio');
  });

  it('maps a network failure to TransportError', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
    const provider = new MiniMaxProvider(minimaxConfig(), fetchMock);

    await expect(provider.synthesize('你好')).rejects.toBeInstanceOf(TransportError);
    expect(provider.isBusy).toBe(false);
  });

  it('aborts the request on timeout', async () => {
    let signal: AbortSignal | null | undefined;
    fetchMock.mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          signal = init?.signal;
          signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );
    const provider = new MiniMaxProvider(minimaxConfig({ timeoutMs: 100 }), fetchMock);

    await expect(provider.synthesize('你好')).rejects.toBeInstanceOf(TimeoutError);
    expect(signal?.aborted).toBe(true);
  });

  it('requires an API key and a voice id before any request', async () => {
    const noKey = new MiniMaxProvider(minimaxConfig({ apiKey: '' }), fetchMock);
    expect(noKey.isConfigured()).toBe(false);
    await expect(noKey.synthesize('你好')).rejects.toBeInstanceOf(ConfigurationError);

    const noVoice = new MiniMaxProvider(minimaxConfig({ voiceId: '' }), fetchMock);
    await expect(noVoice.synthesize('你好')).rejects.toBeInstanceOf(ConfigurationError);

    expect(fetchMock).not.toHaveBeenCalled();
  });
});
