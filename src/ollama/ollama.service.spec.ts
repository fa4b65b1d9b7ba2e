import { ConfigService } from '@nestjs/config';
import { CompletionProviderError } from '../common/errors';
import { OllamaService } from './ollama.service';

describe('OllamaService', () => {
  let fetchMock: jest.SpyInstance<
    ReturnType<typeof fetch>,
    Parameters<typeof fetch>
  >;
  let service: OllamaService;

  const chatReply = (content: unknown) =>
    new Response(
      JSON.stringify({
        model: 'qwen3:4b',
        message: { role: 'assistant', content },
        done: true,
      }),
      { status: 200, headers: { 'Content-Type': 'application/json' } },
    );

  const sentBody = (): unknown => {
    const init = fetchMock.mock.calls[0][1];
    return JSON.parse(String(init?.body));
  };

  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch');
    service = new OllamaService(
      new ConfigService({
        OLLAMA_BASE_URL: 'http://ollama.test:11434',
        OLLAMA_LLM_MODEL: 'llama-test',
        OLLAMA_SMALL_MODEL: 'small-test',
      }),
    );
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('sends system, history and prompt to the chat endpoint', async () => {
    fetchMock.mockResolvedValue(chatReply('Take an umbrella.'));

    const answer = await service.complete(
      'Will it rain?',
      [
        { role: 'user', content: 'Hi' },
        { role: 'assistant', content: 'Hello!' },
      ],
      { system: 'Be brief.' },
    );

    expect(answer).toBe('Take an umbrella.');
    expect(fetchMock.mock.calls[0][0]).toBe('http://ollama.test:11434/api/chat');
    expect(sentBody()).toEqual({
      model: 'llama-test',
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'Hi' },
        { role: 'assistant', content: 'Hello!' },
        { role: 'user', content: 'Will it rain?' },
      ],
      stream: false,
    });
  });

  it('uses the small model tier on request', async () => {
    fetchMock.mockResolvedValue(chatReply('events'));

    await service.complete('Classify this', [], { model: 'small' });

    expect(sentBody()).toEqual({
      model: 'small-test',
      messages: [{ role: 'user', content: 'Classify this' }],
      stream: false,
    });
  });

  it('reports an unreachable server', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    const attempt = service.complete('Hello');

    await expect(attempt).rejects.toBeInstanceOf(CompletionProviderError);
    await expect(attempt).rejects.toThrow('LLM service unreachable: fetch failed');
  });

  it('reports error statuses with the response text', async () => {
    fetchMock.mockResolvedValue(new Response('model not found', { status: 404 }));

    await expect(service.complete('Hello')).rejects.toThrow(
      'Ollama chat failed: 404 model not found',
    );
  });

  it('rejects replies without message content', async () => {
    fetchMock.mockResolvedValue(chatReply(null));

    await expect(service.complete('Hello')).rejects.toThrow(
      'Ollama chat response has no message',
    );
  });

  it('rejects non-JSON bodies', async () => {
    fetchMock.mockResolvedValue(new Response('<html>', { status: 200 }));

    await expect(service.complete('Hello')).rejects.toThrow(
      'Ollama chat returned invalid JSON',
    );
  });
});
