import { Logger } from '@nestjs/common';
import { createTestDatabase, testSettings } from '../../database/testing';
import { LlmCacheService } from './llm-cache.service';
import { OllamaClientService } from './ollama-client.service';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('OllamaClientService', () => {
  const settings = testSettings({
    OLLAMA_RETRY_BACKOFF_SEC: '0',
    OLLAMA_MAX_RETRIES: '2',
  });
  let service: OllamaClientService;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
    const database = createTestDatabase(settings);
    service = new OllamaClientService(
      settings,
      new LlmCacheService(database, settings),
    );
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('returns an llm summary and serves the repeat from cache', async () => {
    const fetchSpy = jest
      .spyOn(globalThis, 'fetch')
      .mockResolvedValue(
        jsonResponse({ message: { content: '  A tidy summary.  ' } }),
      );

    const first = await service.summarize('Some long article text.');
    const second = await service.summarize('Some long article text.');

    expect(first).toEqual({ text: 'A tidy summary.', method: 'llm' });
    expect(second).toEqual({ text: 'A tidy summary.', method: 'llm' });
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('retries retryable failures, then falls back to an extractive summary', async () => {
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    const fetchSpy = jest
      .spyOn(globalThis, 'fetch')
      .mockImplementation(async () => jsonResponse({ error: 'busy' }, 503));

    const result = await service.summarize('First point. Second point.');

    expect(fetchSpy).toHaveBeenCalledTimes(3);
    expect(result).toEqual({
      text: 'First point. Second point.',
      method: 'extractive',
    });
  });

  it('does not retry a non-retryable status', async () => {
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    const fetchSpy = jest
      .spyOn(globalThis, 'fetch')
      .mockImplementation(async () => jsonResponse({ error: 'no model' }, 404));

    await service.generateTitle('anything');

    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('deduplicates unavailable warnings by reason key', async () => {
    const warnSpy = jest
      .spyOn(Logger.prototype, 'warn')
      .mockImplementation(() => undefined);
    jest
      .spyOn(globalThis, 'fetch')
      .mockRejectedValue(new Error('ECONNREFUSED'));

    await service.extractKeyPoints('text one');
    await service.extractKeyPoints('text two');

    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('matches classification answers to the allowed categories', async () => {
    jest.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse({
        response: '{"category": "science", "topics": ["space"], "sentiment": "Positive"}',
      }),
    );

    const result = await service.classifyContent('Rocket launch', [
      'Technology',
      'Science',
    ]);

    expect(result).toEqual({
      category: 'Science',
      topics: ['space'],
      sentiment: 'positive',
    });
  });

  it('parses numbered key points', async () => {
    jest.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse({
        message: {
          content: 'Here you go:\n1. First fact\n2) Second fact\n- Third fact',
        },
      }),
    );

    await expect(service.extractKeyPoints('text', 2)).resolves.toEqual([
      'First fact',
      'Second fact',
    ]);
  });

  it('strips quotes from generated titles', async () => {
    jest
      .spyOn(globalThis, 'fetch')
      .mockResolvedValue(jsonResponse({ response: '"Rust Takes Over"\n' }));

    await expect(service.generateTitle('content')).resolves.toBe(
      'Rust Takes Over',
    );
  });

  it('lists model names from tags', async () => {
    jest.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse({
        models: [{ name: 'mistral:7b-instruct' }, { name: 'phi3:mini' }],
      }),
    );

    await expect(service.listModels()).resolves.toEqual([
      'mistral:7b-instruct',
      'phi3:mini',
    ]);
  });
});
