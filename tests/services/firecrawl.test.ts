import { describe, it, expect, vi, beforeEach } from 'vitest';

const { scrapeUrl, constructorOptions } = vi.hoisted(() => {
  const constructorOptions: Array<{ apiKey?: string }> = [];
  return { scrapeUrl: vi.fn(), constructorOptions };
});

vi.mock('@mendable/firecrawl-js', () => ({
  default: class {
    scrapeUrl = scrapeUrl;
    constructor(options: { apiKey?: string }) {
      constructorOptions.push(options);
    }
  },
}));

import { MissingConfigurationError } from '@/lib/config';
import { FirecrawlService } from '@/lib/services/firecrawl';
import { ObservationHandle } from '@/lib/services/tracing';
import { RecordingTracer } from '../helpers/fakes';

function httpError(message: string, statusCode: number): Error {
  return Object.assign(new Error(message), { statusCode });
}

const scrapeSuccess = {
  success: true,
  markdown: '[会社概要](/company#top)\n[採用](https://example.com/recruit)',
  metadata: {
    title: 'Example',
    description: 'Example Inc.',
    sourceURL: 'https://example.com',
    url: 'https://example.com/',
  },
  links: ['https://example.com/company', 'https://example.com/news#latest'],
};

describe('FirecrawlService', () => {
  beforeEach(() => {
    scrapeUrl.mockReset();
    constructorOptions.length = 0;
  });

  it('requires an API key', () => {
    expect(() => new FirecrawlService(undefined)).toThrow(MissingConfigurationError);
    expect(() => new FirecrawlService(undefined)).toThrow('FIRECRAWL_API_KEY environment variable is not set.');
  });

  it('maps a scrape result to a reader page', async () => {
    scrapeUrl.mockResolvedValue(scrapeSuccess);
    const reader = new FirecrawlService('test-secret', { baseDelayMs: 0 });

    const page = await reader.readPage('example.com');

    expect(constructorOptions).toEqual([{ apiKey: 'test-secret' }]);
    expect(scrapeUrl).toHaveBeenCalledWith('https://example.com', {
      formats: ['markdown', 'links'],
      timeout: 30000,
      headers: { 'Accept-Language': 'ja-JP' },
    });
    expect(page).toEqual({
      content: scrapeSuccess.markdown,
      title: 'Example',
      description: 'Example Inc.',
      url: 'https://example.com/',
      links: [
        { url: 'https://example.com/company', title: '会社概要' },
        { url: 'https://example.com/recruit', title: '採用' },
        { url: 'https://example.com/news', title: 'https://example.com/news' },
      ],
    });
  });

  it('returns null when the scrape is unsuccessful', async () => {
    scrapeUrl.mockResolvedValue({ success: false, error: 'blocked' });
    const reader = new FirecrawlService('test-secret', { baseDelayMs: 0 });

    expect(await reader.readPage('https://example.com')).toBeNull();
  });

  it('retries transient failures', async () => {
    scrapeUrl.mockRejectedValueOnce(httpError('Too many requests', 429)).mockResolvedValueOnce(scrapeSuccess);
    const reader = new FirecrawlService('test-secret', { baseDelayMs: 0 });

    const page = await reader.readPage('https://example.com');

    expect(page?.url).toBe('https://example.com/');
    expect(scrapeUrl).toHaveBeenCalledTimes(2);
  });

  it('gives up after the configured number of attempts', async () => {
    scrapeUrl.mockRejectedValue(httpError('Service unavailable', 503));
    const reader = new FirecrawlService('test-secret', { baseDelayMs: 0 });

    expect(await reader.readPage('https://example.com')).toBeNull();
    expect(scrapeUrl).toHaveBeenCalledTimes(3);
  });

  it('does not retry other errors', async () => {
    scrapeUrl.mockRejectedValue(httpError('Unauthorized', 401));
    const reader = new FirecrawlService('test-secret', { baseDelayMs: 0 });

    expect(await reader.readPage('https://example.com')).toBeNull();
    expect(scrapeUrl).toHaveBeenCalledTimes(1);
  });

  it('records each fetch as a generation under the given span', async () => {
    scrapeUrl.mockResolvedValue(scrapeSuccess);
    const tracer = new RecordingTracer();
    const parent = new ObservationHandle(tracer.trace({ name: 'test' }).span('stage'));
    const reader = new FirecrawlService('test-secret', { baseDelayMs: 0 });

    await reader.readPage('example.com', parent);

    const [generation] = tracer.spanNamed('stage')?.generations ?? [];
    expect(generation.start).toEqual({
      name: 'fetch_firecrawl_page',
      model: 'firecrawl/scrape',
      input: { url: 'https://example.com' },
    });
    expect(generation.output).toEqual({
      url: 'https://example.com/',
      title: 'Example',
      description: 'Example Inc.',
      content_length: scrapeSuccess.markdown.length,
      link_count: 3,
    });
    expect(generation.level).toBeUndefined();
    expect(generation.ended).toBe(true);
  });

  it('marks a failed fetch as a warning on its generation', async () => {
    scrapeUrl.mockRejectedValue(httpError('Unauthorized', 401));
    const tracer = new RecordingTracer();
    const parent = new ObservationHandle(tracer.trace({ name: 'test' }).span('stage'));
    const reader = new FirecrawlService('test-secret', { baseDelayMs: 0 });

    expect(await reader.readPage('https://example.com/company', parent)).toBeNull();

    const [generation] = tracer.spanNamed('stage')?.generations ?? [];
    expect(generation.level).toBe('WARNING');
    expect(generation.statusMessage).toBe('Could not fetch https://example.com/company');
    expect(generation.ended).toBe(true);
  });
});
