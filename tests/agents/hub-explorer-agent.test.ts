import { describe, it, expect } from 'vitest';
import { HubExplorerAgent } from '@/lib/agent-architecture/agents/hub-explorer-agent';
import type { ReaderPage } from '@/lib/types';
import { FakeGenerator, FakeReader, RecordingTracer, makePage } from '../helpers/fakes';

const topPage = makePage('https://example.com/', {
  title: 'Example 株式会社',
  links: [
    { url: 'https://example.com/company', title: '会社情報' },
    { url: 'https://example.com/news', title: 'ニュース' },
    { url: 'https://example.com/service', title: 'サービス' },
    { url: 'https://external.com/', title: 'ext' },
  ],
});

const topLinks = [
  { url: 'https://example.com/company', title: '会社情報' },
  { url: 'https://example.com/news', title: 'ニュース' },
  { url: 'https://example.com/service', title: 'サービス' },
];

function createAgent(pages: Record<string, ReaderPage | null | Error>, llm: FakeGenerator) {
  const reader = new FakeReader(pages);
  const agent = new HubExplorerAgent(
    { reader, llm, tracer: new RecordingTracer() },
    { model: 'gemini/gemini-2.5-flash-lite' }
  );
  return { agent, reader };
}

describe('HubExplorerAgent', () => {
  it('returns the homepage first, then the hubs that could be read in selection order', async () => {
    const llm = new FakeGenerator().on('discover_select_hubs', { selected_indices: [2, 7, 0] });
    const { agent, reader } = createAgent(
      {
        'https://example.com': topPage,
        'https://example.com/service': makePage('https://example.com/service', {
          title: '',
          links: [{ url: 'https://example.com/service/a', title: 'A' }],
        }),
        'https://example.com/company': null,
      },
      llm
    );

    const hubs = await agent.execute('Example', 'https://example.com');

    expect(hubs).toEqual([
      { title: 'Example 株式会社', url: 'https://example.com/', links: topLinks },
      {
        title: 'サービス',
        url: 'https://example.com/service',
        links: [{ url: 'https://example.com/service/a', title: 'A' }],
      },
    ]);
    expect(reader.calls).toEqual(['https://example.com', 'https://example.com/service', 'https://example.com/company']);
  });

  it('lists the selection pool in the prompt', async () => {
    const llm = new FakeGenerator().on('discover_select_hubs', { selected_indices: [] });
    const { agent } = createAgent({ 'https://example.com': topPage }, llm);

    await agent.execute('Example', 'https://example.com');

    const [call] = llm.callsFor('discover_select_hubs');
    expect(call.prompt).toContain(
      [
        '0. [会社情報] (https://example.com/company)',
        '1. [ニュース] (https://example.com/news)',
        '2. [サービス] (https://example.com/service)',
      ].join('\n')
    );
    expect(call.prompt).toContain('- valid_indices: 0..2');
  });

  it('does not fetch the homepage again when it is selected', async () => {
    const page = makePage('https://example.com/', {
      links: [
        { url: 'https://example.com/', title: 'Home' },
        { url: 'https://example.com/company', title: '会社情報' },
      ],
    });
    const llm = new FakeGenerator().on('discover_select_hubs', { selected_indices: [0] });
    const { agent, reader } = createAgent({ 'https://example.com': page }, llm);

    const hubs = await agent.execute('Example', 'https://example.com');

    expect(hubs).toHaveLength(1);
    expect(hubs[0].title).toBe('Top Page');
    expect(reader.calls).toEqual(['https://example.com']);
  });

  it('returns an empty list when the homepage cannot be read', async () => {
    const llm = new FakeGenerator();
    const { agent } = createAgent({ 'https://example.com': new Error('connection reset') }, llm);

    expect(await agent.execute('Example', 'https://example.com')).toEqual([]);
    expect(llm.calls).toHaveLength(0);
  });

  it('returns an empty list when the homepage has no content', async () => {
    const llm = new FakeGenerator();
    const { agent } = createAgent({ 'https://example.com': makePage('https://example.com/', { content: '' }) }, llm);

    expect(await agent.execute('Example', 'https://example.com')).toEqual([]);
  });

  it('treats a whitespace-only homepage as having no content', async () => {
    const llm = new FakeGenerator();
    const { agent } = createAgent({ 'https://example.com': makePage('https://example.com/', { content: '  \n ' }) }, llm);

    expect(await agent.execute('Example', 'https://example.com')).toEqual([]);
    expect(llm.calls).toHaveLength(0);
  });

  it('keeps only the homepage when hub selection fails', async () => {
    const llm = new FakeGenerator().fail('discover_select_hubs', new Error('bad gateway'));
    const { agent } = createAgent({ 'https://example.com': topPage }, llm);

    expect(await agent.execute('Example', 'https://example.com')).toEqual([
      { title: 'Example 株式会社', url: 'https://example.com/', links: topLinks },
    ]);
  });
});
