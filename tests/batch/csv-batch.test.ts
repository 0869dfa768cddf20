import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { CompanyDetailOutput } from '@/lib/agent-architecture/core/types';
import type { CompanyDetailRunOptions } from '@/lib/agent-architecture/orchestrator';
import { createBatchSessionId, runCompanyDetailCsv } from '@/lib/batch/csv-batch';

function outputFor(companyName: string, companyUrl: string): CompanyDetailOutput {
  return {
    company_name: companyName,
    company_url: companyUrl,
    address: [],
    business_summary: { detail: '', sourceUrls: {} },
    viewed_source_urls: [],
  };
}

const CSV = [
  'company_name,company_url',
  'Example,https://example.com',
  ',https://missing-name.example.com',
  'NoUrl,',
  '',
  'Sample,https://sample.example.com',
].join('\n');

describe('runCompanyDetailCsv', () => {
  let dir: string;
  let csvPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'company-detail-'));
    csvPath = path.join(dir, 'companies.csv');
    await writeFile(csvPath, CSV, 'utf-8');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('runs complete rows in order and skips incomplete ones', async () => {
    const run = vi.fn(async (name: string, url: string, _options?: CompanyDetailRunOptions) => outputFor(name, url));
    const lines: string[] = [];

    const results = await runCompanyDetailCsv(
      { csvPath, sessionId: 'session-1' },
      { orchestrator: { run }, writeLine: line => lines.push(line) }
    );

    expect(results.map(result => result.company_name)).toEqual(['Example', 'Sample']);
    expect(run).toHaveBeenCalledTimes(2);
    expect(run).toHaveBeenNthCalledWith(1, 'Example', 'https://example.com', {
      spanContext: {
        traceInit: {
          name: 'company_detail_csv_batch',
          sessionId: 'session-1',
          metadata: { company_name: 'Example', company_url: 'https://example.com' },
        },
      },
    });
    expect(lines).toEqual([
      JSON.stringify(outputFor('Example', 'https://example.com')),
      JSON.stringify(outputFor('Sample', 'https://sample.example.com')),
    ]);
  });

  it('writes the same JSON lines to the output file', async () => {
    const run = vi.fn(async (name: string, url: string) => outputFor(name, url));
    const outputPath = path.join(dir, 'out.jsonl');

    await runCompanyDetailCsv({ csvPath, outputPath }, { orchestrator: { run }, writeLine: () => undefined });

    expect(await readFile(outputPath, 'utf-8')).toBe(
      `${JSON.stringify(outputFor('Example', 'https://example.com'))}\n` +
        `${JSON.stringify(outputFor('Sample', 'https://sample.example.com'))}\n`
    );
  });

  it('stops the batch when a row fails', async () => {
    const run = vi.fn(async () => {
      throw new Error('model unavailable');
    });

    await expect(
      runCompanyDetailCsv({ csvPath }, { orchestrator: { run }, writeLine: () => undefined })
    ).rejects.toThrow('model unavailable');
    expect(run).toHaveBeenCalledTimes(1);
  });
});

describe('createBatchSessionId', () => {
  it('prefixes a random UUID', () => {
    expect(createBatchSessionId()).toMatch(/^company-detail-[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
  });
});
