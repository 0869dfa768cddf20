import { randomUUID } from 'node:crypto';
import { readFile, writeFile } from 'node:fs/promises';
import Papa from 'papaparse';
import type { CompanyDetailOrchestrator } from '../agent-architecture/orchestrator';
import type { CompanyDetailOutput } from '../agent-architecture/core/types';

export interface CsvBatchOptions {
  csvPath: string;
  /** When set, the JSON lines are also written here */
  outputPath?: string;
  sessionId?: string;
}

export interface CsvBatchDeps {
  orchestrator: Pick<CompanyDetailOrchestrator, 'run'>;
  /** Receives each result line as it is produced */
  writeLine?: (line: string) => void;
}

type CsvRecord = Record<string, string | undefined>;

export function createBatchSessionId(): string {
  return `company-detail-${randomUUID()}`;
}

/**
 * Runs the workflow for every row with both company_name and company_url,
 * one row at a time. A failing row stops the batch.
 */
export async function runCompanyDetailCsv(
  options: CsvBatchOptions,
  deps: CsvBatchDeps
): Promise<CompanyDetailOutput[]> {
  const sessionId = options.sessionId ?? createBatchSessionId();
  const writeLine = deps.writeLine ?? ((line: string) => console.log(line));

  const text = await readFile(options.csvPath, 'utf-8');
  const parsed = Papa.parse<CsvRecord>(text, { header: true, skipEmptyLines: true });
  if (parsed.errors.length > 0) {
    console.warn(`[CSV-BATCH] ${parsed.errors.length} parse issue(s) in ${options.csvPath}: ${parsed.errors[0].message}`);
  }

  const results: CompanyDetailOutput[] = [];

  for (const row of parsed.data) {
    const companyName = row.company_name;
    const companyUrl = row.company_url;
    if (!companyName || !companyUrl) {
      console.warn('[CSV-BATCH] Skipping row with missing company_name or company_url:', row);
      continue;
    }

    console.log(`[CSV-BATCH] Processing company: ${companyName}, URL: ${companyUrl}`);
    const result = await deps.orchestrator.run(companyName, companyUrl, {
      spanContext: {
        traceInit: {
          name: 'company_detail_csv_batch',
          sessionId,
          metadata: { company_name: companyName, company_url: companyUrl },
        },
      },
    });
    console.log(`[CSV-BATCH] Finished processing company: ${companyName}`);

    results.push(result);
    writeLine(JSON.stringify(result));
  }

  if (options.outputPath) {
    await writeFile(options.outputPath, results.map(result => `${JSON.stringify(result)}\n`).join(''), 'utf-8');
    console.log(`[CSV-BATCH] Wrote ${results.length} result(s) to ${options.outputPath}`);
  }

  return results;
}
