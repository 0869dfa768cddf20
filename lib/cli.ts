import { parseArgs } from 'node:util';
import { createCompanyDetailOrchestrator } from './agent-architecture';
import { runCompanyDetailCsv } from './batch/csv-batch';
import { loadEnvConfig, type EnvConfig } from './config';
import { FirecrawlService } from './services/firecrawl';

const USAGE = `Usage: cli <command> [options]

Commands:
  fetch-page <url>                      Fetch a page through the reader
  company-detail --company_name <name> --company_url <url> [--session_id <id>]
                                        Run the company detail workflow
  company-detail-csv --csv <path> [--output <path>] [--session_id <id>]
                                        Run the workflow for every row of a CSV
`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

type CommandHandler = (args: string[], config: EnvConfig) => Promise<void>;

async function fetchPage(args: string[], config: EnvConfig): Promise<void> {
  const { positionals } = parseArgs({ args, allowPositionals: true, options: {} });
  const url = positionals[0];
  if (!url) {
    throw new UsageError('fetch-page requires a URL');
  }

  const reader = new FirecrawlService(config.FIRECRAWL_API_KEY);
  const result = await reader.readPage(url);
  if (!result) {
    console.log(`Failed to fetch page via reader for URL: ${url}`);
    return;
  }

  console.log('Content:', result.content);
  console.log('Title:', result.title);
  console.log('Description:', result.description);
  console.log('URL:', result.url);
  console.log('Links:', result.links);
}

async function companyDetail(args: string[], config: EnvConfig): Promise<void> {
  const { values } = parseArgs({
    args,
    options: {
      company_name: { type: 'string' },
      company_url: { type: 'string' },
      session_id: { type: 'string' },
    },
  });
  if (!values.company_name || !values.company_url) {
    throw new UsageError('company-detail requires --company_name and --company_url');
  }

  const { orchestrator, tracer } = createCompanyDetailOrchestrator(config);
  try {
    const result = await orchestrator.run(values.company_name, values.company_url, {
      spanContext: {
        traceInit: {
          name: 'company_detail_cli',
          sessionId: values.session_id,
          metadata: { company_name: values.company_name, company_url: values.company_url },
        },
      },
    });
    console.log(JSON.stringify(result, null, 2));
  } finally {
    await tracer.shutdown();
  }
}

async function companyDetailCsv(args: string[], config: EnvConfig): Promise<void> {
  const { values } = parseArgs({
    args,
    options: {
      csv: { type: 'string' },
      output: { type: 'string' },
      session_id: { type: 'string' },
    },
  });
  if (!values.csv) {
    throw new UsageError('company-detail-csv requires --csv');
  }

  const { orchestrator, tracer } = createCompanyDetailOrchestrator(config);
  try {
    await runCompanyDetailCsv(
      { csvPath: values.csv, outputPath: values.output, sessionId: values.session_id },
      { orchestrator }
    );
  } finally {
    await tracer.shutdown();
  }
}

const COMMANDS = new Map<string, CommandHandler>([
  ['fetch-page', fetchPage],
  ['company-detail', companyDetail],
  ['company-detail-csv', companyDetailCsv],
]);

/** Resolves to the process exit code. */
export async function main(argv: string[], env: Record<string, string | undefined> = process.env): Promise<number> {
  const [command, ...rest] = argv;
  const handler = command ? COMMANDS.get(command) : undefined;
  if (!handler) {
    console.error(command ? `Unknown command: ${command}\n` : 'No command given\n');
    console.error(USAGE);
    return 2;
  }

  try {
    await handler(rest, loadEnvConfig(env));
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`${error.message}\n`);
      console.error(USAGE);
      return 2;
    }
    console.error(`[CLI] ${command} failed:`, error instanceof Error ? error.message : error);
    return 1;
  }
}
