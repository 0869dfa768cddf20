import type { EnvConfig } from '../config';
import { FirecrawlService } from '../services/firecrawl';
import { OpenAIService } from '../services/openai';
import { createTracer } from '../services/tracing';
import type { AgentProgressCallback } from './core/types';
import { CompanyDetailOrchestrator } from './orchestrator';

export { CompanyDetailOrchestrator, type CompanyDetailRunOptions } from './orchestrator';
export * from './core/types';

/**
 * Builds the orchestrator with real collaborators. Throws
 * MissingConfigurationError when the reader or the configured model's
 * provider has no key.
 */
export function createCompanyDetailOrchestrator(config: EnvConfig, onAgentProgress?: AgentProgressCallback) {
  const reader = new FirecrawlService(config.FIRECRAWL_API_KEY);
  const llm = new OpenAIService({ openai: config.OPENAI_API_KEY, google: config.GEMINI_API_KEY });
  llm.assertModelConfigured(config.COMPANY_DETAIL_MODEL);
  const tracer = createTracer(config);

  return {
    orchestrator: new CompanyDetailOrchestrator(
      { reader, llm, tracer },
      { model: config.COMPANY_DETAIL_MODEL, onAgentProgress }
    ),
    tracer,
  };
}
