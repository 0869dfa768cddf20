import { withObservation, type SpanContext } from '../services/tracing';
import type { AgentOptions, AgentTools } from './agent-base';
import { DiscoveryAgent } from './agents/discovery-agent';
import { PageExtractorAgent } from './agents/page-extractor-agent';
import { ResultMergerAgent } from './agents/result-merger-agent';
import type { AgentProgressCallback, CompanyDetailOutput, PageExtractionResult } from './core/types';

export interface CompanyDetailRunOptions {
  spanContext?: SpanContext;
  onAgentProgress?: AgentProgressCallback;
}

export class CompanyDetailOrchestrator {
  constructor(
    private tools: AgentTools,
    private options: AgentOptions
  ) {}

  /**
   * discover → extract each candidate → merge, one stage at a time.
   * Only a merge failure escapes; it is recorded on the root span first.
   */
  async run(companyName: string, companyUrl: string, runOptions: CompanyDetailRunOptions = {}): Promise<CompanyDetailOutput> {
    const onAgentProgress = runOptions.onAgentProgress ?? this.options.onAgentProgress;
    const agentOptions: AgentOptions = { ...this.options, onAgentProgress };

    const discovery = new DiscoveryAgent(this.tools, agentOptions);
    const extractor = new PageExtractorAgent(this.tools, agentOptions);
    const merger = new ResultMergerAgent(this.tools, agentOptions);

    return withObservation(this.tools.tracer, 'run_company_detail_workflow', runOptions.spanContext, async observation => {
      observation.setInput({ company_name: companyName, company_url: companyUrl, model: this.options.model });
      console.log(`[Orchestrator] Starting company detail workflow for ${companyName} (${companyUrl})`);

      try {
        onAgentProgress?.(`Discovering candidate pages on ${companyUrl}`, 'agent');
        const { candidates } = await discovery.execute(companyName, companyUrl, { parent: observation });
        console.log(`[Orchestrator] Discovery returned ${candidates.length} candidate(s)`);

        const extractions: PageExtractionResult[] = [];
        for (const [i, candidate] of candidates.entries()) {
          onAgentProgress?.(`Extracting page ${i + 1}/${candidates.length}: ${candidate.url}`, 'agent');
          const extraction = await extractor.execute(candidate, { parent: observation });
          if (extraction) {
            extractions.push(extraction);
          }
        }
        console.log(`[Orchestrator] Extracted ${extractions.length}/${candidates.length} page(s)`);

        onAgentProgress?.(`Merging ${extractions.length} page result(s)`, 'agent');
        const output = await merger.execute(companyName, companyUrl, extractions, { parent: observation });

        console.log(
          `[Orchestrator] Completed ${companyName}: ${output.address.length} address(es), ${output.viewed_source_urls.length} source(s)`
        );
        return observation.finish(output);
      } catch (error) {
        console.error(`[Orchestrator] Workflow failed for ${companyName}:`, error instanceof Error ? error.message : error);
        throw error;
      }
    });
  }
}
