import { withObservation, type SpanContext } from '../../services/tracing';
import type { AgentBase, AgentOptions, AgentTools } from '../agent-base';
import type { DiscoveryResult } from '../core/types';
import { CandidateSelectorAgent } from './candidate-selector-agent';
import { HubExplorerAgent } from './hub-explorer-agent';

/**
 * Finds up to five pages on the official site that are likely to state the
 * business description or office addresses. Never throws for upstream or
 * model failures; the result is simply shorter.
 */
export class DiscoveryAgent implements AgentBase {
  name = 'discovery-agent';
  description = 'Explores hub pages and selects candidate pages for extraction';

  private hubExplorer: HubExplorerAgent;
  private candidateSelector: CandidateSelectorAgent;

  constructor(
    private tools: AgentTools,
    options: AgentOptions
  ) {
    this.hubExplorer = new HubExplorerAgent(tools, options);
    this.candidateSelector = new CandidateSelectorAgent(tools, options);
  }

  async execute(companyName: string, companyUrl: string, spanContext?: SpanContext): Promise<DiscoveryResult> {
    return withObservation(this.tools.tracer, 'discover_company_detail_candidates', spanContext, async observation => {
      observation.setInput({ company_name: companyName, company_url: companyUrl });
      console.log(`[AGENT-DISCOVERY] Starting discovery for ${companyName} (${companyUrl})`);

      const hubs = await this.hubExplorer.execute(companyName, companyUrl, observation);
      const result = await this.candidateSelector.execute(companyName, companyUrl, hubs, observation);

      return observation.finish(result);
    });
  }
}
