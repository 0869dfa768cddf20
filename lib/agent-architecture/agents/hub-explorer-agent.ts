import { z } from 'zod';
import { COMPANY_DETAIL_CONFIG } from '../../config';
import type { ObservationHandle } from '../../services/tracing';
import type { ReaderPage } from '../../types';
import { linksFromPage } from '../../utils/links';
import type { AgentBase, AgentOptions, AgentTools } from '../agent-base';
import type { HubPageLinks, LinkItem } from '../core/types';

const HubSelectionResult = z.object({
  selected_indices: z.array(z.number().int()).describe('List of indices of selected hub URLs'),
});

const HUB_SELECTION_SYSTEM_PROMPT = `
Role: Select hub-page candidates from a same-domain link list for a company website discovery workflow.

Definition:
- A hub page is a navigational/category page that links to content pages where we can later extract:
    - company profile (会社概要/企業情報/About)
    - business/services (事業内容/サービス/プロダクト)
    - locations/access (アクセス/所在地/拠点)

Selection rubric (priority order):
1) Pages clearly about company info/services/offices AND likely to contain many internal links
2) Top-level category pages (e.g., 会社情報, サービス, 拠点一覧)
3) Avoid low-signal or single-purpose pages: privacy/terms, news, blog, campaigns, IR, standalone articles

Hard constraints:
- Choose ONLY from the provided indices
- Select 0 to 4 items
- Return an empty list if none fit

Output:
- Return ONLY a JSON object that matches the output schema
- No explanations, no markdown, no extra keys
`;

export class HubExplorerAgent implements AgentBase {
  name = 'hub-explorer-agent';
  description = 'Reads the homepage and the navigational pages it links to, collecting same-domain links per page';

  constructor(
    private tools: AgentTools,
    private options: AgentOptions
  ) {}

  /**
   * Homepage first, then each selected hub in selection order.
   * Empty when the homepage cannot be read.
   */
  async execute(companyName: string, companyUrl: string, parent?: ObservationHandle): Promise<HubPageLinks[]> {
    console.log(`[HUB-EXPLORER] Reading top page: ${companyUrl}`);

    let topPage: ReaderPage | null;
    try {
      topPage = await this.tools.reader.readPage(companyUrl, parent);
    } catch (error) {
      console.warn(`[HUB-EXPLORER] Failed to fetch top page ${companyUrl}:`, error instanceof Error ? error.message : error);
      topPage = null;
    }

    if (!topPage || !topPage.content.trim()) {
      console.warn('[HUB-EXPLORER] Top page fetch failed. Returning empty list.');
      this.options.onAgentProgress?.(`Could not read ${companyUrl}`, 'warning');
      return [];
    }

    const topUrl = topPage.url;
    const topTitle = topPage.title || 'Top Page';
    const topLinks = linksFromPage(topUrl, topPage);
    const limitedPool = topLinks.slice(0, COMPANY_DETAIL_CONFIG.DISCOVERY.MAX_LINKS_FOR_PROMPT);

    console.log(`[HUB-EXPLORER] Top page has ${topLinks.length} same-domain links`);

    const hubIndices = await this.selectHubIndices(companyName, companyUrl, limitedPool, parent);

    const hubItems: HubPageLinks[] = [{ title: topTitle, url: topUrl, links: topLinks }];

    for (const index of hubIndices) {
      if (index < 0 || index >= limitedPool.length) continue;

      const hubMeta = limitedPool[index];
      const hubUrl = hubMeta.url;

      // Avoid re-fetching top page
      if (hubUrl === topUrl) continue;

      try {
        const hubPage = await this.tools.reader.readPage(hubUrl, parent);
        if (!hubPage) {
          console.warn(`[HUB-EXPLORER] Failed to fetch hub page ${hubUrl}`);
          continue;
        }

        const hubTitle = (hubPage.title || hubMeta.title || hubUrl).trim();
        hubItems.push({ title: hubTitle, url: hubUrl, links: linksFromPage(hubUrl, hubPage) });
        console.log(`[HUB-EXPLORER] Collected hub "${hubTitle}" (${hubUrl})`);
      } catch (error) {
        console.warn(`[HUB-EXPLORER] Failed to fetch hub page ${hubUrl}:`, error instanceof Error ? error.message : error);
      }
    }

    this.options.onAgentProgress?.(`Explored ${hubItems.length} hub page(s)`, 'success');
    return hubItems;
  }

  private async selectHubIndices(
    companyName: string,
    companyUrl: string,
    limitedPool: LinkItem[],
    parent?: ObservationHandle
  ): Promise<number[]> {
    const linksText = limitedPool.map((link, i) => `${i}. [${link.title}] (${link.url})`).join('\n');

    const prompt = `
Target Company:
- name: ${companyName}
- official_site: ${companyUrl}

Index Range:
- valid_indices: 0..${limitedPool.length - 1}
- select_count: 0..${COMPANY_DETAIL_CONFIG.DISCOVERY.MAX_HUB_SELECTIONS}

Available Links (index is global):
${linksText}
`;

    try {
      const result = await this.tools.llm.generate({
        model: this.options.model,
        systemPrompt: HUB_SELECTION_SYSTEM_PROMPT,
        prompt,
        schema: HubSelectionResult,
        generationName: 'discover_select_hubs',
        metadata: {
          company_name: companyName,
          company_url: companyUrl,
          max_candidates: COMPANY_DETAIL_CONFIG.DISCOVERY.MAX_CANDIDATES,
        },
        parent,
      });
      console.log(`[HUB-EXPLORER] Model selected hub indices: ${result.selected_indices.join(', ') || 'none'}`);
      return result.selected_indices;
    } catch (error) {
      console.error('[HUB-EXPLORER] Hub selection failed:', error instanceof Error ? error.message : error);
      return [];
    }
  }
}
