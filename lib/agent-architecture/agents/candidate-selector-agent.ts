import { z } from 'zod';
import { COMPANY_DETAIL_CONFIG } from '../../config';
import type { ObservationHandle } from '../../services/tracing';
import { isSameDomain } from '../../utils/domain';
import { compareCodeUnits } from '../../utils/links';
import type { AgentBase, AgentOptions, AgentTools } from '../agent-base';
import type { CandidateUrl, DiscoveryResult, HubPageLinks } from '../core/types';

const CandidateSelection = z.object({
  index: z.number().int().describe('Index of the selected link from the provided list'),
  category: z.string().describe('Category of the page'),
  reason: z.string().describe('Reason for selecting this URL'),
});

const CandidateSelectionResult = z.object({
  selections: z.array(CandidateSelection),
});

export interface PoolItem {
  url: string;
  title: string;
  hubTitle: string;
  hubUrl: string;
}

const CANDIDATE_SELECTION_SYSTEM_PROMPT = `
Role: Select the best candidate pages for downstream extraction from a provided same-domain link list.

Downstream use:
- Each selected page will be fetched and an extraction step will try to pull:
    - addresses (本社/拠点/所在地)
    - business/service facts (事業内容/サービス/プロダクト)
- Prefer pages that likely CONTAIN the information (content pages), not just navigation link lists.

Selection rubric (aim for balance):
- Address-focused pages: 1-2
    - Examples: 会社概要 with 所在地, アクセス, 拠点一覧, 会社情報 where address is written
- Business-focused pages: 1-3
    - Examples: 事業内容, サービス一覧, プロダクト/ソリューション
- If available, include a company profile/about page (会社概要/企業情報) because it often contains the official address.

Avoid selecting (unless there is no better option):
- プライバシーポリシー/利用規約/免責
- ニュース/プレスリリース/ブログ/イベント/キャンペーン
- IR/投資家情報（住所が載る場合もあるが優先度は低い）
- 問い合わせフォームのみのページ

Rules:
- Choose ONLY from the provided indices
- Do not select near-duplicates (language duplicates or tracking variants)

For each selection, provide:
- index: the chosen index
- category: a short snake_case label (free text)
- reason (Japanese): 1-2 sentences; explicitly state whether it likely contains "住所" and/or "事業内容" and why

List format note:
- The list may be grouped with Markdown headers like "# ..." for readability
- Indices are global across the entire list (not per section)

Output:
- Return ONLY a JSON object that matches the output schema
- No prose, no markdown, no extra keys
`;

function titleOrFallback(title: string | undefined, fallback: string): string {
  const trimmed = (title ?? '').trim();
  return trimmed || fallback;
}

/**
 * Unique same-domain URLs across all hubs, hub URLs included.
 * The first hub that mentions a URL decides its title and group.
 */
export function collectPoolItems(companyUrl: string, hubs: HubPageLinks[]): PoolItem[] {
  const seenUrls = new Set<string>();
  const poolItems: PoolItem[] = [];

  for (const hub of hubs) {
    const hubTitle = titleOrFallback(hub.title, hub.url);

    if (isSameDomain(hub.url, companyUrl) && !seenUrls.has(hub.url)) {
      seenUrls.add(hub.url);
      poolItems.push({ url: hub.url, title: hubTitle, hubTitle, hubUrl: hub.url });
    }

    for (const link of hub.links) {
      if (!isSameDomain(link.url, companyUrl) || seenUrls.has(link.url)) continue;

      seenUrls.add(link.url);
      poolItems.push({ url: link.url, title: titleOrFallback(link.title, link.url), hubTitle, hubUrl: hub.url });
    }
  }

  return poolItems;
}

/** Groups by hub title for the prompt, then caps the list. */
export function orderAndTrimPoolItems(poolItems: PoolItem[], maxPoolForPrompt: number): PoolItem[] {
  return [...poolItems]
    .sort((a, b) => compareCodeUnits(a.hubTitle, b.hubTitle) || compareCodeUnits(a.url, b.url))
    .slice(0, maxPoolForPrompt);
}

export function formatPoolForPrompt(poolItems: PoolItem[]): string {
  const lines: string[] = [];
  let currentHubTitle: string | null = null;

  poolItems.forEach((item, i) => {
    if (item.hubTitle !== currentHubTitle) {
      if (lines.length > 0) lines.push('');
      lines.push(`# ${item.hubTitle}`);
      currentHubTitle = item.hubTitle;
    }
    lines.push(`${i}. [${item.title}](${item.url})`);
  });

  return lines.join('\n');
}

export class CandidateSelectorAgent implements AgentBase {
  name = 'candidate-selector-agent';
  description = 'Chooses up to five pages likely to state the business description or office addresses';

  constructor(
    private tools: AgentTools,
    private options: AgentOptions
  ) {}

  async execute(
    companyName: string,
    companyUrl: string,
    availableHubs: HubPageLinks[],
    parent?: ObservationHandle
  ): Promise<DiscoveryResult> {
    const { MAX_LINKS_FOR_PROMPT, MAX_CANDIDATES } = COMPANY_DETAIL_CONFIG.DISCOVERY;

    const poolItems = orderAndTrimPoolItems(collectPoolItems(companyUrl, availableHubs), MAX_LINKS_FOR_PROMPT);

    if (poolItems.length === 0) {
      console.log('[CANDIDATE-SELECTOR] Candidate pool is empty, nothing to select');
      return { candidates: [] };
    }

    console.log(`[CANDIDATE-SELECTOR] Pool size: ${poolItems.length} from ${availableHubs.length} hub(s)`);

    const prompt = `
Target Company:
- name: ${companyName}
- official_site_domain_root: ${companyUrl}

Index Range:
- valid_indices: 0..${poolItems.length - 1}
- select_count: 0..${MAX_CANDIDATES}

Available Links:
${formatPoolForPrompt(poolItems)}
`;

    let selectionResult: z.infer<typeof CandidateSelectionResult>;
    try {
      selectionResult = await this.tools.llm.generate({
        model: this.options.model,
        systemPrompt: CANDIDATE_SELECTION_SYSTEM_PROMPT,
        prompt,
        schema: CandidateSelectionResult,
        generationName: 'discover_select_candidates',
        metadata: { company_name: companyName, company_url: companyUrl },
        parent,
      });
    } catch (error) {
      console.error('[CANDIDATE-SELECTOR] Candidate selection failed:', error instanceof Error ? error.message : error);
      return { candidates: [] };
    }

    const candidates: CandidateUrl[] = [];
    const selectedUrls = new Set<string>();

    for (const selection of selectionResult.selections) {
      if (candidates.length >= MAX_CANDIDATES) break;
      if (selection.index < 0 || selection.index >= poolItems.length) continue;

      const { url } = poolItems[selection.index];
      if (selectedUrls.has(url)) continue;
      selectedUrls.add(url);

      candidates.push({ url, category: selection.category, reason: selection.reason });
    }

    console.log(`[CANDIDATE-SELECTOR] Selected ${candidates.length} candidate(s): ${candidates.map(c => c.url).join(', ')}`);
    this.options.onAgentProgress?.(`Selected ${candidates.length} candidate page(s)`, 'success');

    return { candidates };
  }
}
