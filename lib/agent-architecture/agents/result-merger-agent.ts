import { z } from 'zod';
import { COMPANY_DETAIL_CONFIG } from '../../config';
import { withObservation, type SpanContext } from '../../services/tracing';
import {
  canonicalCitation,
  findCitationNumbers,
  normalizeForComparison,
  stripCitationMarkers,
} from '../../utils/text-normalize';
import type { AgentBase, AgentOptions, AgentTools } from '../agent-base';
import type {
  AddressOutput,
  BusinessSummaryOutput,
  CompanyDetailOutput,
  PageExtractionResult,
} from '../core/types';

const MergedAddress = z.object({
  description: z.string(),
  address: z.string(),
  sourceSlot: z.number().int().describe('Slot number of the page this address was taken from'),
});

const CitationSlot = z.object({
  citation: z.string().describe('Citation number as written in detail, without brackets, e.g. "1"'),
  sourceSlot: z.number().int().describe('Slot number of the page the cited statement comes from'),
});

export const MergeResultSchema = z.object({
  addresses: z.array(MergedAddress),
  businessSummary: z.object({
    detail: z.string().describe('Business summary with inline citation markers like [1]'),
    citationSlots: z.array(CitationSlot),
  }),
});

export type MergeResult = z.infer<typeof MergeResultSchema>;

const MERGE_SYSTEM_PROMPT = `
Role: Merge per-page extraction results of ONE company into a final company record.

Input format:
- Each source page is identified by a slot number like [1], [2], ...
- Each slot shows the URL path, title, business facts and addresses extracted from that page

Output:
1) addresses
    - one entry per distinct office/site: description, address, sourceSlot
    - head office (本社) first, then other sites
    - at most 5 entries
    - copy address text from the input; do not rewrite or complete it
    - merge the same address found on several pages into one entry (use the clearest source)
2) businessSummary
    - detail: 2-4 sentences in Japanese summarizing what the company does
    - put citation markers like [1] right after each statement, numbering citations from 1
    - citationSlots: one entry per citation number used in detail, mapping it to the slot it comes from

Rules:
- Use ONLY the facts in the input; do not add outside knowledge
- Never output URLs; refer to pages only by slot number
- If there is no valid address evidence, return an empty addresses list
- If there is no business evidence, return an empty detail and empty citationSlots

Output:
- Return ONLY a JSON object that matches the output schema
- No prose, no markdown, no extra keys
`;

/** Path (and query) of a URL, used instead of the full URL in prompts. */
export function urlPathHint(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.pathname}${parsed.search}`;
  } catch {
    return url;
  }
}

export function buildMergePrompt(
  companyName: string,
  companyUrl: string,
  extractions: PageExtractionResult[]
): string {
  const sections = extractions.map((extraction, i) => {
    const slot = i + 1;
    const business = extraction.extracted.business.map(fact => `  - ${fact}`);
    const addresses = extraction.extracted.addresses.map(item => `  - ${item.description}: ${item.address}`);

    return [
      `## [${slot}]`,
      `- path: ${urlPathHint(extraction.url)}`,
      `- title: ${extraction.title}`,
      '- business:',
      ...(business.length > 0 ? business : ['  (none)']),
      '- addresses:',
      ...(addresses.length > 0 ? addresses : ['  (none)']),
    ].join('\n');
  });

  return `
Target Company:
- name: ${companyName}
- official_site: ${companyUrl}

Sources:
${sections.join('\n\n')}
`;
}

/**
 * Drops entries whose slot is unknown, dedupes on normalized text plus
 * source URL, moves head-office entries to the front and caps the list.
 */
export function processAddresses(
  addresses: MergeResult['addresses'],
  slotToUrl: ReadonlyMap<number, string>
): AddressOutput[] {
  const { MAX_ADDRESSES, HEADQUARTERS_MARKER } = COMPANY_DETAIL_CONFIG.MERGE;
  const seenKeys = new Set<string>();
  const unique: AddressOutput[] = [];

  for (const item of addresses) {
    const sourceUrl = slotToUrl.get(item.sourceSlot);
    if (!sourceUrl) continue;

    const key = [normalizeForComparison(item.description), normalizeForComparison(item.address), sourceUrl].join('\u0000');
    if (seenKeys.has(key)) continue;
    seenKeys.add(key);

    unique.push({ description: item.description.trim(), address: item.address.trim(), sourceUrl });
  }

  const isHeadquarters = (item: AddressOutput) => item.description.includes(HEADQUARTERS_MARKER);

  // Array.prototype.sort is stable
  return unique
    .sort((a, b) => Number(isHeadquarters(b)) - Number(isHeadquarters(a)))
    .slice(0, MAX_ADDRESSES);
}

/**
 * Keeps only citations that appear in the text and resolve to a known page.
 * Markers without a valid source are removed from the text; no valid
 * citation at all means no summary.
 */
export function processBusinessSummary(
  summary: MergeResult['businessSummary'],
  slotToUrl: ReadonlyMap<number, string>
): BusinessSummaryOutput {
  const empty: BusinessSummaryOutput = { detail: '', sourceUrls: {} };

  const citedInText = findCitationNumbers(summary.detail);
  if (citedInText.size === 0) {
    return empty;
  }

  const validSources = new Map<string, string>();
  for (const entry of summary.citationSlots) {
    const citation = canonicalCitation(entry.citation);
    if (citation === null || !citedInText.has(citation) || validSources.has(citation)) continue;

    const url = slotToUrl.get(entry.sourceSlot);
    if (url) {
      validSources.set(citation, url);
    }
  }

  if (validSources.size === 0) {
    return empty;
  }

  const sourceUrls: Record<string, string> = {};
  for (const citation of [...validSources.keys()].sort((a, b) => Number(a) - Number(b))) {
    const url = validSources.get(citation);
    if (url) sourceUrls[citation] = url;
  }

  return {
    detail: stripCitationMarkers(summary.detail, new Set(validSources.keys())),
    sourceUrls,
  };
}

export class ResultMergerAgent implements AgentBase {
  name = 'result-merger-agent';
  description = 'Merges per-page extractions into one record with cited sources';

  constructor(
    private tools: AgentTools,
    private options: AgentOptions
  ) {}

  /**
   * Model failures are not caught here: there is no useful partial record,
   * so the error propagates to the caller after being recorded on the span.
   */
  async execute(
    companyName: string,
    companyUrl: string,
    extractions: PageExtractionResult[],
    spanContext?: SpanContext
  ): Promise<CompanyDetailOutput> {
    return withObservation(this.tools.tracer, 'merge_company_detail_extractions', spanContext, async observation => {
      observation.setInput({ company_name: companyName, company_url: companyUrl, extractions });

      const slotToUrl = new Map<number, string>(extractions.map((extraction, i) => [i + 1, extraction.url]));
      const viewedSourceUrls = extractions.map(extraction => extraction.url);

      if (extractions.length === 0) {
        console.log('[MERGER] No extraction results, returning empty record');
        return observation.finish({
          company_name: companyName,
          company_url: companyUrl,
          address: [],
          business_summary: { detail: '', sourceUrls: {} },
          viewed_source_urls: viewedSourceUrls,
        });
      }

      console.log(`[MERGER] Merging ${extractions.length} page result(s)`);

      const merged = await this.tools.llm.generate({
        model: this.options.model,
        systemPrompt: MERGE_SYSTEM_PROMPT,
        prompt: buildMergePrompt(companyName, companyUrl, extractions),
        schema: MergeResultSchema,
        generationName: 'merge_company_detail',
        metadata: { company_name: companyName, company_url: companyUrl, source_count: extractions.length },
        parent: observation,
      });

      const address = processAddresses(merged.addresses, slotToUrl);
      const businessSummary = processBusinessSummary(merged.businessSummary, slotToUrl);

      console.log(
        `[MERGER] Kept ${address.length}/${merged.addresses.length} address(es), ${Object.keys(businessSummary.sourceUrls).length} citation(s)`
      );
      this.options.onAgentProgress?.(`Merged ${address.length} address(es) and business summary`, 'success');

      return observation.finish({
        company_name: companyName,
        company_url: companyUrl,
        address,
        business_summary: businessSummary,
        viewed_source_urls: viewedSourceUrls,
      });
    });
  }
}
