import { COMPANY_DETAIL_CONFIG } from '../../config';
import { withObservation, type SpanContext } from '../../services/tracing';
import type { ReaderPage } from '../../types';
import type { AgentBase, AgentOptions, AgentTools } from '../agent-base';
import {
  ExtractedContentSchema,
  type CandidateUrl,
  type ExtractedContent,
  type PageExtractionResult,
} from '../core/types';

const EXTRACTION_SYSTEM_PROMPT = `
Role: Extract company facts from ONE web page of the company's official site.

Extract:
- business: short factual statements about what the company does
    - business lines, services, products, solutions, target customers, scale facts stated on the page
    - each item one fact, written in the page's language
- addresses: every office/site address written on the page
    - description: what the address is (e.g., 本社, 東京本社, 大阪支社, 工場, 研究所)
    - address: the address text exactly as written (postal code included if present)

**CRITICAL RULE**: Every item MUST be EXPLICITLY STATED in the provided page text.
DO NOT make up, guess, or infer values. If the page does not contain something, return an empty list.

Exclude:
- marketing slogans, greetings, mission statements without concrete facts
- legal boilerplate (privacy, terms, copyright)
- lines that are only phone/fax/email/contact form information
- addresses of other companies (clients, partners, venues)

Deduplicate:
- merge near-duplicate facts and the same address written twice

Output:
- Return ONLY a JSON object that matches the output schema
- No explanations, no markdown, no extra keys
`;

function cleanExtractedContent(extracted: ExtractedContent): ExtractedContent {
  return {
    business: extracted.business.map(fact => fact.trim()).filter(Boolean),
    addresses: extracted.addresses
      .map(item => ({ description: item.description.trim(), address: item.address.trim() }))
      .filter(item => item.address),
  };
}

export class PageExtractorAgent implements AgentBase {
  name = 'page-extractor-agent';
  description = 'Extracts grounded business facts and addresses from one candidate page';

  constructor(
    private tools: AgentTools,
    private options: AgentOptions
  ) {}

  /** Null when the page cannot be read or the model call fails. */
  async execute(candidate: CandidateUrl, spanContext?: SpanContext): Promise<PageExtractionResult | null> {
    return withObservation(this.tools.tracer, 'extract_company_detail_from_page', spanContext, async observation => {
      observation.setInput(candidate);
      console.log(`[AGENT-EXTRACT] Reading ${candidate.url} (${candidate.category})`);

      let page: ReaderPage | null = null;
      try {
        page = await this.tools.reader.readPage(candidate.url, observation);
      } catch (error) {
        console.warn(`[AGENT-EXTRACT] Failed to fetch ${candidate.url}:`, error instanceof Error ? error.message : error);
      }
      if (!page || !page.content.trim()) {
        console.warn(`[AGENT-EXTRACT] No content for ${candidate.url}, skipping`);
        this.options.onAgentProgress?.(`Skipped ${candidate.url}: page could not be read`, 'warning');
        return observation.finish(null);
      }

      // Trim content to prevent token overflow
      const { MAX_CONTENT_CHARS } = COMPANY_DETAIL_CONFIG.EXTRACTION;
      let trimmedContent = page.content;
      if (trimmedContent.length > MAX_CONTENT_CHARS) {
        console.log(`[AGENT-EXTRACT] Content too long (${trimmedContent.length} chars), trimming to ${MAX_CONTENT_CHARS} chars`);
        trimmedContent = trimmedContent.substring(0, MAX_CONTENT_CHARS) + '\n\n[Content truncated due to length...]';
      }

      const prompt = `
Target Page:
- url: ${page.url}
- title: ${page.title ?? ''}
- description: ${page.description ?? ''}

Page Category Hint:
- category: ${candidate.category}
- selection_reason: ${candidate.reason}

Page Text:
${trimmedContent}
`;

      let extracted: ExtractedContent;
      try {
        extracted = await this.tools.llm.generate({
          model: this.options.model,
          systemPrompt: EXTRACTION_SYSTEM_PROMPT,
          prompt,
          schema: ExtractedContentSchema,
          generationName: 'extract_page_details',
          metadata: { url: candidate.url, category: candidate.category },
          parent: observation,
        });
      } catch (error) {
        console.error(`[AGENT-EXTRACT] Extraction failed for ${candidate.url}:`, error instanceof Error ? error.message : error);
        this.options.onAgentProgress?.(`Extraction failed for ${candidate.url}`, 'warning');
        return observation.finish(null);
      }

      const result: PageExtractionResult = {
        url: candidate.url,
        title: page.title ?? '',
        extracted: cleanExtractedContent(extracted),
      };

      console.log(
        `[AGENT-EXTRACT] ${candidate.url}: ${result.extracted.business.length} business fact(s), ${result.extracted.addresses.length} address(es)`
      );
      this.options.onAgentProgress?.(
        `Extracted ${result.extracted.business.length} fact(s) and ${result.extracted.addresses.length} address(es) from ${candidate.url}`,
        'success'
      );

      return observation.finish(result);
    });
  }
}
