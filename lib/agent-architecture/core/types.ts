import { z } from 'zod';

// Discovery
export const LinkItemSchema = z.object({
  url: z.string(),
  title: z.string(),
});

export type LinkItem = z.infer<typeof LinkItemSchema>;

export const HubPageLinksSchema = z.object({
  title: z.string(),
  url: z.string(),
  links: z.array(LinkItemSchema),
});

export type HubPageLinks = z.infer<typeof HubPageLinksSchema>;

export const CandidateUrlSchema = z.object({
  url: z.string(),
  category: z.string(),
  reason: z.string(),
});

export type CandidateUrl = z.infer<typeof CandidateUrlSchema>;

export const DiscoveryResultSchema = z.object({
  candidates: z.array(CandidateUrlSchema),
});

export type DiscoveryResult = z.infer<typeof DiscoveryResultSchema>;

// Extraction
export const AddressItemSchema = z.object({
  description: z.string().describe('What this address is, e.g. 本社, 大阪支社, 工場'),
  address: z.string().describe('Raw address text exactly as written on the page'),
});

export type AddressItem = z.infer<typeof AddressItemSchema>;

export const ExtractedContentSchema = z.object({
  business: z.array(z.string()).describe('Business/service facts stated on the page'),
  addresses: z.array(AddressItemSchema).describe('Office or site addresses stated on the page'),
});

export type ExtractedContent = z.infer<typeof ExtractedContentSchema>;

export const PageExtractionResultSchema = z.object({
  url: z.string(),
  title: z.string(),
  extracted: ExtractedContentSchema,
});

export type PageExtractionResult = z.infer<typeof PageExtractionResultSchema>;

// Final output (wire format)
export const AddressOutputSchema = z.object({
  description: z.string(),
  address: z.string(),
  sourceUrl: z.string(),
});

export type AddressOutput = z.infer<typeof AddressOutputSchema>;

export const BusinessSummaryOutputSchema = z.object({
  detail: z.string(),
  sourceUrls: z.record(z.string(), z.string()),
});

export type BusinessSummaryOutput = z.infer<typeof BusinessSummaryOutputSchema>;

export const CompanyDetailOutputSchema = z.object({
  company_name: z.string(),
  company_url: z.string(),
  address: z.array(AddressOutputSchema),
  business_summary: BusinessSummaryOutputSchema,
  viewed_source_urls: z.array(z.string()),
});

export type CompanyDetailOutput = z.infer<typeof CompanyDetailOutputSchema>;

export const CompanyDetailWorkflowInputSchema = z.object({
  company_name: z.string().min(1),
  company_url: z.string().url(),
});

export type CompanyDetailWorkflowInput = z.infer<typeof CompanyDetailWorkflowInputSchema>;

export type AgentProgressType = 'info' | 'success' | 'warning' | 'agent';

export type AgentProgressCallback = (message: string, type: AgentProgressType) => void;

// HTTP batch request
export const CompanyDetailRequestSchema = z.object({
  rows: z.array(CompanyDetailWorkflowInputSchema).min(1).max(100),
  sessionId: z.string().min(1).optional(),
});

export type CompanyDetailRequest = z.infer<typeof CompanyDetailRequestSchema>;
