import type {
  AgentProgressType,
  CompanyDetailOutput,
  CompanyDetailWorkflowInput,
  LinkItem,
} from '../agent-architecture/core/types';

export type { CompanyDetailRequest, LinkItem } from '../agent-architecture/core/types';

export interface ReaderPage {
  content: string;
  title?: string;
  description?: string;
  /** Canonical URL after redirects */
  url: string;
  links: LinkItem[];
}

export type CompanyRow = CompanyDetailWorkflowInput;

export interface RowCompanyDetailResult {
  rowIndex: number;
  originalData: CompanyRow;
  output?: CompanyDetailOutput;
  status: 'completed' | 'error';
  error?: string;
}

// Server-sent events of POST /api/company-detail
export type CompanyDetailStreamEvent =
  | { type: 'session'; sessionId: string }
  | { type: 'processing'; rowIndex: number; totalRows: number }
  | { type: 'agent_progress'; rowIndex: number; message: string; messageType: AgentProgressType }
  | { type: 'result'; result: RowCompanyDetailResult }
  | { type: 'cancelled' }
  | { type: 'complete' }
  | { type: 'error'; error: string };
