import type { PageReader } from '../services/firecrawl';
import type { ModelName } from '../services/model-registry';
import type { StructuredGenerator } from '../services/openai';
import type { Tracer } from '../services/tracing';
import type { AgentProgressCallback } from './core/types';

// Collaborators every agent receives
export interface AgentTools {
  reader: PageReader;
  llm: StructuredGenerator;
  tracer: Tracer;
}

export interface AgentOptions {
  model: ModelName;
  onAgentProgress?: AgentProgressCallback;
}

// Defines the common shape every agent exposes
export interface AgentBase {
  name: string;
  description: string;
}
