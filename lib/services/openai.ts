import OpenAI from 'openai';
import { z } from 'zod';
import { zodResponseFormat } from 'openai/helpers/zod';
import { requireSetting } from '../config';
import { getModel, PROVIDER_ENDPOINTS, type ModelName, type Provider } from './model-registry';
import type { ObservationHandle } from './tracing';

export type ReasoningEffort = 'low' | 'medium' | 'high';

export interface StructuredGenerationRequest<S extends z.ZodTypeAny> {
  model: ModelName;
  systemPrompt?: string;
  prompt: string;
  schema: S;
  generationName: string;
  metadata?: Record<string, unknown>;
  maxTokens?: number;
  reasoningEffort?: ReasoningEffort;
  /** Span the generation is recorded under */
  parent?: ObservationHandle;
}

export interface StructuredGenerator {
  generate<S extends z.ZodTypeAny>(request: StructuredGenerationRequest<S>): Promise<z.infer<S>>;
}

export class StructuredOutputError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StructuredOutputError';
  }
}

/**
 * Schema-constrained chat completions. Gemini models go through Google's
 * OpenAI-compatible endpoint, so one SDK client type serves every provider.
 */
export class OpenAIService implements StructuredGenerator {
  private clients = new Map<Provider, OpenAI>();

  constructor(private apiKeys: { openai?: string; google?: string }) {}

  /** Throws MissingConfigurationError when the model's provider has no key. */
  assertModelConfigured(model: ModelName): void {
    this.getClient(getModel(model).provider);
  }

  private getClient(provider: Provider): OpenAI {
    const existing = this.clients.get(provider);
    if (existing) return existing;

    const endpoint = PROVIDER_ENDPOINTS[provider];
    const apiKey = requireSetting(this.apiKeys[provider], endpoint.apiKeyVariable);
    const client = new OpenAI({ apiKey, baseURL: endpoint.baseURL });
    this.clients.set(provider, client);
    return client;
  }

  async generate<S extends z.ZodTypeAny>(request: StructuredGenerationRequest<S>): Promise<z.infer<S>> {
    const modelEntry = getModel(request.model);
    const client = this.getClient(modelEntry.provider);

    const metadata: Record<string, unknown> = { ...request.metadata };
    if (request.maxTokens !== undefined) metadata.max_tokens = request.maxTokens;
    if (request.reasoningEffort !== undefined) metadata.reasoning_effort = request.reasoningEffort;

    const generation = request.parent?.span.generation({
      name: request.generationName,
      model: modelEntry.traceName,
      input: { system: request.systemPrompt ?? null, prompt: request.prompt },
      metadata,
    });

    try {
      const messages: OpenAI.ChatCompletionMessageParam[] = [];
      if (request.systemPrompt) {
        messages.push({ role: 'system', content: request.systemPrompt });
      }
      messages.push({ role: 'user', content: request.prompt });

      const response = await client.chat.completions.create({
        model: modelEntry.callName,
        messages,
        response_format: zodResponseFormat(request.schema, request.generationName),
        max_completion_tokens: request.maxTokens,
        reasoning_effort: request.reasoningEffort,
      });

      const message = response.choices[0]?.message;
      let content = message?.content ?? null;

      // Some providers answer structured requests through a tool call
      if (!content && message?.tool_calls?.length) {
        content = message.tool_calls[0].function.arguments;
      }

      if (!content) {
        throw new StructuredOutputError(`No content received from ${modelEntry.traceName}`);
      }

      let raw: unknown;
      try {
        raw = JSON.parse(content);
      } catch (parseError) {
        console.error('[LLM] JSON parse error:', parseError);
        console.error('[LLM] Content that failed to parse:', content.substring(0, 500));
        throw new StructuredOutputError(`${request.generationName}: response is not valid JSON`, { cause: parseError });
      }

      const parsed = request.schema.safeParse(raw);
      if (!parsed.success) {
        throw new StructuredOutputError(
          `${request.generationName}: response does not match schema (${parsed.error.message})`,
          { cause: parsed.error }
        );
      }

      generation?.end({
        output: parsed.data,
        usage: response.usage
          ? {
              input: response.usage.prompt_tokens,
              output: response.usage.completion_tokens,
              total: response.usage.total_tokens,
            }
          : undefined,
      });

      return parsed.data;
    } catch (error) {
      generation?.end({
        level: 'ERROR',
        statusMessage: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}
