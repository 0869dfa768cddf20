import { Langfuse } from 'langfuse';

export type ObservationLevel = 'DEBUG' | 'DEFAULT' | 'WARNING' | 'ERROR';

export interface TraceInit {
  name: string;
  sessionId?: string;
  userId?: string;
  metadata?: Record<string, unknown>;
  tags?: string[];
}

export interface TokenUsage {
  input: number;
  output: number;
  total: number;
}

export interface GenerationStart {
  name: string;
  model: string;
  input: unknown;
  metadata?: Record<string, unknown>;
}

export interface GenerationObservation {
  end(body: { output?: unknown; usage?: TokenUsage; level?: ObservationLevel; statusMessage?: string }): void;
}

export interface SpanObservation {
  update(body: { input?: unknown; output?: unknown; level?: ObservationLevel; statusMessage?: string }): void;
  span(name: string): SpanObservation;
  generation(body: GenerationStart): GenerationObservation;
  end(): void;
}

export interface TraceObservation {
  update(body: { input?: unknown; output?: unknown }): void;
  span(name: string): SpanObservation;
}

export interface Tracer {
  trace(init: TraceInit): TraceObservation;
  flush(): Promise<void>;
  shutdown(): Promise<void>;
}

/**
 * Where a stage span hangs: under an existing span, or at the root of a new
 * trace. Exactly one of the two is given.
 */
export type SpanContext =
  | { parent: ObservationHandle; traceInit?: never }
  | { traceInit: TraceInit; parent?: never };

/**
 * Handle given to stage code while its span is open.
 * On a root span input/output are mirrored onto the trace.
 */
export class ObservationHandle {
  constructor(
    public readonly span: SpanObservation,
    private readonly trace?: TraceObservation
  ) {}

  setInput(input: unknown): void {
    this.span.update({ input });
    this.trace?.update({ input });
  }

  setOutput(output: unknown): void {
    this.span.update({ output });
    this.trace?.update({ output });
  }

  finish<T>(value: T): T {
    this.setOutput(value);
    return value;
  }

  error(error: unknown): void {
    const statusMessage = error instanceof Error ? error.message : String(error);
    this.span.update({ level: 'ERROR', statusMessage });
  }
}

/**
 * Opens a span, runs `fn` with its handle and always ends the span.
 * A thrown error is recorded on the span and re-thrown unchanged.
 */
export async function withObservation<T>(
  tracer: Tracer,
  spanName: string,
  spanContext: SpanContext | undefined,
  fn: (observation: ObservationHandle) => Promise<T>
): Promise<T> {
  let observation: ObservationHandle;
  if (spanContext?.parent) {
    observation = new ObservationHandle(spanContext.parent.span.span(spanName));
  } else {
    const traceInit = spanContext?.traceInit;
    const trace = tracer.trace(traceInit ?? { name: spanName });
    observation = new ObservationHandle(trace.span(spanName), traceInit ? trace : undefined);
  }

  try {
    return await fn(observation);
  } catch (error) {
    observation.error(error);
    throw error;
  } finally {
    observation.span.end();
  }
}

/* ---------- Langfuse ---------- */

type LangfuseTrace = ReturnType<Langfuse['trace']>;
type LangfuseSpan = ReturnType<LangfuseTrace['span']>;
type LangfuseGeneration = ReturnType<LangfuseTrace['generation']>;

class LangfuseGenerationObservation implements GenerationObservation {
  constructor(private readonly generation: LangfuseGeneration) {}

  end(body: { output?: unknown; usage?: TokenUsage; level?: ObservationLevel; statusMessage?: string }): void {
    this.generation.end({
      output: body.output,
      usage: body.usage,
      level: body.level,
      statusMessage: body.statusMessage,
    });
  }
}

class LangfuseSpanObservation implements SpanObservation {
  constructor(private readonly client: LangfuseSpan) {}

  update(body: { input?: unknown; output?: unknown; level?: ObservationLevel; statusMessage?: string }): void {
    this.client.update(body);
  }

  span(name: string): SpanObservation {
    return new LangfuseSpanObservation(this.client.span({ name }));
  }

  generation(body: GenerationStart): GenerationObservation {
    return new LangfuseGenerationObservation(this.client.generation(body));
  }

  end(): void {
    this.client.end();
  }
}

export class LangfuseTracer implements Tracer {
  private client: Langfuse;

  constructor(options: { publicKey: string; secretKey: string; baseUrl?: string }) {
    this.client = new Langfuse(options);
  }

  trace(init: TraceInit): TraceObservation {
    const trace = this.client.trace(init);
    return {
      update: body => {
        trace.update(body);
      },
      span: name => new LangfuseSpanObservation(trace.span({ name })),
    };
  }

  async flush(): Promise<void> {
    await this.client.flushAsync();
  }

  async shutdown(): Promise<void> {
    await this.client.shutdownAsync();
  }
}

/* ---------- No-op ---------- */

const noopGeneration: GenerationObservation = { end: () => undefined };

const noopSpan: SpanObservation = {
  update: () => undefined,
  span: () => noopSpan,
  generation: () => noopGeneration,
  end: () => undefined,
};

export class NoopTracer implements Tracer {
  trace(): TraceObservation {
    return { update: () => undefined, span: () => noopSpan };
  }

  async flush(): Promise<void> {}

  async shutdown(): Promise<void> {}
}

export function createTracer(settings: {
  LANGFUSE_PUBLIC_KEY?: string;
  LANGFUSE_SECRET_KEY?: string;
  LANGFUSE_BASEURL?: string;
}): Tracer {
  if (!settings.LANGFUSE_PUBLIC_KEY || !settings.LANGFUSE_SECRET_KEY) {
    console.log('[TRACING] Langfuse keys not set, tracing disabled');
    return new NoopTracer();
  }
  return new LangfuseTracer({
    publicKey: settings.LANGFUSE_PUBLIC_KEY,
    secretKey: settings.LANGFUSE_SECRET_KEY,
    baseUrl: settings.LANGFUSE_BASEURL,
  });
}
