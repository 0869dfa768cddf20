import { describe, it, expect } from 'vitest';
import { NoopTracer, ObservationHandle, createTracer, withObservation } from '@/lib/services/tracing';
import { RecordingTracer } from '../helpers/fakes';

describe('withObservation', () => {
  it('opens a root span on a new trace and mirrors input and output to it', async () => {
    const tracer = new RecordingTracer();

    const value = await withObservation(tracer, 'root_stage', { traceInit: { name: 'job', sessionId: 's-1' } }, async observation => {
      observation.setInput({ q: 1 });
      return observation.finish('done');
    });

    expect(value).toBe('done');
    expect(tracer.traces).toEqual([{ init: { name: 'job', sessionId: 's-1' }, input: { q: 1 }, output: 'done' }]);
    expect(tracer.spans).toHaveLength(1);
    expect(tracer.spans[0]).toMatchObject({ name: 'root_stage', input: { q: 1 }, output: 'done', ended: true });
  });

  it('opens a child span under a parent without creating a trace', async () => {
    const tracer = new RecordingTracer();
    const parent = new ObservationHandle(tracer.trace({ name: 'outer' }).span('outer_stage'));

    await withObservation(tracer, 'inner_stage', { parent }, async observation => observation.finish(1));

    expect(tracer.traces).toHaveLength(1);
    expect(tracer.spanNamed('inner_stage')?.parent).toBe(tracer.spanNamed('outer_stage'));
  });

  it('does not mirror onto a trace it created only for the span', async () => {
    const tracer = new RecordingTracer();

    await withObservation(tracer, 'lonely_stage', undefined, async observation => observation.finish('x'));

    expect(tracer.traces).toEqual([{ init: { name: 'lonely_stage' } }]);
    expect(tracer.spans[0].output).toBe('x');
  });

  it('records the error, ends the span and rethrows', async () => {
    const tracer = new RecordingTracer();
    const failure = new Error('boom');

    await expect(
      withObservation(tracer, 'failing_stage', undefined, async () => {
        throw failure;
      })
    ).rejects.toBe(failure);

    expect(tracer.spans[0]).toMatchObject({ level: 'ERROR', statusMessage: 'boom', ended: true });
  });
});

describe('createTracer', () => {
  it('returns a no-op tracer when Langfuse keys are missing', () => {
    expect(createTracer({ LANGFUSE_PUBLIC_KEY: 'pk-test' })).toBeInstanceOf(NoopTracer);
  });

  it('accepts spans and generations on the no-op tracer', async () => {
    const tracer = new NoopTracer();
    const value = await withObservation(tracer, 'stage', { traceInit: { name: 'job' } }, async observation => {
      observation.span.generation({ name: 'gen', model: 'm', input: 'i' }).end({ output: 'o' });
      return observation.finish(42);
    });

    expect(value).toBe(42);
    await expect(tracer.flush()).resolves.toBeUndefined();
  });
});
