import { NextRequest, NextResponse } from 'next/server';
import { createCompanyDetailOrchestrator } from '@/lib/agent-architecture';
import { CompanyDetailRequestSchema } from '@/lib/agent-architecture/core/types';
import { createBatchSessionId } from '@/lib/batch/csv-batch';
import { loadEnvConfig, MissingConfigurationError } from '@/lib/config';
import { createCompanyDetailStream } from '@/lib/streaming/company-detail-stream';

// Use Node.js runtime for better compatibility
export const runtime = 'nodejs';

// Store active sessions in memory (in production, use Redis or similar)
const activeSessions = new Map<string, AbortController>();

export async function POST(request: NextRequest) {
  try {
    // Add request body size check
    const contentLength = request.headers.get('content-length');
    if (contentLength && parseInt(contentLength) > 5 * 1024 * 1024) { // 5MB limit
      return NextResponse.json({ error: 'Request body too large' }, { status: 413 });
    }

    let json: unknown;
    try {
      json = await request.json();
    } catch {
      return NextResponse.json({ error: 'Request body must be JSON' }, { status: 400 });
    }

    const parsed = CompanyDetailRequestSchema.safeParse(json);
    if (!parsed.success) {
      return NextResponse.json(
        { error: 'Please provide 1-100 rows with company_name and company_url', details: parsed.error.issues },
        { status: 400 }
      );
    }
    const { rows } = parsed.data;

    let built: ReturnType<typeof createCompanyDetailOrchestrator>;
    try {
      built = createCompanyDetailOrchestrator(loadEnvConfig());
    } catch (error) {
      if (error instanceof MissingConfigurationError) {
        console.error(`[COMPANY-DETAIL] Missing configuration: ${error.variable}`);
        return NextResponse.json({ error: 'Server configuration error: Missing API keys' }, { status: 500 });
      }
      throw error;
    }
    const { orchestrator, tracer } = built;

    const sessionId = parsed.data.sessionId ?? createBatchSessionId();
    const abortController = new AbortController();
    activeSessions.set(sessionId, abortController);

    const stream = createCompanyDetailStream({
      rows,
      sessionId,
      orchestrator,
      signal: abortController.signal,
      onClose: async () => {
        activeSessions.delete(sessionId);
        await tracer.flush();
      },
    });

    return new NextResponse(stream, {
      headers: {
        'Content-Type': 'text/event-stream',
        'Cache-Control': 'no-cache',
        'Connection': 'keep-alive',
      },
    });
  } catch (error) {
    console.error('Failed to start company detail workflow:', error);
    return NextResponse.json(
      {
        error: 'Failed to start company detail workflow',
        details: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date().toISOString(),
      },
      { status: 500 }
    );
  }
}

// Cancel endpoint
export async function DELETE(request: NextRequest) {
  const { searchParams } = new URL(request.url);
  const sessionId = searchParams.get('sessionId');

  if (!sessionId) {
    return NextResponse.json({ error: 'Session ID required' }, { status: 400 });
  }

  const controller = activeSessions.get(sessionId);
  if (controller) {
    controller.abort();
    activeSessions.delete(sessionId);
    return NextResponse.json({ success: true });
  }

  return NextResponse.json({ error: 'Session not found' }, { status: 404 });
}
