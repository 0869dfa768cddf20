import { NextResponse } from 'next/server';
import { loadEnvConfig } from '@/lib/config';

export async function GET() {
  const config = loadEnvConfig();
  const environmentStatus = {
    FIRECRAWL_API_KEY: !!config.FIRECRAWL_API_KEY,
    OPENAI_API_KEY: !!config.OPENAI_API_KEY,
    GEMINI_API_KEY: !!config.GEMINI_API_KEY,
    LANGFUSE_CONFIGURED: !!config.LANGFUSE_PUBLIC_KEY && !!config.LANGFUSE_SECRET_KEY,
    COMPANY_DETAIL_MODEL: config.COMPANY_DETAIL_MODEL,
  };

  return NextResponse.json({ environmentStatus });
}
