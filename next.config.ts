import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  serverExternalPackages: ['@mendable/firecrawl-js', 'langfuse'],
  eslint: {
    ignoreDuringBuilds: false,
  },
  typescript: {
    ignoreBuildErrors: false,
  },
};

export default nextConfig;
