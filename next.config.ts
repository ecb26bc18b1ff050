import type { NextConfig } from "next";

// STANDALONE_BUILD=true: Docker deployment (standalone mode).
// There is no static export: the messaging service worker depends on the
// response header below, which an export never sends.
export const getOutputMode = (): NextConfig['output'] | undefined =>
  process.env.STANDALONE_BUILD === 'true' ? 'standalone' : undefined;

const nextConfig: NextConfig = {
  output: getOutputMode(),
  images: {
    unoptimized: true,
  },
  // The messaging service worker is bundled under /_next/static but must
  // control the whole origin so notification taps can reach the page.
  async headers() {
    return [
      {
        source: '/_next/static/:path*',
        headers: [
          { key: 'Service-Worker-Allowed', value: '/' },
        ],
      },
    ];
  },
};

export default nextConfig;
